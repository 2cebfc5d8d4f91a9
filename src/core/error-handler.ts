// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type FleetLogger} from './logging/fleet-logger.js';
import {UserBreak} from './errors/user-break.js';
import {SilentBreak} from './errors/silent-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: FleetLogger;

  public constructor(@inject(InjectTokens.FleetLogger) logger?: FleetLogger) {
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const break_ = this.extractBreak(error);
    if (break_ instanceof UserBreak) {
      this.logger.showUser(break_.message);
    } else if (break_ instanceof SilentBreak) {
      this.logger.info(break_.message);
    } else {
      this.logger.showUserError(error);
    }
  }

  /**
   * Walks the cause chain looking for a UserBreak or SilentBreak.
   */
  private extractBreak(error: unknown): UserBreak | SilentBreak | undefined {
    if (error instanceof UserBreak || error instanceof SilentBreak) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractBreak(error.cause);
    }
    return undefined;
  }
}
