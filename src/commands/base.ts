// SPDX-License-Identifier: Apache-2.0

import {type FleetLogger} from '../core/logging/fleet-logger.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';

export abstract class BaseCommand {
  public readonly logger: FleetLogger;

  protected constructor(logger?: FleetLogger) {
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  public abstract getCommandName(): string;

  public abstract getCommandDefinition(): CommandDefinition;

  public close(): Promise<void> {
    // no-op
    return Promise.resolve();
  }
}
