#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as fnm from './src/index.js';
import {type FleetLogger} from './src/core/logging/fleet-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {Container} from './src/core/dependency-injection/container-init.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';
import {UserBreak} from './src/core/errors/user-break.js';

const context: {logger?: FleetLogger} = {};
await fnm
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('fleetgen CLI completed, via entrypoint');
  })
  .catch((error: unknown) => {
    const errorHandler: ErrorHandler = container.resolve(InjectTokens.ErrorHandler);
    errorHandler.handle(error);
    if (!(error instanceof UserBreak) && !process.exitCode) {
      process.exitCode = 1;
    }
  })
  .finally(() => Container.getInstance().dispose());
