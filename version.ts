// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';
import {isRecord} from './src/business/utils/records.js';

/**
 * This file should only contain the function to get the fleetgen version.
 */
export function getFleetgenVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // the compiled entrypoint lives one level below the package root
  const candidates = [PathEx.resolve(__dirname, 'package.json'), PathEx.resolve(__dirname, '..', 'package.json')];
  const packageJsonPath = candidates.find(candidate => fs.existsSync(candidate));
  if (!packageJsonPath) {
    return '0.0.0';
  }
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  return isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
}
