// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import zlib from 'node:zlib';
import {PathEx} from '../src/business/utils/path-ex.js';
import {type Clock} from '../src/core/time/clock.js';

/**
 * Creates an empty directory below the OS temp directory. The real path is returned so that it compares equal to
 * paths produced by base directory confinement.
 */
export function getTestCacheDirectory(testName: string): string {
  return fs.realpathSync(fs.mkdtempSync(PathEx.join(os.tmpdir(), `fleetgen-${testName}-`)));
}

export function removeTestDirectory(directory: string): void {
  fs.rmSync(directory, {recursive: true, force: true});
}

export class FixedClock implements Clock {
  public constructor(private current: Date) {}

  public now(): Date {
    return this.current;
  }

  public advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}

/**
 * Encodes a release document the way Helm stores it in a release secret, then base64 encodes it once more the way
 * the Kubernetes API returns secret data.
 */
export function encodeReleaseSecretData(release: unknown, quoted: boolean = false): string {
  const gzipped = zlib.gzipSync(Buffer.from(JSON.stringify(release), 'utf8'));
  const helmEncoded = gzipped.toString('base64');
  const inner = quoted ? `"${helmEncoded}"` : helmEncoded;
  return Buffer.from(inner, 'utf8').toString('base64');
}

export function releaseSecretJson(secretData: string): string {
  return JSON.stringify({apiVersion: 'v1', kind: 'Secret', data: {release: secretData}});
}
