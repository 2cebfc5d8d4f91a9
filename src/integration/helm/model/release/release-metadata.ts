// SPDX-License-Identifier: Apache-2.0

import {isRecord, stringField} from '../../../../business/utils/records.js';

/**
 * The response of `helm get metadata --output json`.
 */
export class ReleaseMetadata {
  public constructor(
    public readonly name: string,
    public readonly chart: string,
    public readonly version: string,
    public readonly appVersion: string,
    public readonly namespace: string,
    public readonly revision: string,
    public readonly status: string,
  ) {}

  public static fromJson(value: unknown): ReleaseMetadata | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    return new ReleaseMetadata(
      stringField(value, 'name'),
      stringField(value, 'chart'),
      stringField(value, 'version'),
      stringField(value, 'appVersion'),
      stringField(value, 'namespace'),
      stringField(value, 'revision'),
      stringField(value, 'status'),
    );
  }
}
