// SPDX-License-Identifier: Apache-2.0

import {isRecord, stringField} from '../../../../business/utils/records.js';

/**
 * One row of `helm search repo --output json`.
 */
export class ChartSearchResult {
  public constructor(
    public readonly name: string,
    public readonly version: string,
    public readonly appVersion: string,
    public readonly description: string,
  ) {}

  public static fromJson(value: unknown): ChartSearchResult | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    const name = stringField(value, 'name');
    if (!name) {
      return undefined;
    }
    return new ChartSearchResult(
      name,
      stringField(value, 'version'),
      stringField(value, 'app_version'),
      stringField(value, 'description'),
    );
  }
}
