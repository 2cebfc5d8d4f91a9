// SPDX-License-Identifier: Apache-2.0

import {isRecord, stringField} from '../../../../business/utils/records.js';

/**
 * One row of `helm list --output json`. The chart field carries the chart name and version joined by a dash.
 */
export class ReleaseItem {
  public constructor(
    public readonly name: string,
    public readonly namespace: string,
    public readonly revision: string,
    public readonly updated: string,
    public readonly status: string,
    public readonly chart: string,
    public readonly appVersion: string,
  ) {}

  public static fromJson(value: unknown): ReleaseItem | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    return new ReleaseItem(
      stringField(value, 'name'),
      stringField(value, 'namespace'),
      stringField(value, 'revision'),
      stringField(value, 'updated'),
      stringField(value, 'status'),
      stringField(value, 'chart'),
      stringField(value, 'app_version'),
    );
  }
}
