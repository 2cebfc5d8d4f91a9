// SPDX-License-Identifier: Apache-2.0

import {isRecord, stringField} from '../../../business/utils/records.js';

/**
 * One line of `rancher cluster ls --format json`.
 */
export class ClusterEntry {
  public constructor(
    public readonly id: string,
    public readonly name: string,
    public readonly current: boolean,
  ) {}

  public static fromJson(value: unknown): ClusterEntry | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    const cluster = value.Cluster;
    return new ClusterEntry(
      stringField(value, 'ID'),
      isRecord(cluster) ? stringField(cluster, 'name') : '',
      stringField(value, 'Current') === '*',
    );
  }
}
