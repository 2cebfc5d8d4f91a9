// SPDX-License-Identifier: Apache-2.0

/**
 * A deployed release. `revision` is the release revision, not the chart version. Chart and app versions may be
 * empty when helm did not report them.
 */
export interface ReleaseRecord {
  readonly name: string;
  readonly namespace: string;
  readonly chart: string;
  readonly revision: string;
  readonly status: string;
  readonly chartVersion: string;
  readonly appVersion: string;
}

export interface ChartMetadata {
  readonly name: string;
  readonly version: string;
  readonly appVersion: string;
  readonly description: string;
}

export const EMPTY_CHART_METADATA: ChartMetadata = Object.freeze({
  name: '',
  version: '',
  appVersion: '',
  description: '',
});

export function hasChartMetadata(metadata: ChartMetadata): boolean {
  return Boolean(metadata.name || metadata.version || metadata.appVersion || metadata.description);
}
