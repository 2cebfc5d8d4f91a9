// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';
import {type ChartMetadata, EMPTY_CHART_METADATA, type ReleaseRecord} from '../release/release-record.js';
import {type JsonRecord} from '../utils/records.js';

export interface RolloutStrategy {
  maxUnavailable: string;
  maxUnavailablePartitions: string;
  autoPartitionSize: string;
}

/**
 * The canonical description of one generated deployment. After resolution `appName` is
 * `<namespace>-<chartName>` in sanitized form.
 */
export interface FleetConfig {
  appName: string;
  namespace: string;
  chartName: string;
  chartVersion: string;
  repositoryUrl: string;
  values: JsonRecord;
  targetCluster: string;
  dependencies: string[];
  isExistingRelease: boolean;
  releaseName: string;
  chartMetadata: ChartMetadata;
  rolloutStrategy: RolloutStrategy;
}

export type ChartSelection =
  | {readonly kind: 'catalog'; readonly chartName: string}
  | {readonly kind: 'release'; readonly namespace: string; readonly release: ReleaseRecord};

export interface ApplicationIdentity {
  readonly appName: string;
}

export interface ResolutionOverrides {
  readonly namespace?: string;
  readonly targetCluster?: string;
  readonly valuesYaml?: string;
  readonly dependencies?: readonly string[];
}

export function defaultRolloutStrategy(): RolloutStrategy {
  return {
    maxUnavailable: constants.DEFAULT_ROLLOUT_STRATEGY.maxUnavailable,
    maxUnavailablePartitions: constants.DEFAULT_ROLLOUT_STRATEGY.maxUnavailablePartitions,
    autoPartitionSize: constants.DEFAULT_ROLLOUT_STRATEGY.autoPartitionSize,
  };
}

export function emptyFleetConfig(appName: string): FleetConfig {
  return {
    appName,
    namespace: '',
    chartName: '',
    chartVersion: '',
    repositoryUrl: constants.HELM_REPO_URL,
    values: {},
    targetCluster: '',
    dependencies: [],
    isExistingRelease: false,
    releaseName: '',
    chartMetadata: EMPTY_CHART_METADATA,
    rolloutStrategy: defaultRolloutStrategy(),
  };
}

/**
 * Makes a name usable as a Kubernetes label and a directory name by replacing `/` and `_` with `-`.
 */
export function sanitizeName(name: string): string {
  return name.replace(/[/_]/g, '-');
}
