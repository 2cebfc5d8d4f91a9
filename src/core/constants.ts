// SPDX-License-Identifier: Apache-2.0

import {dirname} from 'node:path';
import {fileURLToPath} from 'node:url';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';
import {Duration} from './time/duration.js';
import {color, PRESET_TIMER} from 'listr2';

export const ROOT_DIR = PathEx.joinWithRealPath(dirname(fileURLToPath(import.meta.url)), '..', '..');

// -------------------- fleetgen related constants -----------------------------------------------------------------
export const FLEETGEN_HOME_DIR = process.env.FLEETGEN_HOME || PathEx.join(os.homedir(), '.fleetgen');
export const FLEETGEN_LOGS_DIR = PathEx.join(FLEETGEN_HOME_DIR, 'logs');
export const FLEETGEN_LOG_LEVEL = process.env.FLEETGEN_LOG_LEVEL || 'debug';
export const DEFAULT_LOCAL_CONFIG_FILE = 'local-config.yaml';
export const RESOURCES_DIR = PathEx.joinWithRealPath(ROOT_DIR, 'resources');
export const TEMPLATES_DIR = PathEx.join(RESOURCES_DIR, 'templates');

export const HELM = 'helm';
export const RANCHER = 'rancher';
export const COMMAND_TIMEOUT = Duration.ofSeconds(Number(process.env.FLEETGEN_COMMAND_TIMEOUT_SECONDS) || 30);
export const COMMAND_TIMED_OUT_MESSAGE = 'Command timed out';

// --------------- Charts related constants ----------------------------------------------------------------------------
export const HELM_REPO_NAME = 'eea';
export const HELM_REPO_URL = process.env.FLEETGEN_HELM_REPO_URL ?? 'https://eea.github.io/helm-charts/';
export const DEFAULT_CHART_VERSION = 'latest';
export const CATALOG_CACHE_FILE = 'charts-cache.json';
export const CATALOG_CACHE_FORMAT_VERSION = '1.0';
export const CATALOG_CACHE_TTL = Duration.ofHours(1);
export const FALLBACK_CHARTS_FILE = PathEx.join(RESOURCES_DIR, 'fallback-charts.json');
export const MAX_CHART_SUGGESTIONS = 10;
export const HELM_RELEASE_SECRET_PREFIX = 'sh.helm.release.v1.';

// --------------- Fleet artifact related constants -------------------------------------------------------------------
export const DEFAULT_APPS_DIR = 'apps';
export const DEFAULT_INT_DIR = 'int';
export const DEFAULT_CLUSTER_FOLDER = 'default';
export const FLEET_BUNDLE_FILE = 'fleet.yaml';
export const CONFIG_OBJECT_NAME_SUFFIX = '-config';
export const CONFIG_OBJECT_FILE_SUFFIX = '-config.yaml';
export const APPLY_MANIFEST_FILE = 'configmap.yaml';
export const VALUES_KEY = 'values.yaml';
export const VALUES_TEMPLATE_FILE = PathEx.join(TEMPLATES_DIR, 'values.yaml.template');
export const CLUSTER_NAME_LABEL = 'management.cattle.io/cluster-name';
export const DEFAULT_ROLLOUT_STRATEGY: Readonly<Record<string, string>> = Object.freeze({
  maxUnavailable: '25%',
  maxUnavailablePartitions: '0',
  autoPartitionSize: '10%',
});

/**
 * Listr related
 * @returns a object that defines the default color options
 */
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number): boolean => duration > 100,
  format: (duration: number) => {
    if (duration > 30_000) {
      return (message?: string): string => color.red(message ?? '');
    }

    return (message?: string): string => color.green(message ?? '');
  },
};

export const LISTR_DEFAULT_RENDERER_OPTION = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};
