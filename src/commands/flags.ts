// SPDX-License-Identifier: Apache-2.0

import {type Options} from 'yargs';
import {type CommandFlag} from '../types/flag-types.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type Optional} from '../types/index.js';
import * as constants from '../core/constants.js';

export class Flags {
  private static toOptions(flag: CommandFlag, demandOption: boolean): Options {
    const defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
    return {
      describe: flag.definition.describe,
      alias: flag.definition.alias,
      type: flag.definition.type,
      default: demandOption ? undefined : defaultValue,
      demandOption,
    };
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, Flags.toOptions(flag, true));
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, Flags.toOptions(flag, false));
    }
  }

  public static setCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    Flags.setOptionalCommandFlags(y, ...commandFlags);
  }

  /** Returns the trimmed string value of a flag, or undefined when it is absent or blank */
  public static getString(argv: ArgvStruct, flag: CommandFlag): Optional<string> {
    const value = argv[flag.name];
    if (typeof value === 'number') {
      return String(value);
    }
    if (typeof value !== 'string') {
      return undefined;
    }
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  public static getBoolean(argv: ArgvStruct, flag: CommandFlag): boolean {
    return argv[flag.name] === true;
  }

  /** Splits a comma separated flag value into its non-empty entries */
  public static getList(argv: ArgvStruct, flag: CommandFlag): string[] {
    const value = Flags.getString(argv, flag);
    if (!value) {
      return [];
    }
    return value
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry !== '');
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly chartName: CommandFlag = {
    constName: 'chartName',
    name: 'chart',
    definition: {
      describe: `Chart name from the '${constants.HELM_REPO_NAME}' catalog`,
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly releaseName: CommandFlag = {
    constName: 'releaseName',
    name: 'release',
    definition: {
      describe: 'Name of an installed Helm release to take the chart and values from',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly namespace: CommandFlag = {
    constName: 'namespace',
    name: 'namespace',
    definition: {
      describe: 'Kubernetes namespace',
      alias: 'n',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly appName: CommandFlag = {
    constName: 'appName',
    name: 'app-name',
    definition: {
      describe: 'Application name, combined with the namespace into the final app name',
      alias: 'a',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly targetCluster: CommandFlag = {
    constName: 'targetCluster',
    name: 'target-cluster',
    definition: {
      describe: 'Restrict the bundle to the cluster with this name',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly valuesFile: CommandFlag = {
    constName: 'valuesFile',
    name: 'values-file',
    definition: {
      describe: 'YAML file holding the Helm values',
      alias: 'f',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly dependencies: CommandFlag = {
    constName: 'dependencies',
    name: 'dependencies',
    definition: {
      describe: 'Comma separated list of bundles this one depends on',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly forceRefresh: CommandFlag = {
    constName: 'forceRefresh',
    name: 'force-refresh',
    definition: {
      describe: 'Ignore the cached chart catalog and query the repository',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly offline: CommandFlag = {
    constName: 'offline',
    name: 'offline',
    definition: {
      describe: 'Never query the chart repository',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly search: CommandFlag = {
    constName: 'search',
    name: 'search',
    definition: {
      describe: 'Only show charts whose name contains this term',
      alias: 's',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly partial: CommandFlag = {
    constName: 'partial',
    name: 'partial',
    definition: {
      describe: 'Partial chart name to complete',
      alias: 'p',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly dryRun: CommandFlag = {
    constName: 'dryRun',
    name: 'dry-run',
    definition: {
      describe: 'Print the artifacts instead of writing them',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly deploy: CommandFlag = {
    constName: 'deploy',
    name: 'deploy',
    definition: {
      describe: 'Apply the ConfigMap to the cluster after writing the artifacts',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly configKey: CommandFlag = {
    constName: 'configKey',
    name: 'config',
    definition: {
      describe: 'Configuration key in the form <cluster>/<app>',
      alias: 'c',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly revision: CommandFlag = {
    constName: 'revision',
    name: 'revision',
    definition: {
      describe: 'Release revision to read the chart metadata from',
      defaultValue: '1',
      type: 'string',
    },
  };

  public static readonly context: CommandFlag = {
    constName: 'context',
    name: 'context',
    definition: {
      describe: 'Rancher context in the form <cluster>:<project>',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly clusterId: CommandFlag = {
    constName: 'clusterId',
    name: 'cluster-id',
    definition: {
      describe: 'Rancher cluster id',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly clusterName: CommandFlag = {
    constName: 'clusterName',
    name: 'cluster-name',
    definition: {
      describe: 'Rancher cluster name',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly appsDir: CommandFlag = {
    constName: 'appsDir',
    name: 'apps-dir',
    definition: {
      describe: 'Directory receiving the Fleet bundle manifests',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly intDir: CommandFlag = {
    constName: 'intDir',
    name: 'int-dir',
    definition: {
      describe: 'Directory receiving the ConfigMap documents',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.devMode,
    Flags.chartName,
    Flags.releaseName,
    Flags.namespace,
    Flags.appName,
    Flags.targetCluster,
    Flags.valuesFile,
    Flags.dependencies,
    Flags.forceRefresh,
    Flags.offline,
    Flags.search,
    Flags.partial,
    Flags.dryRun,
    Flags.deploy,
    Flags.configKey,
    Flags.revision,
    Flags.context,
    Flags.clusterId,
    Flags.clusterName,
    Flags.appsDir,
    Flags.intDir,
  ];
}
