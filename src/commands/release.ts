// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import * as yaml from 'yaml';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';
import {YargsCommand} from '../core/yargs-command.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {MissingArgumentError} from '../core/errors/missing-argument-error.js';
import {type FleetLogger} from '../core/logging/fleet-logger.js';
import {type ReleaseInspector} from '../business/release/release-inspector.js';
import {type ReleaseMetadataDecoder} from '../business/release/release-metadata-decoder.js';
import {type ReleaseRecord} from '../business/release/release-record.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Inspects the Helm releases installed in the current Rancher context
 */
export class ReleaseCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'release';

  private readonly inspector: ReleaseInspector;
  private readonly decoder: ReleaseMetadataDecoder;

  public constructor(
    @inject(InjectTokens.ReleaseInspector) inspector?: ReleaseInspector,
    @inject(InjectTokens.ReleaseMetadataDecoder) decoder?: ReleaseMetadataDecoder,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    super(logger);
    this.inspector = patchInject(inspector, InjectTokens.ReleaseInspector, this.constructor.name);
    this.decoder = patchInject(decoder, InjectTokens.ReleaseMetadataDecoder, this.constructor.name);
  }

  public static describeRelease(release: ReleaseRecord): string {
    const version = release.chartVersion ? `${release.chart}-${release.chartVersion}` : release.chart;
    const appVersion = release.appVersion ? ` (app ${release.appVersion})` : '';
    const state = `revision ${release.revision}  ${release.status}`;
    return `${release.namespace}/${release.name}  ${version}${appVersion}  ${state}`;
  }

  public async list(argv: ArgvStruct): Promise<boolean> {
    const namespace = flags.getString(argv, flags.namespace);
    const releases = await this.inspector.listReleases(namespace);
    this.logger.showList(
      namespace ? `Releases in namespace '${namespace}'` : 'Releases in all namespaces',
      releases.map(release => ReleaseCommand.describeRelease(release)),
    );
    return true;
  }

  public async values(argv: ArgvStruct): Promise<boolean> {
    const {releaseName, namespace} = ReleaseCommand.releaseAddress(argv);
    const values = await this.inspector.getReleaseValues(releaseName, namespace);
    this.logger.showUser(yaml.stringify(values));
    return true;
  }

  public async metadata(argv: ArgvStruct): Promise<boolean> {
    const {releaseName, namespace} = ReleaseCommand.releaseAddress(argv);
    const metadata = await this.decoder.decode(releaseName, namespace, flags.getString(argv, flags.revision) ?? '1');
    this.logger.showJSON(`Chart metadata of '${namespace}/${releaseName}'`, metadata);
    return true;
  }

  private static releaseAddress(argv: ArgvStruct): {releaseName: string; namespace: string} {
    const releaseName = flags.getString(argv, flags.releaseName);
    const namespace = flags.getString(argv, flags.namespace);
    if (!releaseName || !namespace) {
      throw new MissingArgumentError('Both --release and --namespace are required');
    }
    return {releaseName, namespace};
  }

  public getCommandDefinition(): CommandDefinition {
    return {
      command: ReleaseCommand.COMMAND_NAME,
      describe: 'Inspect installed Helm releases',
      builder: (yargs: AnyYargs): AnyYargs =>
        yargs
          .command(
            YargsCommand.of(
              {
                command: 'list',
                description: 'List releases with their chart versions',
                commandDef: this,
                handler: argv => this.list(argv),
              },
              {required: [], optional: [flags.namespace]},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'values',
                description: 'Show the user supplied values of a release',
                commandDef: this,
                handler: argv => this.values(argv),
              },
              {required: [flags.releaseName, flags.namespace], optional: []},
            ),
          )
          .command(
            YargsCommand.of(
              {
                command: 'metadata',
                description: 'Decode the chart metadata stored in the release secret',
                commandDef: this,
                handler: argv => this.metadata(argv),
              },
              {required: [flags.releaseName, flags.namespace], optional: [flags.revision]},
            ),
          )
          .demandCommand(1, 'Select a release command'),
    };
  }
}
