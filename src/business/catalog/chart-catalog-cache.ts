// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type FleetLogger} from '../../core/logging/fleet-logger.js';
import {type Clock} from '../../core/time/clock.js';
import * as constants from '../../core/constants.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type Repository} from '../../integration/helm/model/repository.js';
import {PathEx} from '../utils/path-ex.js';
import {isRecord, tryParseJson} from '../utils/records.js';
import {CatalogSnapshot} from './catalog-snapshot.js';

// Served when the shipped chart list cannot be read.
const BUILT_IN_CHARTS: readonly string[] = Object.freeze([
  'elastic7',
  'haproxy',
  'keycloak-eea',
  'memcached',
  'postgres',
  'redis',
  'varnish',
  'volto',
]);

/**
 * The list of charts offered by the chart repository, served from memory, then from the on-disk cache, then from
 * the repository itself, and finally from a static list shipped with the tool. Never rejects.
 */
@injectable()
export class ChartCatalogCache {
  private readonly helm: HelmClient;
  private readonly repository: Repository;
  private readonly cacheFilePath: string;
  private readonly fallbackChartsFilePath: string;
  private readonly clock: Clock;
  private readonly logger: FleetLogger;

  private snapshot?: CatalogSnapshot;
  private fallback?: readonly string[];

  public constructor(
    @inject(InjectTokens.Helm) helm?: HelmClient,
    @inject(InjectTokens.HelmRepository) repository?: Repository,
    @inject(InjectTokens.CatalogCacheFilePath) cacheFilePath?: string,
    @inject(InjectTokens.FallbackChartsFilePath) fallbackChartsFilePath?: string,
    @inject(InjectTokens.Clock) clock?: Clock,
    @inject(InjectTokens.FleetLogger) logger?: FleetLogger,
  ) {
    this.helm = patchInject(helm, InjectTokens.Helm, this.constructor.name);
    this.repository = patchInject(repository, InjectTokens.HelmRepository, this.constructor.name);
    this.cacheFilePath = patchInject(cacheFilePath, InjectTokens.CatalogCacheFilePath, this.constructor.name);
    this.fallbackChartsFilePath = patchInject(
      fallbackChartsFilePath,
      InjectTokens.FallbackChartsFilePath,
      this.constructor.name,
    );
    this.clock = patchInject(clock, InjectTokens.Clock, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.FleetLogger, this.constructor.name);
  }

  /**
   * @param forceRefresh - skip the freshness check and go to the repository
   * @param allowRemoteFetch - when false, answer from memory or the static list without contacting the repository
   */
  public async getCatalog(forceRefresh: boolean = false, allowRemoteFetch: boolean = true): Promise<readonly string[]> {
    const now = this.clock.now();

    if (!this.snapshot || this.snapshot.isEmpty) {
      const loaded = this.loadFromDisk();
      if (loaded && !loaded.isEmpty) {
        this.snapshot = loaded;
        this.logger.debug(`Loaded ${loaded.charts.length} charts from disk cache`);
      }
    }

    if (!forceRefresh && this.snapshot?.isFresh(now, constants.CATALOG_CACHE_TTL)) {
      this.logger.debug(`Using cached charts list with ${this.snapshot.charts.length} items`);
      return this.snapshot.charts;
    }

    if (!allowRemoteFetch) {
      this.logger.debug('Repository fetch not allowed, using existing cache or fallback');
      return this.snapshot?.charts ?? this.fallbackCharts();
    }

    this.logger.debug('Fetching fresh charts list from repository');
    const fetched = await this.fetch();
    if (fetched.length > 0) {
      this.snapshot = CatalogSnapshot.of(fetched, now);
      this.saveToDisk(this.snapshot);
      this.logger.debug(`Updated cache with ${fetched.length} charts`);
      return this.snapshot.charts;
    }

    if (this.snapshot && !this.snapshot.isEmpty) {
      this.logger.debug('Fetch failed, using cached charts');
      return this.snapshot.charts;
    }
    this.logger.debug('Fetch failed and no cache, using static fallback');
    return this.fallbackCharts();
  }

  /**
   * Same as `getCatalog(true)`.
   */
  public async refresh(): Promise<readonly string[]> {
    return this.getCatalog(true);
  }

  /**
   * Asks the repository for its charts.
   * @returns the sorted chart names with the repository prefix removed, or an empty list on any failure
   */
  private async fetch(): Promise<string[]> {
    const prefix = `${this.repository.name}/`;
    this.logger.debug(`Fetching charts from ${this.repository.url}`);
    try {
      await this.helm.addRepository(this.repository);
      await this.helm.updateRepositories();
      const results = await this.helm.searchRepository(prefix);
      const charts = results
        .map(result => result.name)
        .filter(name => name.startsWith(prefix))
        .map(name => name.slice(prefix.length))
        .sort();
      this.logger.debug(`Successfully fetched ${charts.length} charts from repo`);
      return charts;
    } catch (error) {
      this.logger.debug(`Failed to fetch charts from ${this.repository.url}: ${String(error)}`);
      return [];
    }
  }

  private loadFromDisk(): CatalogSnapshot | undefined {
    if (!fs.existsSync(this.cacheFilePath)) {
      this.logger.debug('No cache file found');
      return undefined;
    }

    let text: string;
    try {
      text = fs.readFileSync(this.cacheFilePath, 'utf8');
    } catch (error) {
      this.logger.debug(`Failed to load cache from disk: ${String(error)}`);
      return undefined;
    }

    const snapshot = CatalogSnapshot.fromDocument(tryParseJson(text));
    if (!snapshot) {
      this.logger.debug(`Ignoring malformed cache file ${this.cacheFilePath}`);
    }
    return snapshot;
  }

  private saveToDisk(snapshot: CatalogSnapshot): void {
    try {
      fs.mkdirSync(PathEx.resolve(this.cacheFilePath, '..'), {recursive: true});
      fs.writeFileSync(this.cacheFilePath, JSON.stringify(snapshot.toDocument(), undefined, 2));
      this.logger.debug(`Saved ${snapshot.charts.length} charts to disk cache`);
    } catch (error) {
      this.logger.error(`Failed to save cache to disk: ${this.cacheFilePath}`, error);
    }
  }

  private fallbackCharts(): readonly string[] {
    if (!this.fallback) {
      this.fallback = this.readFallbackFile() ?? BUILT_IN_CHARTS;
    }
    return this.fallback;
  }

  private readFallbackFile(): readonly string[] | undefined {
    let text: string;
    try {
      text = fs.readFileSync(this.fallbackChartsFilePath, 'utf8');
    } catch (error) {
      this.logger.error(`Failed to read fallback chart list: ${this.fallbackChartsFilePath}`, error);
      return undefined;
    }

    const document = tryParseJson(text);
    const charts = isRecord(document) && Array.isArray(document.charts) ? document.charts : [];
    const names = charts.filter((chart): chart is string => typeof chart === 'string' && chart.length > 0);
    if (names.length === 0) {
      this.logger.error(`Fallback chart list is malformed or empty: ${this.fallbackChartsFilePath}`);
      return undefined;
    }
    return Object.freeze(names.sort());
  }
}
