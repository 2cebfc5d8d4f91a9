// SPDX-License-Identifier: Apache-2.0

import {Duration} from '../../core/time/duration.js';
import * as constants from '../../core/constants.js';
import {isRecord} from '../utils/records.js';

/**
 * The persisted form of a snapshot, stored as `charts-cache.json`.
 */
export interface CatalogCacheDocument {
  charts: string[];
  timestamp: string;
  version: string;
}

/**
 * An immutable, sorted list of chart names and the instant it was captured. A snapshot read from a document without
 * a timestamp has no capture time and is always expired.
 */
export class CatalogSnapshot {
  public readonly charts: readonly string[];

  private constructor(
    charts: readonly string[],
    public readonly capturedAt: Date | undefined,
  ) {
    this.charts = Object.freeze([...charts].sort());
    Object.freeze(this);
  }

  public static of(charts: readonly string[], capturedAt: Date | undefined): CatalogSnapshot {
    return new CatalogSnapshot(charts, capturedAt);
  }

  public get isEmpty(): boolean {
    return this.charts.length === 0;
  }

  /**
   * @returns true while less than `ttl` has elapsed since capture
   */
  public isFresh(now: Date, ttl: Duration): boolean {
    if (!this.capturedAt) {
      return false;
    }
    return Duration.between(this.capturedAt, now).compareTo(ttl) < 0;
  }

  public toDocument(): CatalogCacheDocument {
    return {
      charts: [...this.charts],
      timestamp: this.capturedAt?.toISOString() ?? '',
      version: constants.CATALOG_CACHE_FORMAT_VERSION,
    };
  }

  /**
   * Reads a parsed cache document.
   * @returns undefined when the document does not have the expected shape or its timestamp cannot be parsed
   */
  public static fromDocument(document: unknown): CatalogSnapshot | undefined {
    if (!isRecord(document)) {
      return undefined;
    }

    const charts = document.charts ?? [];
    if (!Array.isArray(charts) || !charts.every((chart): chart is string => typeof chart === 'string')) {
      return undefined;
    }

    const timestamp = document.timestamp;
    if (timestamp === undefined || timestamp === null || timestamp === '') {
      return new CatalogSnapshot(charts, undefined);
    }
    if (typeof timestamp !== 'string') {
      return undefined;
    }

    const capturedAt = new Date(timestamp);
    if (Number.isNaN(capturedAt.getTime())) {
      return undefined;
    }
    return new CatalogSnapshot(charts, capturedAt);
  }
}
