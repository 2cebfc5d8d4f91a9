// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';

export type ChartCategory = 'Frontend' | 'Backend' | 'Infrastructure' | 'Other';

export type ChartTableRow = readonly [name: string, category: ChartCategory, description: string];

const FRONTEND_CHARTS: ReadonlySet<string> = new Set([
  'advisory-board-frontend',
  'eea-website-frontend',
  'fise-frontend',
  'lcp-frontend',
  'mars-frontend',
  'wise-frontend',
  'volto',
]);

const BACKEND_CHARTS: ReadonlySet<string> = new Set([
  'advisory-board-backend',
  'eea-website-backend',
  'fise-backend',
  'mars-backend',
  'wise-backend',
  'datadict',
  'contreg',
]);

const INFRASTRUCTURE_CHARTS: ReadonlySet<string> = new Set([
  'postgres',
  'redis',
  'memcached',
  'elastic6',
  'elastic7',
  'opensearch',
  'opensearch-dashboards',
  'haproxy',
  'varnish',
]);

export function categorize(chartName: string): ChartCategory {
  if (FRONTEND_CHARTS.has(chartName)) {
    return 'Frontend';
  }
  if (BACKEND_CHARTS.has(chartName)) {
    return 'Backend';
  }
  if (INFRASTRUCTURE_CHARTS.has(chartName)) {
    return 'Infrastructure';
  }
  return 'Other';
}

/**
 * Case-insensitive substring filter. An empty term keeps every chart.
 */
export function filterCharts(term: string, charts: readonly string[]): string[] {
  if (!term) {
    return [...charts];
  }
  const needle = term.toLowerCase();
  return charts.filter(chart => chart.toLowerCase().includes(needle));
}

/**
 * Completion candidates for a partially typed chart name: charts starting with it, then charts merely containing
 * it, capped at ten.
 */
export function suggestCharts(partial: string, charts: readonly string[]): string[] {
  if (!partial) {
    return charts.slice(0, constants.MAX_CHART_SUGGESTIONS);
  }

  const needle = partial.toLowerCase();
  const prefixMatches = charts.filter(chart => chart.toLowerCase().startsWith(needle));
  const otherMatches = charts.filter(
    chart => !chart.toLowerCase().startsWith(needle) && chart.toLowerCase().includes(needle),
  );
  return [...prefixMatches, ...otherMatches].slice(0, constants.MAX_CHART_SUGGESTIONS);
}

export function tabulateCharts(charts: readonly string[]): ChartTableRow[] {
  return charts.map(chart => {
    const category = categorize(chart);
    return [chart, category, `EEA ${category} application`] as const;
  });
}
