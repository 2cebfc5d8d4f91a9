// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {
  categorize,
  filterCharts,
  suggestCharts,
  tabulateCharts,
} from '../../../../src/business/catalog/chart-catalog.js';

describe('chart catalog helpers', () => {
  const charts = ['elastic7', 'eea-website-backend', 'opensearch', 'postgres', 'redis', 'rn-postgresql', 'volto'];

  it('categorizes known charts and defaults to Other', () => {
    expect(categorize('volto')).to.equal('Frontend');
    expect(categorize('contreg')).to.equal('Backend');
    expect(categorize('postgres')).to.equal('Infrastructure');
    expect(categorize('rn-postgresql')).to.equal('Other');
    expect(categorize('')).to.equal('Other');
  });

  it('filters case-insensitively and keeps everything for an empty term', () => {
    expect(filterCharts('POST', charts)).to.deep.equal(['postgres', 'rn-postgresql']);
    expect(filterCharts('', charts)).to.deep.equal(charts);
  });

  it('lists prefix matches before other matches', () => {
    expect(suggestCharts('post', charts)).to.deep.equal(['postgres', 'rn-postgresql']);
    expect(suggestCharts('e', charts)).to.deep.equal([
      'elastic7',
      'eea-website-backend',
      'opensearch',
      'postgres',
      'redis',
      'rn-postgresql',
    ]);
  });

  it('caps suggestions at ten', () => {
    const many = Array.from({length: 15}, (_, index) => `chart-${String(index).padStart(2, '0')}`);

    expect(suggestCharts('chart', many)).to.have.lengthOf(10);
    expect(suggestCharts('', many)).to.deep.equal(many.slice(0, 10));
  });

  it('tabulates name, category and description', () => {
    expect(tabulateCharts(['redis', 'volto'])).to.deep.equal([
      ['redis', 'Infrastructure', 'EEA Infrastructure application'],
      ['volto', 'Frontend', 'EEA Frontend application'],
    ]);
  });
});
