// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {HelmExecution} from '../../../../src/integration/helm/execution/helm-execution.js';
import {HelmExecutionException} from '../../../../src/integration/helm/helm-execution-exception.js';
import {HelmParserException} from '../../../../src/integration/helm/helm-parser-exception.js';
import {ChartSearchResult} from '../../../../src/integration/helm/model/search/chart-search-result.js';

describe('HelmExecution', () => {
  const execution = (ok: boolean, output: string): HelmExecution =>
    new HelmExecution('helm search repo --output json eea/', Promise.resolve({ok, output}));

  it('raises HelmExecutionException with the command line when the command failed', async () => {
    await expect(execution(false, 'Error: no repositories configured').responseText()).to.be.rejectedWith(
      HelmExecutionException,
      'Execution of the Helm command failed: helm search repo --output json eea/',
    );
  });

  it('parses a list and drops items without a name', async () => {
    const output = JSON.stringify([
      {name: 'eea/volto', version: '1.0.0', app_version: '16.0', description: 'Volto frontend'},
      {version: '0.1.0'},
    ]);

    const results = await execution(true, output).responseAsList(ChartSearchResult.fromJson);

    expect(results).to.have.lengthOf(1);
    expect(results[0]).to.deep.equal(new ChartSearchResult('eea/volto', '1.0.0', '16.0', 'Volto frontend'));
  });

  it('raises HelmParserException when a list was expected', async () => {
    const pending = execution(true, '{"name": "eea/volto"}').responseAsList(ChartSearchResult.fromJson);
    await expect(pending).to.be.rejectedWith(
      HelmParserException,
      'Failed to deserialize the output into a list: helm search repo --output json eea/',
    );
  });

  it('raises HelmParserException when the output is not JSON', async () => {
    await expect(execution(true, 'not json').responseAs(ChartSearchResult.fromJson)).to.be.rejectedWith(
      HelmParserException,
      'Failed to deserialize the output of: helm search repo --output json eea/',
    );
  });
});
