import { CallToolResult, ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { describe, expect, it } from 'vitest';
import { createFakeUpstream } from '../testing/fake-upstream.js';
import { SCENARIO_PATTERN, TOOL_SPECS } from './definitions.js';
import { executeTool, listTools } from './handlers.js';

const options = { maxResponseChars: 130000 };

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error('expected a text result');
  }
  return first.text;
}

function errorOf(result: CallToolResult) {
  expect(result.isError).toBe(true);
  return JSON.parse(textOf(result)).error;
}

describe('listTools', () => {
  it('advertises the full catalog', () => {
    const tools = listTools();
    expect(tools).toHaveLength(20);
    expect(new Set(tools.map((tool) => tool.name)).size).toBe(20);
  });

  it('marks required parameters and closed value sets', () => {
    const tool = listTools().find((candidate) => candidate.name === 'get_adam_datastructure_info');
    expect(tool?.inputSchema.required).toEqual(['product', 'datastructure']);
    expect(tool?.inputSchema.properties).toMatchObject({
      product: { type: 'string', enum: expect.arrayContaining(['adamig-1-3', 'adam-occds-1-1']) },
      datastructure: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9._-]*$' },
    });
  });

  it('omits the required list for tools without parameters', () => {
    const tool = listTools().find((candidate) => candidate.name === 'get_ct_package_list');
    expect(tool?.inputSchema).toEqual({ type: 'object', properties: {} });
  });
});

describe('executeTool routing', () => {
  it.each([
    { tool: 'get_cdisc_library_product_list', args: {}, path: '/mdr/products', params: { expand: false } },
    { tool: 'get_sdtmig_class_info', args: { version: '3-4' }, path: '/mdr/sdtmig/3-4/classes' },
    {
      tool: 'get_sdtmig_class_info',
      args: { version: '3-4', className: 'Events' },
      path: '/mdr/sdtmig/3-4/classes/Events/datasets',
      params: { expand: false },
    },
    { tool: 'get_sdtmig_dataset_info', args: { version: '3-4', dataset: 'AE' }, path: '/mdr/sdtmig/3-4/datasets/AE' },
    {
      tool: 'get_sdtmig_variable_info',
      args: { version: '3-4', dataset: 'AE', variable: 'AETERM' },
      path: '/mdr/sdtmig/3-4/datasets/AE/variables/AETERM',
    },
    { tool: 'get_sdtm_model_class_info', args: { version: '2-0' }, path: '/mdr/sdtm/2-0/classes' },
    {
      tool: 'get_sdtm_model_dataset_info',
      args: { version: '2-0', dataset: 'RELREC' },
      path: '/mdr/sdtm/2-0/datasets/RELREC',
    },
    { tool: 'get_sendig_class_info', args: { version: '3-1', className: 'Findings' }, path: '/mdr/sendig/3-1/classes/Findings' },
    { tool: 'get_sendig_dataset_info', args: { version: '3-1' }, path: '/mdr/sendig/3-1/datasets' },
    {
      tool: 'get_cdashig_class_info',
      args: { version: '2-3', className: 'Events' },
      path: '/mdr/cdashig/2-3/classes/Events/domains',
    },
    { tool: 'get_cdashig_domain_info', args: { version: '2-3', domain: 'VS' }, path: '/mdr/cdashig/2-3/domains/VS' },
    { tool: 'get_cdashig_scenario_info', args: { version: '2-3', scenario: 'DS.Gen' }, path: '/mdr/cdashig/2-3/scenarios/DS.Gen' },
    { tool: 'get_cdash_model_class_info', args: { version: '1-3' }, path: '/mdr/cdash/1-3/classes' },
    { tool: 'get_cdash_model_domain_info', args: { version: '1-3', domain: 'DM' }, path: '/mdr/cdash/1-3/domains/DM' },
    { tool: 'get_adam_product_info', args: { product: 'adamig-1-3' }, path: '/mdr/adam/adamig-1-3' },
    {
      tool: 'get_adam_datastructure_info',
      args: { product: 'adam-occds-1-1', datastructure: 'AE' },
      path: '/mdr/adam/adam-occds-1-1/datastructures/AE',
    },
    { tool: 'get_qrs_info', args: { instrument: 'AIMS01', version: '2-0' }, path: '/mdr/qrs/instruments/AIMS01/versions/2-0' },
    { tool: 'get_ct_package_list', args: {}, path: '/mdr/ct/packages' },
    { tool: 'get_ct_package_info', args: { package: 'sdtmct-2024-09-27' }, path: '/mdr/ct/packages/sdtmct-2024-09-27' },
    {
      tool: 'get_ct_codelist_info',
      args: { package: 'sdtmct-2024-09-27', codelist: 'C66731' },
      path: '/mdr/ct/packages/sdtmct-2024-09-27/codelists/C66731',
    },
    {
      tool: 'get_ct_term_info',
      args: { package: 'sdtmct-2024-09-27', codelist: 'C66731', term: 'C20197' },
      path: '/mdr/ct/packages/sdtmct-2024-09-27/codelists/C66731/terms/C20197',
    },
  ])('$tool calls $path', async ({ tool, args, path, params }) => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    const result = await executeTool(client, tool, args, options);

    expect(result.isError).toBeUndefined();
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(path);
    expect(requests[0].params).toEqual(params);
  });

  it('trims values before building the path', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    await executeTool(client, 'get_sdtmig_dataset_info', { version: ' 3-4 ', dataset: ' DM' }, options);

    expect(requests[0].url).toBe('/mdr/sdtmig/3-4/datasets/DM');
  });

  it('treats a blank optional value as omitted', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    await executeTool(client, 'get_sdtmig_class_info', { version: '3-4', className: '  ' }, options);

    expect(requests[0].url).toBe('/mdr/sdtmig/3-4/classes');
    expect(requests[0].params).toBeUndefined();
  });

  it('accepts a scenario id with spaces as one encoded segment', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    const result = await executeTool(client, 'get_cdashig_scenario_info', { version: '2-3', scenario: 'DS Gen' }, options);

    expect(result.isError).toBeUndefined();
    expect(requests[0].url).toBe('/mdr/cdashig/2-3/scenarios/DS%20Gen');
  });

  it('rejects a scenario id containing a slash', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(
      await executeTool(client, 'get_cdashig_scenario_info', { version: '2-3', scenario: 'DS/../AE' }, options)
    );

    expect(error.message).toBe(`Invalid scenario 'DS/../AE': expected to match ${SCENARIO_PATTERN}`);
    expect(requests).toHaveLength(0);
  });

  it('ignores arguments the tool does not declare', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    await executeTool(client, 'get_ct_package_list', { verbose: 'yes' }, options);

    expect(requests[0].url).toBe('/mdr/ct/packages');
  });
});

describe('executeTool validation', () => {
  const withRequired = TOOL_SPECS.filter((spec) => spec.parameters.some((param) => param.required));

  it.each(withRequired.map((spec) => ({ tool: spec.name, first: spec.parameters.find((p) => p.required)?.name })))(
    '$tool rejects a call without $first before contacting the upstream',
    async ({ tool, first }) => {
      const { client, requests } = createFakeUpstream(() => ({ body: {} }));

      const error = errorOf(await executeTool(client, tool, {}, options));

      expect(error).toEqual({
        kind: 'bad_request',
        message: `Missing required parameter '${first}'`,
        details: { parameter: first },
      });
      expect(requests).toHaveLength(0);
    }
  );

  it('rejects a value outside the accepted list', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(await executeTool(client, 'get_cdash_model_domain_info', { version: '1-3', domain: 'XX' }, options));

    expect(error).toEqual({
      kind: 'bad_request',
      message: 'Invalid domain \'XX\'. Valid values: AE, CO, DM, DS, MH, MS',
      details: { parameter: 'domain', accepted: ['AE', 'CO', 'DM', 'DS', 'MH', 'MS'] },
    });
    expect(requests).toHaveLength(0);
  });

  it('rejects a value that would leave its path segment', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(
      await executeTool(client, 'get_sdtmig_variable_info', { version: '3-4', dataset: 'AE', variable: '../x' }, options)
    );

    expect(error).toEqual({
      kind: 'bad_request',
      message: "Invalid variable '../x': expected to match ^[A-Za-z0-9][A-Za-z0-9._-]*$",
      details: { parameter: 'variable', pattern: '^[A-Za-z0-9][A-Za-z0-9._-]*$' },
    });
    expect(requests).toHaveLength(0);
  });

  it('rejects a malformed CT package name', async () => {
    const { client } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(await executeTool(client, 'get_ct_package_info', { package: 'sdtmct-latest' }, options));

    expect(error.kind).toBe('bad_request');
    expect(error.details.parameter).toBe('package');
  });

  it('rejects non-string parameters', async () => {
    const { client } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(await executeTool(client, 'get_sdtmig_class_info', { version: 3.4 }, options));

    expect(error.message).toBe("Parameter 'version' must be a string, got number");
  });

  it('rejects arguments that are not an object', async () => {
    const { client } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(await executeTool(client, 'get_ct_package_list', ['sdtmct'], options));

    expect(error).toEqual({ kind: 'bad_request', message: 'Tool arguments must be an object' });
  });

  it('rejects an ADaM data structure that the product does not define', async () => {
    const { client, requests } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(
      await executeTool(client, 'get_adam_datastructure_info', { product: 'adamig-1-3', datastructure: 'ADTTE' }, options)
    );

    expect(error).toEqual({
      kind: 'bad_request',
      message: "Invalid datastructure 'ADTTE' for product 'adamig-1-3'. Valid values: ADSL, BDS, TTE",
      details: { parameter: 'datastructure', accepted: ['ADSL', 'BDS', 'TTE'] },
    });
    expect(requests).toHaveLength(0);
  });

  it('rejects a data structure for an ADaM product that has none', async () => {
    const { client } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(
      await executeTool(client, 'get_adam_datastructure_info', { product: 'adam-2-1', datastructure: 'ADSL' }, options)
    );

    expect(error.message).toBe("product 'adam-2-1' has no datastructure values");
  });

  it('rejects a QRS version the instrument does not publish', async () => {
    const { client } = createFakeUpstream(() => ({ body: {} }));

    const error = errorOf(await executeTool(client, 'get_qrs_info', { instrument: 'CGI02', version: '2-0' }, options));

    expect(error.message).toBe("Invalid version '2-0' for instrument 'CGI02'. Valid values: 2-1");
  });

  it('throws MethodNotFound for an unknown tool', async () => {
    const { client } = createFakeUpstream(() => ({ body: {} }));

    const call = executeTool(client, 'get_everything', {}, options);

    await expect(call).rejects.toBeInstanceOf(McpError);
    await expect(call).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
  });
});

describe('executeTool results', () => {
  it('returns not_found for a missing CT term', async () => {
    const { client } = createFakeUpstream(() => ({ status: 404, body: { message: 'Term not found' } }));

    const error = errorOf(
      await executeTool(client, 'get_ct_term_info', { package: 'sdtmct-2024-09-27', codelist: 'C66731', term: 'C99999' }, options)
    );

    expect(error).toEqual({
      kind: 'not_found',
      message: 'CDISC Library returned HTTP 404 for /mdr/ct/packages/sdtmct-2024-09-27/codelists/C66731/terms/C99999',
      status: 404,
      upstreamMessage: 'Term not found',
      details: { path: '/mdr/ct/packages/sdtmct-2024-09-27/codelists/C66731/terms/C99999' },
    });
  });

  it('gives identical output for repeated calls', async () => {
    const { client, requests } = createFakeUpstream(() => ({
      body: { name: 'DM', _links: { self: { href: '/mdr/sdtmig/3-4/datasets/DM' }, parentProduct: { href: '/mdr/sdtmig/3-4' } } },
    }));
    const args = { version: '3-4', dataset: 'DM' };

    const first = textOf(await executeTool(client, 'get_sdtmig_dataset_info', args, options));
    const second = textOf(await executeTool(client, 'get_sdtmig_dataset_info', args, options));

    expect(second).toBe(first);
    expect(JSON.parse(first)).toEqual({ name: 'DM', _links: { self: { href: '/mdr/sdtmig/3-4/datasets/DM' } } });
    expect(requests).toHaveLength(2);
  });

  it('summarizes the product catalog', async () => {
    const { client } = createFakeUpstream(() => ({
      body: {
        _links: {
          self: { href: '/mdr/products' },
          terminology: {
            _links: {
              packages: [{ href: '/mdr/ct/packages', title: 'Terminology', type: 'Terminology' }],
            },
          },
        },
      },
    }));

    const result = await executeTool(client, 'get_cdisc_library_product_list', {}, options);

    expect(JSON.parse(textOf(result))).toEqual({
      products: [
        { group: 'terminology', family: 'packages', name: 'Terminology', href: '/mdr/ct/packages', type: 'Terminology' },
      ],
    });
  });

  it('minimizes a CT package', async () => {
    const { client } = createFakeUpstream(() => ({
      body: {
        name: 'SDTM CT 2024-09-27',
        codelists: [
          { conceptId: 'C66731', submissionValue: 'SEX', name: 'Sex', terms: [{ conceptId: 'C20197', submissionValue: 'M' }] },
        ],
      },
    }));

    const result = await executeTool(client, 'get_ct_package_info', { package: 'sdtmct-2024-09-27' }, options);

    expect(JSON.parse(textOf(result))).toEqual({
      name: 'SDTM CT 2024-09-27',
      codelists: [{ conceptId: 'C66731', submissionValue: 'SEX', terms: [{ conceptId: 'C20197', submissionValue: 'M' }] }],
    });
  });

  it('truncates output beyond the configured size', async () => {
    const { client } = createFakeUpstream(() => ({ body: { items: 'x'.repeat(200) } }));

    const text = textOf(await executeTool(client, 'get_ct_package_list', {}, { maxResponseChars: 50 }));

    const full = JSON.stringify({ items: 'x'.repeat(200) }, null, 2);
    expect(text).toBe(`${full.slice(0, 50)}\n... [Truncated: 50 of ${full.length} characters shown]`);
  });
});
