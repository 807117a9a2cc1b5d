import { RequestDescriptor, buildPath } from '../client.js';
import { ToolError, toolError } from '../errors.js';
import {
  Formatter,
  collapseAnalysisVariables,
  minimizeCtPackage,
  stripNavigationLinks,
  summarizeProducts,
  trimAnalysisVariableLinks,
} from '../formatters.js';
import { ListMap, listFor, vocabulary } from './vocabulary.js';

/** Accepted by every free-form value; keeps a value inside its own path segment */
export const SEGMENT_PATTERN = '^[A-Za-z0-9][A-Za-z0-9._-]*$';
export const VERSION_PATTERN = '^[a-z0-9]+(-[a-z0-9]+)*$';
export const CT_PACKAGE_PATTERN = '^[a-z][a-z-]*ct-\\d{4}-\\d{2}-\\d{2}$';
export const CONCEPT_CODE_PATTERN = '^C\\d+$';
/** Scenario ids may contain spaces; still one segment */
export const SCENARIO_PATTERN = '^[A-Za-z0-9][^/\\\\?#]*$';

export interface ToolParameter {
  name: string;
  description: string;
  required?: boolean;
  enum?: readonly string[];
  pattern?: string;
}

/** Validated, trimmed arguments. Optional parameters that were not given are absent. */
export type ToolArgs = Readonly<Record<string, string | undefined>>;

export interface ToolSpec {
  name: string;
  description: string;
  parameters: readonly ToolParameter[];
  /** Cross-parameter rules that a per-parameter schema cannot express */
  check?: (args: ToolArgs) => ToolError | undefined;
  route: (args: ToolArgs) => RequestDescriptor;
  format: Formatter;
}

function pathFrom(template: string, args: ToolArgs): string {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (value !== undefined) {
      params[key] = value;
    }
  }
  return buildPath(template, params);
}

function versionParameter(standard: string, label: string): ToolParameter {
  const known = listFor(vocabulary.versions, standard);
  return {
    name: 'version',
    description: `${label} version, hyphen separated (e.g. ${known.map((v) => `"${v}"`).join(', ')})`,
    required: true,
    pattern: VERSION_PATTERN,
  };
}

interface LevelToolOptions {
  name: string;
  description: string;
  standard: string;
  label: string;
  /** Listing path, used when the optional child parameter is omitted */
  listPath: string;
  child: {
    name: string;
    description: string;
    values?: readonly string[];
    pattern?: string;
    path: string;
    query?: RequestDescriptor['query'];
  };
}

/** A "list everything, or fetch one" tool over one level of a standard's hierarchy */
function levelTool(options: LevelToolOptions): ToolSpec {
  const { child } = options;
  return {
    name: options.name,
    description: options.description,
    parameters: [
      versionParameter(options.standard, options.label),
      {
        name: child.name,
        description: `${child.description} If omitted, the full list for the version is returned.`,
        enum: child.values,
        pattern: child.pattern,
      },
    ],
    route: (args) =>
      args[child.name] === undefined
        ? { path: pathFrom(options.listPath, args) }
        : { path: pathFrom(child.path, args), query: child.query },
    format: stripNavigationLinks,
  };
}

function combinationCheck(
  table: ListMap,
  outer: string,
  inner: string
): (args: ToolArgs) => ToolError | undefined {
  return (args) => {
    const outerValue = args[outer] ?? '';
    const accepted: readonly string[] = table[outerValue] ?? [];
    const innerValue = args[inner] ?? '';
    if (accepted.includes(innerValue)) {
      return undefined;
    }
    return toolError(
      'bad_request',
      accepted.length === 0
        ? `${outer} '${outerValue}' has no ${inner} values`
        : `Invalid ${inner} '${innerValue}' for ${outer} '${outerValue}'. Valid values: ${accepted.join(', ')}`,
      { details: { parameter: inner, accepted } }
    );
  };
}

const classes = (standard: string) => listFor(vocabulary.classes, standard);

export const TOOL_SPECS: readonly ToolSpec[] = [
  {
    name: 'get_cdisc_library_product_list',
    description:
      'List every CDISC Library product (SDTM, SDTMIG, SENDIG, CDASH, CDASHIG, ADaM, QRS, CT packages) with its ' +
      'name and reference href. Use this to discover which standards and versions are available.',
    parameters: [],
    route: () => ({ path: '/mdr/products', query: { expand: false } }),
    format: summarizeProducts,
  },

  levelTool({
    name: 'get_sdtmig_class_info',
    description:
      'List the SDTM Implementation Guide (SDTMIG) observation classes of a version, or the datasets within one ' +
      'class. Does not return variables; use get_sdtmig_dataset_info for those.',
    standard: 'sdtmig',
    label: 'SDTMIG',
    listPath: '/mdr/sdtmig/{version}/classes',
    child: {
      name: 'className',
      description: 'SDTMIG class name (e.g. "Interventions").',
      values: classes('sdtmig'),
      path: '/mdr/sdtmig/{version}/classes/{className}/datasets',
      query: { expand: false },
    },
  }),
  levelTool({
    name: 'get_sdtmig_dataset_info',
    description:
      'Get the variables and structure of an SDTMIG dataset (domain), e.g. "Show me the variables in AE", or list ' +
      'all datasets of a version.',
    standard: 'sdtmig',
    label: 'SDTMIG',
    listPath: '/mdr/sdtmig/{version}/datasets',
    child: {
      name: 'dataset',
      description: 'Two-character SDTMIG domain code (e.g. "DM").',
      values: listFor(vocabulary.datasets, 'sdtmig'),
      path: '/mdr/sdtmig/{version}/datasets/{dataset}',
    },
  }),
  {
    name: 'get_sdtmig_variable_info',
    description: 'Get the full metadata of one SDTMIG dataset variable (e.g. AETERM in AE).',
    parameters: [
      versionParameter('sdtmig', 'SDTMIG'),
      {
        name: 'dataset',
        description: 'Two-character SDTMIG domain code (e.g. "AE").',
        required: true,
        enum: listFor(vocabulary.datasets, 'sdtmig'),
      },
      { name: 'variable', description: 'Variable name (e.g. "AETERM").', required: true },
    ],
    route: (args) => ({ path: pathFrom('/mdr/sdtmig/{version}/datasets/{dataset}/variables/{variable}', args) }),
    format: stripNavigationLinks,
  },

  levelTool({
    name: 'get_sdtm_model_class_info',
    description: 'List the Study Data Tabulation Model (SDTM) classes of a version, or get one class definition.',
    standard: 'sdtm',
    label: 'SDTM',
    listPath: '/mdr/sdtm/{version}/classes',
    child: {
      name: 'className',
      description: 'SDTM class name (e.g. "Findings").',
      values: classes('sdtm'),
      path: '/mdr/sdtm/{version}/classes/{className}',
    },
  }),
  levelTool({
    name: 'get_sdtm_model_dataset_info',
    description:
      'Get an SDTM model dataset definition (e.g. "What is the structure of RELREC?"), or list all datasets of a version.',
    standard: 'sdtm',
    label: 'SDTM',
    listPath: '/mdr/sdtm/{version}/datasets',
    child: {
      name: 'dataset',
      description: 'SDTM dataset name (e.g. "SUPPQUAL").',
      values: listFor(vocabulary.datasets, 'sdtm'),
      path: '/mdr/sdtm/{version}/datasets/{dataset}',
    },
  }),

  levelTool({
    name: 'get_sendig_class_info',
    description: 'List the SEND Implementation Guide (SENDIG) classes of a version, or get one class definition.',
    standard: 'sendig',
    label: 'SENDIG',
    listPath: '/mdr/sendig/{version}/classes',
    child: {
      name: 'className',
      description: 'SENDIG class name (e.g. "Findings").',
      values: classes('sendig'),
      path: '/mdr/sendig/{version}/classes/{className}',
    },
  }),
  levelTool({
    name: 'get_sendig_dataset_info',
    description: 'Get a SENDIG dataset (domain) definition with its variables, or list all datasets of a version.',
    standard: 'sendig',
    label: 'SENDIG',
    listPath: '/mdr/sendig/{version}/datasets',
    child: {
      name: 'dataset',
      description: 'SENDIG domain code (e.g. "LB").',
      values: listFor(vocabulary.datasets, 'sendig'),
      path: '/mdr/sendig/{version}/datasets/{dataset}',
    },
  }),

  levelTool({
    name: 'get_cdashig_class_info',
    description:
      'List the CDASH Implementation Guide (CDASHIG) classes of a version, or the domains within one class.',
    standard: 'cdashig',
    label: 'CDASHIG',
    listPath: '/mdr/cdashig/{version}/classes',
    child: {
      name: 'className',
      description: 'CDASHIG class name (e.g. "Events").',
      values: classes('cdashig'),
      path: '/mdr/cdashig/{version}/classes/{className}/domains',
    },
  }),
  levelTool({
    name: 'get_cdashig_domain_info',
    description: 'Get a CDASHIG domain definition with its fields, or list all domains of a version.',
    standard: 'cdashig',
    label: 'CDASHIG',
    listPath: '/mdr/cdashig/{version}/domains',
    child: {
      name: 'domain',
      description: 'CDASHIG domain code (e.g. "AE").',
      values: listFor(vocabulary.domains, 'cdashig'),
      path: '/mdr/cdashig/{version}/domains/{domain}',
    },
  }),
  levelTool({
    name: 'get_cdashig_scenario_info',
    description: 'Get a CDASHIG implementation scenario (e.g. "DS", "SAE"), or list all scenarios of a version.',
    standard: 'cdashig',
    label: 'CDASHIG',
    listPath: '/mdr/cdashig/{version}/scenarios',
    child: {
      name: 'scenario',
      description: 'Scenario identifier as returned by the scenario listing.',
      pattern: SCENARIO_PATTERN,
      path: '/mdr/cdashig/{version}/scenarios/{scenario}',
    },
  }),
  levelTool({
    name: 'get_cdash_model_class_info',
    description: 'List the CDASH Model classes of a version, or get one class definition.',
    standard: 'cdash',
    label: 'CDASH Model',
    listPath: '/mdr/cdash/{version}/classes',
    child: {
      name: 'className',
      description: 'CDASH Model class name (e.g. "Identifiers").',
      values: classes('cdash'),
      path: '/mdr/cdash/{version}/classes/{className}',
    },
  }),
  levelTool({
    name: 'get_cdash_model_domain_info',
    description: 'Get a CDASH Model domain definition, or list all domains of a version.',
    standard: 'cdash',
    label: 'CDASH Model',
    listPath: '/mdr/cdash/{version}/domains',
    child: {
      name: 'domain',
      description: 'CDASH Model domain code (e.g. "DM").',
      values: listFor(vocabulary.domains, 'cdash'),
      path: '/mdr/cdash/{version}/domains/{domain}',
    },
  }),

  {
    name: 'get_adam_product_info',
    description:
      'Get an ADaM product (model or implementation guide) with its data structures and variable sets. Variable ' +
      'lists are left empty here; use get_adam_datastructure_info for the variables of one data structure.',
    parameters: [
      {
        name: 'product',
        description: 'ADaM product identifier (e.g. "adamig-1-3", "adam-occds-1-1").',
        required: true,
        enum: Object.keys(vocabulary.adam),
      },
    ],
    route: (args) => ({ path: pathFrom('/mdr/adam/{product}', args) }),
    format: collapseAnalysisVariables,
  },
  {
    name: 'get_adam_datastructure_info',
    description:
      'Get one ADaM data structure with its analysis variables. Valid combinations: ' +
      Object.entries(vocabulary.adam)
        .filter(([, structures]) => structures.length > 0)
        .map(([product, structures]) => `${product} (${structures.join(', ')})`)
        .join('; '),
    parameters: [
      {
        name: 'product',
        description: 'ADaM product identifier (e.g. "adamig-1-3").',
        required: true,
        enum: Object.keys(vocabulary.adam),
      },
      { name: 'datastructure', description: 'Data structure name (e.g. "ADSL", "BDS").', required: true },
    ],
    check: combinationCheck(vocabulary.adam, 'product', 'datastructure'),
    route: (args) => ({ path: pathFrom('/mdr/adam/{product}/datastructures/{datastructure}', args) }),
    format: trimAnalysisVariableLinks,
  },

  {
    name: 'get_qrs_info',
    description:
      'Get a Questionnaires, Ratings and Scales (QRS) instrument version with its items. Valid combinations: ' +
      Object.entries(vocabulary.qrs)
        .map(([instrument, versions]) => `${instrument} (${versions.join(', ')})`)
        .join('; '),
    parameters: [
      {
        name: 'instrument',
        description: 'QRS instrument short name (e.g. "AIMS01").',
        required: true,
        enum: Object.keys(vocabulary.qrs),
      },
      { name: 'version', description: 'Instrument version (e.g. "2-0").', required: true, pattern: VERSION_PATTERN },
    ],
    check: combinationCheck(vocabulary.qrs, 'instrument', 'version'),
    route: (args) => ({ path: pathFrom('/mdr/qrs/instruments/{instrument}/versions/{version}', args) }),
    format: stripNavigationLinks,
  },

  {
    name: 'get_ct_package_list',
    description: 'List all published Controlled Terminology (CT) packages, e.g. "sdtmct-2025-09-26".',
    parameters: [],
    route: () => ({ path: '/mdr/ct/packages' }),
    format: stripNavigationLinks,
  },
  {
    name: 'get_ct_package_info',
    description:
      'Get the codelists of a Controlled Terminology package, each reduced to concept id and submission value ' +
      'together with its terms. Package families: adamct, cdashct, coact, ddfct, define-xmlct, glossaryct, mrctct, ' +
      'protocolct, qrsct, qs-ftct, sdtmct, sendct, tmfct.',
    parameters: [
      {
        name: 'package',
        description: 'CT package name: family plus effective date (e.g. "sdtmct-2024-09-27").',
        required: true,
        pattern: CT_PACKAGE_PATTERN,
      },
    ],
    route: (args) => ({ path: pathFrom('/mdr/ct/packages/{package}', args) }),
    format: minimizeCtPackage,
  },
  {
    name: 'get_ct_codelist_info',
    description: 'Get one codelist of a Controlled Terminology package with its definition, synonyms and terms.',
    parameters: [
      {
        name: 'package',
        description: 'CT package name (e.g. "sdtmct-2024-09-27").',
        required: true,
        pattern: CT_PACKAGE_PATTERN,
      },
      {
        name: 'codelist',
        description: 'Codelist NCI concept code (e.g. "C66731").',
        required: true,
        pattern: CONCEPT_CODE_PATTERN,
      },
    ],
    route: (args) => ({ path: pathFrom('/mdr/ct/packages/{package}/codelists/{codelist}', args) }),
    format: stripNavigationLinks,
  },
  {
    name: 'get_ct_term_info',
    description: 'Get one term of a Controlled Terminology codelist. Returns not_found when the term does not exist.',
    parameters: [
      {
        name: 'package',
        description: 'CT package name (e.g. "sdtmct-2024-09-27").',
        required: true,
        pattern: CT_PACKAGE_PATTERN,
      },
      {
        name: 'codelist',
        description: 'Codelist NCI concept code (e.g. "C66731").',
        required: true,
        pattern: CONCEPT_CODE_PATTERN,
      },
      {
        name: 'term',
        description: 'Term NCI concept code (e.g. "C20197").',
        required: true,
        pattern: CONCEPT_CODE_PATTERN,
      },
    ],
    route: (args) => ({ path: pathFrom('/mdr/ct/packages/{package}/codelists/{codelist}/terms/{term}', args) }),
    format: stripNavigationLinks,
  },
];

export function findTool(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find((spec) => spec.name === name);
}

/** JSON Schema advertised for a tool in tools/list */
export function inputSchemaFor(spec: ToolSpec) {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const param of spec.parameters) {
    properties[param.name] = {
      type: 'string',
      description: param.description,
      ...(param.enum ? { enum: [...param.enum] } : { pattern: param.pattern ?? SEGMENT_PATTERN }),
    };
  }
  const required = spec.parameters.filter((param) => param.required).map((param) => param.name);
  return {
    type: 'object' as const,
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}
