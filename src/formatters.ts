import { JsonObject, JsonValue, isJsonObject } from './json.js';

export type Formatter = (data: JsonValue) => JsonValue;

/** `_links` entries that point back up or sideways in the hierarchy */
export const NAVIGATION_LINKS: ReadonlySet<string> = new Set([
  'parentProduct',
  'parentStandard',
  'parentClass',
  'parentDataset',
  'parentDomain',
  'parentScenario',
  'parentDataStructure',
  'parentVariableSet',
  'priorVersion',
  'rootItem',
]);

/**
 * Deep copy with a per-object rewrite applied bottom-up. `parentKey` is the key
 * under which the object sits; array elements inherit the array's key.
 */
function rewrite(
  value: JsonValue,
  visit: (obj: JsonObject, parentKey: string | undefined) => JsonObject,
  parentKey?: string
): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => rewrite(item, visit, parentKey));
  }
  if (isJsonObject(value)) {
    const copy: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      copy[key] = rewrite(child, visit, key);
    }
    return visit(copy, parentKey);
  }
  return value;
}

export const stripNavigationLinks: Formatter = (data) =>
  rewrite(data, (obj, parentKey) => {
    if (parentKey !== '_links') {
      return obj;
    }
    const kept: JsonObject = {};
    for (const [key, link] of Object.entries(obj)) {
      if (!NAVIGATION_LINKS.has(key)) {
        kept[key] = link;
      }
    }
    return kept;
  });

/**
 * Flattens the grouped product catalog (`_links.<group>._links.<family>[]`)
 * into one list of descriptors.
 */
export const summarizeProducts: Formatter = (data) => {
  const products: JsonObject[] = [];
  const groups = isJsonObject(data) ? data._links : undefined;

  if (isJsonObject(groups)) {
    for (const [group, groupValue] of Object.entries(groups)) {
      if (group === 'self' || !isJsonObject(groupValue) || !isJsonObject(groupValue._links)) {
        continue;
      }
      for (const [family, links] of Object.entries(groupValue._links)) {
        if (family === 'self' || !Array.isArray(links)) {
          continue;
        }
        for (const link of links) {
          if (!isJsonObject(link) || typeof link.href !== 'string' || typeof link.title !== 'string') {
            continue;
          }
          const descriptor: JsonObject = { group, family, name: link.title, href: link.href };
          if (typeof link.type === 'string') {
            descriptor.type = link.type;
          }
          products.push(descriptor);
        }
      }
    }
  }

  return { products };
};

/** ADaM product view: structure only, variables are fetched per data structure */
export const collapseAnalysisVariables: Formatter = (data) =>
  rewrite(stripNavigationLinks(data), (obj) =>
    Array.isArray(obj.analysisVariables) ? { ...obj, analysisVariables: [] } : obj
  );

/** ADaM data structure view: each analysis variable keeps only its `self` link */
export const trimAnalysisVariableLinks: Formatter = (data) =>
  rewrite(stripNavigationLinks(data), (obj, parentKey) => {
    if (parentKey !== 'analysisVariables' || !isJsonObject(obj._links)) {
      return obj;
    }
    const self = obj._links.self;
    const links: JsonObject = self === undefined ? {} : { self };
    return { ...obj, _links: links };
  });

function pickStrings(source: JsonObject, keys: readonly string[]): JsonObject {
  const picked: JsonObject = {};
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') {
      picked[key] = value;
    }
  }
  return picked;
}

const CONCEPT_FIELDS = ['conceptId', 'submissionValue'] as const;

/** CT package view: codelists and their terms reduced to concept id and submission value */
export const minimizeCtPackage: Formatter = (data) => {
  if (!isJsonObject(data)) {
    return { codelists: [] };
  }
  const codelists: JsonValue[] = Array.isArray(data.codelists) ? data.codelists : [];

  return {
    ...pickStrings(data, ['name', 'label', 'version', 'effectiveDate']),
    codelists: codelists.filter(isJsonObject).map((codelist) => {
      const terms: JsonValue[] = Array.isArray(codelist.terms) ? codelist.terms : [];
      return {
        ...pickStrings(codelist, CONCEPT_FIELDS),
        terms: terms.filter(isJsonObject).map((term) => pickStrings(term, CONCEPT_FIELDS)),
      };
    }),
  };
};

/** Serializes a formatted payload, cutting it to `maxChars` characters */
export function renderPayload(value: JsonValue, maxChars: number): string {
  const text = JSON.stringify(value, null, 2);
  if (text.length <= maxChars) {
    return text;
  }
  // Never end on the first half of a surrogate pair
  const high = text.charCodeAt(maxChars - 1);
  const cut = high >= 0xd800 && high <= 0xdbff ? maxChars - 1 : maxChars;
  return `${text.slice(0, cut)}\n... [Truncated: ${cut} of ${text.length} characters shown]`;
}
