import { readFileSync } from 'node:fs';
import { JsonObject, isJsonObject, parseJson } from '../json.js';

export type ListMap = Readonly<Record<string, readonly string[]>>;

/** Accepted parameter values, keyed by standard (or by product/instrument for ADaM and QRS) */
export interface Vocabulary {
  versions: ListMap;
  classes: ListMap;
  datasets: ListMap;
  domains: ListMap;
  adam: ListMap;
  qrs: ListMap;
}

const VOCABULARY_URL = new URL('../../data/vocabulary.json', import.meta.url);

function toListMap(source: JsonObject, section: string): ListMap {
  const value = source[section];
  if (!isJsonObject(value)) {
    throw new Error(`vocabulary.json: '${section}' must be an object`);
  }
  const map: Record<string, readonly string[]> = {};
  for (const [key, list] of Object.entries(value)) {
    const items = Array.isArray(list) ? list.filter((item): item is string => typeof item === 'string') : [];
    if (!Array.isArray(list) || items.length !== list.length) {
      throw new Error(`vocabulary.json: '${section}.${key}' must be a list of strings`);
    }
    map[key] = items;
  }
  return map;
}

export function parseVocabulary(text: string): Vocabulary {
  const raw = parseJson(text);
  if (!isJsonObject(raw)) {
    throw new Error('vocabulary.json: top level must be an object');
  }
  return {
    versions: toListMap(raw, 'versions'),
    classes: toListMap(raw, 'classes'),
    datasets: toListMap(raw, 'datasets'),
    domains: toListMap(raw, 'domains'),
    adam: toListMap(raw, 'adam'),
    qrs: toListMap(raw, 'qrs'),
  };
}

export const vocabulary: Vocabulary = parseVocabulary(readFileSync(VOCABULARY_URL, 'utf8'));

export function listFor(map: ListMap, key: string): readonly string[] {
  const list = map[key];
  if (!list) {
    throw new Error(`vocabulary.json has no entry for '${key}'`);
  }
  return list;
}
