import { describe, expect, it } from 'vitest';
import { listFor, parseVocabulary, vocabulary } from './vocabulary.js';

const sections = { versions: {}, classes: {}, datasets: {}, domains: {}, adam: {}, qrs: {} };

describe('vocabulary', () => {
  it('loads the bundled lists', () => {
    expect(listFor(vocabulary.adam, 'adamig-1-3')).toEqual(['ADSL', 'BDS', 'TTE']);
    expect(listFor(vocabulary.qrs, 'HAMA1')).toEqual(['2-1']);
  });

  it('throws for a key that has no list', () => {
    expect(() => listFor(vocabulary.versions, 'sdtmig-ap')).toThrow("vocabulary.json has no entry for 'sdtmig-ap'");
  });

  it('rejects a section that is not an object', () => {
    expect(() => parseVocabulary(JSON.stringify({ ...sections, qrs: [] }))).toThrow(
      "vocabulary.json: 'qrs' must be an object"
    );
  });

  it('rejects lists with non-string entries', () => {
    expect(() => parseVocabulary(JSON.stringify({ ...sections, adam: { 'adamig-1-3': ['ADSL', 3] } }))).toThrow(
      "vocabulary.json: 'adam.adamig-1-3' must be a list of strings"
    );
  });
});
