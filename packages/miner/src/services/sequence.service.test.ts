import { describe, expect, it } from 'vitest';
import { MAX_MANTRA_REPEATS } from '../schemas/miner.schema.js';
import { ConfigurationError } from '../types/errors.js';
import { buildSequence, tokenize } from './sequence.service.js';

describe('tokenize', () => {
  it('splits on runs of whitespace and drops empty pieces', () => {
    expect(tokenize('  om   mani\tpadme\nhum ')).toEqual(['om', 'mani', 'padme', 'hum']);
  });

  it('keeps diacritics inside words', () => {
    expect(tokenize('Nam mô A Di Đà Phật')).toEqual(['Nam', 'mô', 'A', 'Di', 'Đà', 'Phật']);
  });

  it('returns no units for blank text', () => {
    expect(tokenize('   ')).toEqual([]);
  });
});

describe('buildSequence', () => {
  it('builds units from mantra text', () => {
    const sequence = buildSequence({ mantras: [{ text: 'om mani padme hum' }] });

    expect(sequence).toEqual(['om', 'mani', 'padme', 'hum']);
    expect(Object.isFrozen(sequence)).toBe(true);
  });

  it('wraps repeated mantras with preparation and conclusion', () => {
    const sequence = buildSequence({
      preparation: 'take refuge',
      mantras: [{ syllables: ['om', ' ah ', '', 'hum'], repeats: 2 }, { text: 'gate gate' }],
      conclusion: 'dedicate merit',
    });

    expect(sequence).toEqual([
      'take', 'refuge',
      'om', 'ah', 'hum',
      'om', 'ah', 'hum',
      'gate', 'gate',
      'dedicate', 'merit',
    ]);
  });

  it('rejects empty mantra text', () => {
    expect(() => buildSequence({ mantras: [{ text: '' }] })).toThrow(ConfigurationError);
    expect(() => buildSequence({ mantras: [{ text: ' \n ' }] })).toThrow('Mantra text must not be empty');
  });

  it('rejects an empty syllable list', () => {
    expect(() => buildSequence({ mantras: [{ syllables: [] }] })).toThrow(ConfigurationError);
  });

  it('rejects an empty mantra list', () => {
    expect(() => buildSequence({ mantras: [] })).toThrow('At least one mantra is required');
  });

  it('rejects non-positive repeats with the offending index', () => {
    try {
      buildSequence({ mantras: [{ text: 'om' }, { text: 'hum', repeats: 0 }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.details).toEqual({ index: 1, repeats: 0 });
      }
    }
  });

  it('rejects repeats above the cap', () => {
    expect(() => buildSequence({ mantras: [{ text: 'om', repeats: MAX_MANTRA_REPEATS + 1 }] }))
      .toThrow(`Mantra repeats must be an integer from 1 to ${MAX_MANTRA_REPEATS}`);
  });
});
