import { MAX_MANTRA_REPEATS } from '../schemas/miner.schema.js';
import { ConfigurationError } from '../types/errors.js';
import type { Mantra, Sequence, SequenceInput, TextUnit } from '../types/miner.js';

/**
 * Splits text into whitespace-delimited words. No syllabification is
 * attempted, so diacritics and non-Latin scripts pass through as-is.
 */
export function tokenize(text: string): TextUnit[] {
  return text.split(/\s+/).filter((unit) => unit !== '');
}

function mantraUnits(mantra: Mantra): TextUnit[] {
  if ('syllables' in mantra) {
    return mantra.syllables.map((syllable) => syllable.trim()).filter((syllable) => syllable !== '');
  }
  return tokenize(mantra.text);
}

/**
 * Flattens preparation, mantras (each repeated `repeats` times) and
 * conclusion into one frozen sequence of text units.
 */
export function buildSequence(input: SequenceInput): Sequence {
  if (input.mantras.length === 0) {
    throw new ConfigurationError('At least one mantra is required');
  }

  const body: TextUnit[] = [];
  input.mantras.forEach((mantra, index) => {
    const repeats = mantra.repeats ?? 1;
    if (!Number.isInteger(repeats) || repeats < 1 || repeats > MAX_MANTRA_REPEATS) {
      throw new ConfigurationError(
        `Mantra repeats must be an integer from 1 to ${MAX_MANTRA_REPEATS}`,
        { index, repeats },
      );
    }

    const units = mantraUnits(mantra);
    if (units.length === 0) {
      throw new ConfigurationError('Mantra text must not be empty', { index });
    }

    for (let i = 0; i < repeats; i++) {
      body.push(...units);
    }
  });

  return Object.freeze([
    ...tokenize(input.preparation ?? ''),
    ...body,
    ...tokenize(input.conclusion ?? ''),
  ]);
}
