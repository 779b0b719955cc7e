/**
 * Mantra Miner Types
 *
 * A recitation is a preparation, one or more mantras, and a conclusion,
 * flattened into a sequence of text units that the miner appends to a
 * buffer one tick at a time.
 */

export type TextUnit = string;

export type Sequence = readonly TextUnit[];

export type WorkerState = 'idle' | 'running' | 'paused' | 'stopped';

export type Mantra =
  | { syllables: string[]; repeats?: number }
  | { text: string; repeats?: number };

export interface SequenceInput {
  preparation?: string;
  mantras: Mantra[];
  conclusion?: string;
}

export interface MinerLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
}

export interface MantraMinerDeps {
  logger: MinerLogger;
}
