export { MantraMiner, createMantraMiner } from './services/mantra-miner.service.js';
export type { MantraMinerHandles } from './services/mantra-miner.service.js';
export { RecitationBuffer } from './services/recitation-buffer.service.js';
export { buildSequence, tokenize } from './services/sequence.service.js';
export {
  DEFAULT_RATE_MS,
  DEFAULT_SEPARATOR,
  mantraSchema,
  minerOptionsSchema,
} from './schemas/miner.schema.js';
export type { MantraDTO, MinerOptions, MinerOptionsInput } from './schemas/miner.schema.js';
export {
  MinerError,
  ConfigurationError,
  AlreadyStartedError,
  InvalidTransitionError,
} from './types/errors.js';
export type {
  Mantra,
  MantraMinerDeps,
  MinerLogger,
  Sequence,
  SequenceInput,
  TextUnit,
  WorkerState,
} from './types/miner.js';
