import { debug, info } from 'firebase-functions/logger';

import { minerOptionsSchema, type MinerOptions } from '../schemas/miner.schema.js';
import { AlreadyStartedError, ConfigurationError, InvalidTransitionError } from '../types/errors.js';
import type { MantraMinerDeps, Sequence, WorkerState } from '../types/miner.js';
import { RecitationBuffer } from './recitation-buffer.service.js';
import { buildSequence } from './sequence.service.js';

/**
 * Recites a sequence into a buffer, one unit per tick.
 *
 * Each tick is a timer callback on the event loop, so an append always runs
 * to completion before any reader sees the buffer. `stop()` cancels the
 * pending timer and returns immediately; no append happens after it.
 */
export class MantraMiner {
  readonly sequence: Sequence;
  readonly buffer: RecitationBuffer;
  private currentState: WorkerState = 'idle';
  private position = 0;
  private completedPasses = 0;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private stopListeners: Array<() => void> = [];

  constructor(
    private readonly config: MinerOptions,
    private readonly deps: MantraMinerDeps = { logger: { debug, info } },
  ) {
    this.sequence = buildSequence(config);
    this.buffer = new RecitationBuffer(config.separator);
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /** Index of the next unit to recite. */
  get cursor(): number {
    return this.position;
  }

  /** Number of complete passes through the sequence. */
  count(): number {
    return this.completedPasses;
  }

  isRunning(): boolean {
    return this.currentState === 'running';
  }

  options(): MinerOptions {
    return structuredClone(this.config);
  }

  start(): void {
    if (this.currentState === 'running' || this.currentState === 'paused') {
      throw new AlreadyStartedError(this.currentState);
    }
    if (this.currentState === 'stopped') {
      throw new InvalidTransitionError('start', this.currentState);
    }

    this.currentState = 'running';
    this.deps.logger.info('miner started', {
      units: this.sequence.length,
      rateMs: this.config.rateMs,
      repeat: this.config.repeat,
    });
    this.scheduleTick();
  }

  pause(): void {
    if (this.currentState === 'paused') return;
    if (this.currentState !== 'running') {
      throw new InvalidTransitionError('pause', this.currentState);
    }

    this.clearTimer();
    this.currentState = 'paused';
    this.deps.logger.info('miner paused', this.progress());
  }

  resume(): void {
    if (this.currentState !== 'paused') {
      throw new InvalidTransitionError('resume', this.currentState);
    }

    this.currentState = 'running';
    this.deps.logger.info('miner resumed', this.progress());
    this.scheduleTick();
  }

  stop(): void {
    if (this.currentState === 'stopped') return;
    this.clearTimer();
    this.finish('miner stopped');
  }

  /** Resolves once the miner is stopped, by `stop()` or by running out of passes. */
  whenStopped(): Promise<void> {
    if (this.currentState === 'stopped') {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.stopListeners.push(resolve);
    });
  }

  private tick(): void {
    this.timer = undefined;
    if (this.currentState !== 'running') return;

    const unit = this.sequence[this.position];
    if (unit !== undefined) {
      this.buffer.append(unit);
      this.position++;
    }

    if (this.position < this.sequence.length) {
      this.scheduleTick();
      return;
    }

    this.completedPasses++;
    this.deps.logger.debug('pass completed', this.progress());

    if (this.shouldRepeat()) {
      this.position = 0;
      this.scheduleTick();
      return;
    }

    this.finish('miner completed');
  }

  private shouldRepeat(): boolean {
    const { repeat } = this.config;
    if (typeof repeat === 'boolean') return repeat;
    return this.completedPasses < repeat;
  }

  private scheduleTick(): void {
    this.timer = setTimeout(() => this.tick(), this.config.rateMs);
  }

  private clearTimer(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private finish(message: string): void {
    this.currentState = 'stopped';
    this.deps.logger.info(message, this.progress());

    const listeners = this.stopListeners;
    this.stopListeners = [];
    for (const resolve of listeners) {
      resolve();
    }
  }

  private progress(): { cursor: number; count: number } {
    return { cursor: this.position, count: this.completedPasses };
  }
}

export interface MantraMinerHandles {
  miner: MantraMiner;
  buffer: RecitationBuffer;
}

/**
 * Validates raw options and returns a miner along with the buffer it writes to.
 *
 * @throws ConfigurationError when the options fail validation or the mantra is empty
 */
export function createMantraMiner(input: unknown, deps?: MantraMinerDeps): MantraMinerHandles {
  const parsed = minerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid miner options', parsed.error.errors);
  }

  const miner = new MantraMiner(parsed.data, deps);
  return { miner, buffer: miner.buffer };
}
