import { DEFAULT_SEPARATOR } from '../schemas/miner.schema.js';
import type { TextUnit } from '../types/miner.js';

/**
 * Append-only text store shared between the miner (sole writer) and any
 * number of readers. Appends land whole, so a snapshot always ends on a
 * unit boundary.
 */
export class RecitationBuffer {
  private readonly appended: TextUnit[] = [];
  private text = '';

  constructor(private readonly separator: string = DEFAULT_SEPARATOR) {}

  get size(): number {
    return this.appended.length;
  }

  append(unit: TextUnit): void {
    this.text = this.appended.length === 0 ? unit : `${this.text}${this.separator}${unit}`;
    this.appended.push(unit);
  }

  snapshot(): string {
    return this.text;
  }

  units(): readonly TextUnit[] {
    return Object.freeze([...this.appended]);
  }

  /** Clears the contents. Meant for the host between sessions. */
  reset(): void {
    this.appended.length = 0;
    this.text = '';
  }
}
