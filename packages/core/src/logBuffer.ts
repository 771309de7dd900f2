/**
 * Fixed-capacity ring of the most recent output lines
 */

import { InvalidStateError } from './errors.js';

export class LogBuffer {
  private readonly slots: string[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new InvalidStateError(`LogBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<string>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append a line, evicting the oldest once full
   */
  push(line: string): void {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = line;
      this.count += 1;
      return;
    }
    this.slots[this.start] = line;
    this.start = (this.start + 1) % this.capacity;
  }

  /**
   * Retained lines, oldest first
   */
  toArray(): string[] {
    const lines: string[] = [];
    for (let i = 0; i < this.count; i++) {
      const line = this.slots[(this.start + i) % this.capacity];
      if (line !== undefined) lines.push(line);
    }
    return lines;
  }
}
