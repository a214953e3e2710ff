/**
 * Console display — stands in for the on-screen status line
 */

import type { StatusSink } from '@fieldsign/updater';

export interface ConsoleDisplayOptions {
  /** Tag printed before every line (default: `Display`) */
  tag?: string;
  /** Number of recent messages kept for inspection (default: 50) */
  historySize?: number;
}

export class ConsoleDisplay {
  private readonly tag: string;
  private readonly historySize: number;
  private readonly lines: string[] = [];

  constructor(options?: ConsoleDisplayOptions) {
    this.tag = options?.tag ?? 'Display';
    this.historySize = options?.historySize ?? 50;
  }

  show(message: string): void {
    console.log(`[${this.tag}] ${message}`);
    this.lines.push(message);
    if (this.lines.length > this.historySize) {
      this.lines.splice(0, this.lines.length - this.historySize);
    }
  }

  /** Most recent messages, oldest first */
  get history(): readonly string[] {
    return this.lines;
  }

  /** Bound sink for the update coordinator */
  get sink(): StatusSink {
    return (message) => this.show(message);
  }
}
