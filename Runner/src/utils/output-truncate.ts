/**
 * Bounded capture of a child's output stream.
 *
 * Text is held in full until it passes `maxChars`. From then on only the
 * first `head` characters and a rolling window of the last `tail` characters
 * are retained, and everything between is counted, so memory stays bounded
 * however much the program prints. The tail matters most: Python writes the
 * exception line last.
 */

import { StringDecoder } from 'node:string_decoder';

export interface TruncateConfig {
  maxChars: number;
  head: number;
  tail: number;
}

export interface TruncateResult {
  text: string;
  truncated: boolean;
}

export function truncationMarker(droppedChars: number): string {
  return `\n\n[... truncated ${droppedChars} characters ...]\n\n`;
}

export class OutputCapture {
  private readonly decoder = new StringDecoder('utf8');
  private full = '';
  private head = '';
  private tail = '';
  private totalChars = 0;
  private overflowed = false;

  constructor(private readonly limits: TruncateConfig) {}

  /** Append a raw chunk; multi-byte characters split across chunks are reassembled. */
  write(chunk: Buffer | string): void {
    this.append(typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
  }

  /** Characters seen so far, retained or not */
  get seenChars(): number {
    return this.totalChars;
  }

  /** Characters currently held in memory */
  get retainedChars(): number {
    return this.full.length + this.head.length + this.tail.length;
  }

  get droppedChars(): number {
    return this.overflowed ? this.totalChars - this.head.length - this.tail.length : 0;
  }

  finish(): TruncateResult {
    this.append(this.decoder.end());
    if (!this.overflowed) {
      return { text: this.full, truncated: false };
    }
    return { text: this.head + truncationMarker(this.droppedChars) + this.tail, truncated: true };
  }

  private append(text: string): void {
    if (text.length === 0) return;
    this.totalChars += text.length;

    if (this.overflowed) {
      this.tail = (this.tail + text).slice(-this.limits.tail);
      return;
    }

    this.full += text;
    if (this.totalChars > this.limits.maxChars) {
      this.overflowed = true;
      this.head = this.full.slice(0, this.limits.head);
      this.tail = this.full.slice(-this.limits.tail);
      this.full = '';
    }
  }
}

/**
 * Truncate text that is already in memory.
 */
export function truncateOutput(output: string, config: TruncateConfig): TruncateResult {
  const capture = new OutputCapture(config);
  capture.write(output);
  return capture.finish();
}
