/**
 * @fileoverview Incremental splitting of process output into items.
 *
 * Decoding goes through a StringDecoder so multi-byte UTF-8 sequences split
 * across chunks are reassembled before splitting.
 *
 * @module process/outputSplitter
 */

import { StringDecoder } from 'string_decoder';
import type { CaptureMode } from './types';

const LINE_BREAK = /[\r\n]/;
const RECORD_SEPARATOR = '\0';

/**
 * Splits one stream's chunks into lines, NUL records, or a single blob.
 */
export class OutputSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';
  private ended = false;

  constructor(
    private readonly mode: CaptureMode,
    private readonly emit: (item: string) => void,
  ) {}

  /**
   * Feed a chunk. Complete items are emitted immediately.
   */
  push(chunk: Buffer | string): void {
    if (this.ended) {
      return;
    }
    this.pending += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    if (this.mode !== 'whole') {
      this.drain();
    }
  }

  /**
   * Flush the trailing partial item. Further pushes are ignored.
   */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.pending += this.decoder.end();
    const rest = this.pending;
    this.pending = '';
    if (this.mode === 'whole') {
      if (rest.length > 0) {
        this.emit(rest);
      }
      return;
    }
    this.emitAll(this.mode === 'records' ? rest.split(RECORD_SEPARATOR) : rest.split(LINE_BREAK));
  }

  private drain(): void {
    const cut = this.mode === 'records'
      ? this.pending.lastIndexOf(RECORD_SEPARATOR)
      : Math.max(this.pending.lastIndexOf('\n'), this.pending.lastIndexOf('\r'));
    if (cut < 0) {
      return;
    }
    const complete = this.pending.slice(0, cut);
    this.pending = this.pending.slice(cut + 1);
    this.emitAll(this.mode === 'records' ? complete.split(RECORD_SEPARATOR) : complete.split(LINE_BREAK));
  }

  private emitAll(items: string[]): void {
    for (const item of items) {
      if (item.length > 0) {
        this.emit(item);
      }
    }
  }
}
