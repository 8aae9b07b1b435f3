/**
 * Input Sources
 * Line readers the dispatch loop pulls from, one line per iteration
 */

import type { Readable } from 'stream';

/**
 * Line-readable input. Resolves to null once the input is exhausted.
 */
export interface InputSource {
  readLine(): Promise<string | null>;
}

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

/**
 * Splits a readable byte stream into lines.
 * Lines buffered before a stream error are still delivered; every read after them rejects.
 * A stream closed without an error (destroyed, or a closed pipe) counts as end of input.
 */
export class StreamSource implements InputSource {
  private buffer = '';
  private readonly lines: string[] = [];
  private readonly pending: PendingRead[] = [];
  private ended = false;
  private failure: Error | null = null;

  constructor(private readonly stream: Readable) {
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => this.onData(chunk));
    stream.on('end', () => this.onEnd());
    stream.on('error', (error: Error) => this.onError(error));
    stream.on('close', () => this.onEnd());
  }

  readLine(): Promise<string | null> {
    return new Promise<string | null>((resolve, reject) => {
      this.pending.push({ resolve, reject });
      this.settle();
      if (this.pending.length > 0 && !this.ended && this.failure === null) {
        this.stream.resume();
      }
    });
  }

  private onData(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      this.lines.push(stripCarriageReturn(this.buffer.slice(0, newline)));
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf('\n');
    }

    this.settle();
    if (this.lines.length > 0 && this.pending.length === 0) {
      this.stream.pause();
    }
  }

  private onEnd(): void {
    if (this.buffer.length > 0) {
      this.lines.push(stripCarriageReturn(this.buffer));
      this.buffer = '';
    }
    this.ended = true;
    this.settle();
  }

  private onError(error: Error): void {
    this.failure = error;
    this.settle();
  }

  private settle(): void {
    while (this.pending.length > 0) {
      const line = this.lines.shift();
      if (line !== undefined) {
        this.pending.shift()?.resolve(line);
      } else if (this.failure) {
        this.pending.shift()?.reject(this.failure);
      } else if (this.ended) {
        this.pending.shift()?.resolve(null);
      } else {
        return;
      }
    }
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function createStreamSource(stream: Readable): InputSource {
  return new StreamSource(stream);
}

/**
 * In-memory source yielding the given lines, then end of input
 */
export class LineSource implements InputSource {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  async readLine(): Promise<string | null> {
    if (this.index >= this.lines.length) {
      return null;
    }
    const line = this.lines[this.index];
    this.index++;
    return line;
  }
}

export function createLineSource(lines: readonly string[]): InputSource {
  return new LineSource(lines);
}
