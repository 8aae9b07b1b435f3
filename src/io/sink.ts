/**
 * Output Sinks
 * Writable, flushable text targets for the prompt, diagnostics and handler output
 */

import type { Writable } from 'stream';

/**
 * Write-only text target. A rejected promise is an I/O failure and is never retried.
 */
export interface OutputSink {
  write(text: string): Promise<void>;
  flush(): Promise<void>;
}

/**
 * Raised when the stream closes while a flush is still waiting for it to drain
 */
export class SinkClosedError extends Error {
  constructor() {
    super('Output stream closed before it drained');
    this.name = 'SinkClosedError';
  }
}

/**
 * Sink over a Node.js writable stream (process.stdout, a socket, a file stream)
 */
export class StreamSink implements OutputSink {
  private failure: Error | null = null;

  constructor(private readonly stream: Writable) {
    // Later writes and flushes reject with the first stream error
    stream.on('error', (error: Error) => {
      this.failure = error;
    });
  }

  write(text: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise<void>((resolve, reject) => {
      this.stream.write(text, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async flush(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.stream.destroyed) {
      throw new SinkClosedError();
    }
    if (this.stream.writableNeedDrain) {
      await this.waitForDrain();
    }
  }

  private waitForDrain(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onDrain = (): void => {
        cleanup();
        resolve();
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };
      const onClose = (): void => {
        cleanup();
        reject(this.failure ?? new SinkClosedError());
      };
      const cleanup = (): void => {
        this.stream.off('drain', onDrain);
        this.stream.off('error', onError);
        this.stream.off('close', onClose);
      };

      this.stream.on('drain', onDrain);
      this.stream.on('error', onError);
      this.stream.on('close', onClose);
    });
  }
}

export function createStreamSink(stream: Writable): OutputSink {
  return new StreamSink(stream);
}

/**
 * In-memory sink that records everything written to it
 */
export class MemorySink implements OutputSink {
  private chunks: string[] = [];

  async write(text: string): Promise<void> {
    this.chunks.push(text);
  }

  async flush(): Promise<void> {}

  contents(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks = [];
  }
}

export function createMemorySink(): MemorySink {
  return new MemorySink();
}
