import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { dirname } from 'node:path';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

// Raw per-device I/O capture
export interface SessionDebugSink {
  sent(text: string): void;
  received(text: string): void;
  close(): Promise<void>;
}

// Losing the debug log never fails the device: the first error is logged and later writes are dropped
export class SessionDebugLog implements SessionDebugSink {
  private stream: WriteStream | null = null;
  private logger: Logger;
  private failed = false;

  constructor(path: string, logger: Logger = silentLogger) {
    this.logger = logger;
    try {
      mkdirSync(dirname(path), { recursive: true });
    } catch (err) {
      this.disable(err);
      return;
    }

    const stream = createWriteStream(path, { flags: 'a' });
    stream.on('error', (err) => this.disable(err));
    this.stream = stream;
  }

  sent(text: string): void {
    this.record('>>', text);
  }

  received(text: string): void {
    this.record('<<', text);
  }

  close(): Promise<void> {
    const stream = this.stream;
    if (!stream || this.failed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.once('error', () => resolve());
      stream.end(() => resolve());
    });
  }

  private disable(err: unknown): void {
    if (this.failed) return;
    this.failed = true;
    this.logger.warn(`session debug log disabled: ${errorMessage(err)}`);
  }

  private record(direction: string, text: string): void {
    if (this.failed || !this.stream) return;
    this.stream.write(`${new Date().toISOString()} ${direction} ${JSON.stringify(text)}\n`);
  }
}
