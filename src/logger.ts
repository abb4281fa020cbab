import { createWriteStream, type WriteStream } from 'fs';
import { resolve } from 'path';

export interface Logger {
  log(message: string): void;
}

/**
 * Timestamped line logger. Writes to the given file in append mode, or to
 * stderr; stdout belongs to the MCP stdio transport.
 */
export class FileLogger implements Logger {
  private logStream?: WriteStream;

  constructor(logFile?: string) {
    if (logFile) {
      const logPath = resolve(logFile);
      this.logStream = createWriteStream(logPath, { flags: 'a' });
      this.logStream.on('error', (err) => {
        process.stderr.write(`Failed to write to log file ${logPath}: ${err.message}\n`);
        this.logStream = undefined;
      });
    }
  }

  get toFile(): boolean {
    return this.logStream !== undefined;
  }

  log(message: string): void {
    const line = `[${new Date().toISOString()}] ${message}\n`;

    if (this.logStream) {
      this.logStream.write(line);
    } else {
      process.stderr.write(line);
    }
  }

  close(): void {
    this.logStream?.end();
    this.logStream = undefined;
  }
}

/** Discards everything. Used by tests. */
export const silentLogger: Logger = {
  log: () => undefined,
};
