import fs from 'fs';
import path from 'path';
import schedule from 'node-schedule';
import { rotateFile } from '../rotateFile.js';
import { formatUtcTimestamp, type LogSink } from './LogSink.js';

export interface FileLogSinkOptions {
  filePath: string;
  retentionDays?: number;
  /** Mirror each line to the console (default true) */
  echo?: boolean;
  now?: () => Date;
}

const ANSI_ESCAPE = /\x1b\[[0-9;]*[mGKHF]/g;
const CONTROL_CHARACTERS = /[\x00-\x08\x0a-\x1f\x7f]/g;

/** Control characters from request data must not start a new log line */
export function escapeControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, (char) => {
    switch (char) {
      case '\n':
        return '\\n';
      case '\r':
        return '\\r';
      default:
        return `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
    }
  });
}

/**
 * Timestamped log file. Writes are synchronous and fsync'd per line, so
 * concurrent callers on the event loop can never interleave partial lines.
 */
export class FileLogSink implements LogSink {
  private fd: number;
  private rotationJob?: schedule.Job;
  private readonly filePath: string;
  private readonly retentionDays: number;
  private readonly echo: boolean;
  private readonly now: () => Date;

  constructor(options: FileLogSinkOptions) {
    this.filePath = path.resolve(options.filePath);
    this.retentionDays = options.retentionDays ?? 7;
    this.echo = options.echo ?? true;
    this.now = options.now ?? (() => new Date());

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.fd = fs.openSync(this.filePath, 'a');
  }

  record(line: string): void {
    const entry = `[${formatUtcTimestamp(this.now())}] ${escapeControlCharacters(line.replace(ANSI_ESCAPE, ''))}\n`;
    fs.writeSync(this.fd, entry);
    fs.fsyncSync(this.fd);

    if (this.echo) {
      console.log(line);
    }
  }

  /**
   * Rotate now, then every day at midnight.
   */
  startRotation(): void {
    this.rotate();
    this.rotationJob?.cancel();
    this.rotationJob = schedule.scheduleJob('0 0 * * *', () => {
      this.rotate();
    });
  }

  rotate(): string | undefined {
    fs.closeSync(this.fd);
    try {
      return rotateFile({
        dir: path.dirname(this.filePath),
        filename: path.basename(this.filePath),
        retentionDays: this.retentionDays,
        now: this.now(),
      });
    } finally {
      this.fd = fs.openSync(this.filePath, 'a');
    }
  }

  close(): void {
    this.rotationJob?.cancel();
    this.rotationJob = undefined;
    fs.closeSync(this.fd);
  }
}
