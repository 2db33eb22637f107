/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>.log`, rotating to
 * `.log.1`, `.log.2`, ... once the active file passes `maxSize`.
 */

import * as fs from "fs";
import * as path from "path";
import { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  /** Directory for log files, created if missing */
  logDir: string;
  /** Base filename (default: "hashkeep") */
  filename?: string;
  /** Rotate once the active file would exceed this many bytes (default: 10MB) */
  maxSize?: number;
  /** Rotated files kept beside the active one (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  readonly filePath: string;
  private maxSize: number;
  private maxFiles: number;
  private stream: fs.WriteStream;
  private currentSize: number;
  private queue: string[] = [];
  private writing = false;
  private idleWaiters: (() => void)[] = [];

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.filePath = path.join(options.logDir, `${options.filename ?? "hashkeep"}.log`);

    fs.mkdirSync(options.logDir, { recursive: true });
    this.currentSize = sizeOf(this.filePath);
    this.stream = this.openStream();
  }

  log(entry: LogEntry): void {
    this.queue.push(JSON.stringify(entry) + "\n");
    this.drain();
  }

  private openStream(): fs.WriteStream {
    const stream = fs.createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    return stream;
  }

  private drain(): void {
    if (this.writing) return;

    const line = this.queue.shift();
    if (line === undefined) {
      const waiters = this.idleWaiters.splice(0);
      for (const resolve of waiters) resolve();
      return;
    }

    const bytes = Buffer.byteLength(line);
    if (this.currentSize > 0 && this.currentSize + bytes > this.maxSize) {
      this.rotate();
    }

    this.writing = true;
    this.stream.write(line, (err: Error | null | undefined) => {
      if (!err) this.currentSize += bytes;
      this.writing = false;
      this.drain();
    });
  }

  private rotate(): void {
    this.stream.end();

    const oldest = `${this.filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.filePath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.filePath}.${i + 1}`);
    }

    if (fs.existsSync(this.filePath)) {
      fs.renameSync(this.filePath, `${this.filePath}.1`);
    }

    this.currentSize = 0;
    this.stream = this.openStream();
  }

  async flush(): Promise<void> {
    if (!this.writing && this.queue.length === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    await this.flush();
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}

function sizeOf(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}
