/**
 * Output sinks for streamed namelist text.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { finished } from "node:stream/promises";
import { NamelistIoError } from "../core/errors.js";

/**
 * Anything that accepts text chunks in order.
 */
export interface OutputSink {
  write(chunk: string): void;
}

/**
 * Collects output in memory.
 */
export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Streams output to a file. Call close() on every exit path; it
 * reports any write failure.
 */
export class FileSink implements OutputSink {
  private readonly stream: WriteStream;
  private failure: Error | undefined;

  constructor(public readonly path: string) {
    this.stream = createWriteStream(path, { encoding: "utf-8" });
    this.stream.on("error", (err) => {
      this.failure = err;
    });
  }

  write(chunk: string): void {
    if (this.failure === undefined) {
      this.stream.write(chunk);
    }
  }

  async close(): Promise<void> {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    try {
      await finished(this.stream);
    } catch (err) {
      throw new NamelistIoError(this.path, err instanceof Error ? err.message : String(err));
    }
    if (this.failure !== undefined) {
      throw new NamelistIoError(this.path, this.failure.message);
    }
  }
}

/**
 * Wraps a sink and remembers whether output so far ends a line.
 */
export class LineTrackingSink implements OutputSink {
  private written = false;
  private endsWithNewline = false;

  constructor(private readonly inner: OutputSink) {}

  write(chunk: string): void {
    if (chunk === "") return;
    this.inner.write(chunk);
    this.written = true;
    this.endsWithNewline = chunk.endsWith("\n");
  }

  isEmpty(): boolean {
    return !this.written;
  }

  atLineStart(): boolean {
    return !this.written || this.endsWithNewline;
  }
}
