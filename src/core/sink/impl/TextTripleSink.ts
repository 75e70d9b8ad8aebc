/**
 * Base class for line-oriented sinks writing to a Node stream.
 *
 * Lines accumulate in memory and are handed to the stream once the buffer
 * passes `bufferSize` characters, and on `flush()`.
 *
 * @module
 */

import type { Writable } from "node:stream";
import { ErrorCode, SinkError } from "../../errors.js";
import { XSD } from "../../rdf/ontology.js";
import { escapeLiteral } from "../escape.js";
import type { ITripleSink } from "../interfaces/ITripleSink.js";

export interface TextTripleSinkOptions {
  /** Characters buffered before a write is issued (default: 64 KiB) */
  bufferSize?: number;
  /** Whether `close()` ends the stream (default: true). Pass false for stdout. */
  endOnClose?: boolean;
}

const DEFAULT_BUFFER_SIZE = 64 * 1024;

export abstract class TextTripleSink implements ITripleSink {
  private buffer = "";
  private count = 0;
  private closed = false;
  private streamError: Error | null = null;
  private readonly options: Required<TextTripleSinkOptions>;

  constructor(
    protected readonly output: Writable,
    options: TextTripleSinkOptions = {}
  ) {
    this.options = {
      bufferSize: options.bufferSize ?? DEFAULT_BUFFER_SIZE,
      endOnClose: options.endOnClose ?? true,
    };
    output.on("error", (error: Error) => {
      this.streamError = error;
    });
  }

  get tripleCount(): number {
    return this.count;
  }

  // ===========================================================================
  // Format hooks
  // ===========================================================================

  abstract addPrefix(prefix: string, iri: string): void;

  protected abstract formatBool(value: boolean): string;

  protected abstract formatInt(value: number): string;

  /** Called before each triple line is appended */
  protected beforeTriple(): void {}

  // ===========================================================================
  // Emit
  // ===========================================================================

  emitIri(subject: string, predicate: string, objectIri: string): void {
    this.writeTriple(subject, predicate, `<${objectIri}>`);
  }

  emitLiteral(subject: string, predicate: string, value: string): void {
    this.writeTriple(subject, predicate, `"${escapeLiteral(value)}"`);
  }

  emitTypedLiteral(subject: string, predicate: string, value: string, datatype: string): void {
    this.writeTriple(subject, predicate, typedLiteral(value, datatype));
  }

  emitBool(subject: string, predicate: string, value: boolean): void {
    this.writeTriple(subject, predicate, this.formatBool(value));
  }

  emitInt(subject: string, predicate: string, value: number): void {
    this.writeTriple(subject, predicate, this.formatInt(value));
  }

  emitLong(subject: string, predicate: string, value: number | bigint): void {
    this.writeTriple(subject, predicate, typedLiteral(String(value), XSD.long));
  }

  // ===========================================================================
  // Output
  // ===========================================================================

  async flush(): Promise<void> {
    this.throwIfFailed();
    const chunk = this.buffer;
    this.buffer = "";
    if (chunk.length === 0) return;

    await new Promise<void>((resolve, reject) => {
      this.output.write(chunk, (error) => {
        if (error) {
          reject(new SinkError(`Failed to write triples: ${error.message}`, ErrorCode.SINK_WRITE_FAILED));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
    if (!this.options.endOnClose) return;

    await new Promise<void>((resolve) => {
      this.output.end(() => resolve());
    });
    this.throwIfFailed();
  }

  protected appendLine(line: string): void {
    this.throwIfClosed();
    this.buffer += `${line}\n`;
    if (this.buffer.length >= this.options.bufferSize) {
      this.throwIfFailed();
      this.output.write(this.buffer);
      this.buffer = "";
    }
  }

  private writeTriple(subject: string, predicate: string, objectText: string): void {
    this.throwIfClosed();
    this.beforeTriple();
    this.appendLine(`<${subject}> <${predicate}> ${objectText} .`);
    this.count++;
  }

  private throwIfClosed(): void {
    if (this.closed) {
      throw new SinkError("Cannot emit to a closed sink", ErrorCode.SINK_CLOSED);
    }
  }

  private throwIfFailed(): void {
    if (this.streamError) {
      throw new SinkError(
        `Output stream failed: ${this.streamError.message}`,
        ErrorCode.SINK_WRITE_FAILED
      );
    }
  }
}

export function typedLiteral(value: string, datatype: string): string {
  return `"${escapeLiteral(value)}"^^<${datatype}>`;
}
