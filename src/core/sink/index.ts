/**
 * Triple Sink Module
 *
 * @module
 */

import type { Writable } from "node:stream";
import type { ITripleSink, TripleFormat } from "./interfaces/ITripleSink.js";
import { NTriplesSink } from "./impl/NTriplesSink.js";
import { TurtleSink } from "./impl/TurtleSink.js";
import type { TextTripleSinkOptions } from "./impl/TextTripleSink.js";

export type { ITripleSink, TripleFormat } from "./interfaces/ITripleSink.js";
export { TextTripleSink, type TextTripleSinkOptions } from "./impl/TextTripleSink.js";
export { NTriplesSink } from "./impl/NTriplesSink.js";
export { TurtleSink } from "./impl/TurtleSink.js";
export { MemoryTripleSink, type RecordedTriple } from "./impl/MemoryTripleSink.js";
export { escapeLiteral } from "./escape.js";

/** File extension conventionally used for each format */
export const FORMAT_EXTENSIONS: Record<TripleFormat, string> = {
  ntriples: ".nt",
  turtle: ".ttl",
};

/**
 * Create a sink for the given syntax writing to `output`.
 */
export function createTripleSink(
  format: TripleFormat,
  output: Writable,
  options?: TextTripleSinkOptions
): ITripleSink {
  switch (format) {
    case "ntriples":
      return new NTriplesSink(output, options);
    case "turtle":
      return new TurtleSink(output, options);
  }
}
