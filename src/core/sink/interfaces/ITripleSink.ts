/**
 * ITripleSink - Abstract triple output interface
 *
 * The extractor calls the emit methods synchronously while it walks;
 * implementations decide how facts are buffered and serialized.
 * Every emit call counts as one triple.
 *
 * @module
 */

/**
 * Serialization syntaxes with a built-in sink.
 */
export type TripleFormat = "ntriples" | "turtle";

export interface ITripleSink {
  /** Total number of emit calls so far */
  readonly tripleCount: number;

  /**
   * Emit a triple whose object is an IRI
   */
  emitIri(subject: string, predicate: string, objectIri: string): void;

  /**
   * Emit a triple whose object is a plain string literal
   */
  emitLiteral(subject: string, predicate: string, value: string): void;

  emitTypedLiteral(subject: string, predicate: string, value: string, datatype: string): void;

  /** xsd:boolean */
  emitBool(subject: string, predicate: string, value: boolean): void;

  /** xsd:integer */
  emitInt(subject: string, predicate: string, value: number): void;

  /** xsd:long */
  emitLong(subject: string, predicate: string, value: number | bigint): void;

  /**
   * Declare a short name for an IRI. Must be called before the first emit
   * in syntaxes that write prefixes up front.
   */
  addPrefix(prefix: string, iri: string): void;

  /**
   * Write out everything buffered so far
   */
  flush(): Promise<void>;

  /**
   * Flush and release the output. Emitting after close raises a SinkError.
   */
  close(): Promise<void>;
}
