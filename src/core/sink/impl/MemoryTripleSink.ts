/**
 * In-memory sink that keeps every triple as a record.
 *
 * Used by tests and by embedders that post-process the graph themselves.
 *
 * @module
 */

import { ErrorCode, SinkError } from "../../errors.js";
import { RDF_TYPE, XSD } from "../../rdf/ontology.js";
import type { ITripleSink } from "../interfaces/ITripleSink.js";

export interface RecordedTriple {
  subject: string;
  predicate: string;
  /** IRI or lexical form of the literal */
  object: string;
  isIri: boolean;
  /** Datatype IRI for typed literals, null for IRIs and plain literals */
  datatype: string | null;
}

export class MemoryTripleSink implements ITripleSink {
  readonly triples: RecordedTriple[] = [];
  readonly prefixes = new Map<string, string>();
  private closed = false;

  get tripleCount(): number {
    return this.triples.length;
  }

  emitIri(subject: string, predicate: string, objectIri: string): void {
    this.record(subject, predicate, objectIri, true, null);
  }

  emitLiteral(subject: string, predicate: string, value: string): void {
    this.record(subject, predicate, value, false, null);
  }

  emitTypedLiteral(subject: string, predicate: string, value: string, datatype: string): void {
    this.record(subject, predicate, value, false, datatype);
  }

  emitBool(subject: string, predicate: string, value: boolean): void {
    this.record(subject, predicate, value ? "true" : "false", false, XSD.boolean);
  }

  emitInt(subject: string, predicate: string, value: number): void {
    this.record(subject, predicate, String(value), false, XSD.integer);
  }

  emitLong(subject: string, predicate: string, value: number | bigint): void {
    this.record(subject, predicate, String(value), false, XSD.long);
  }

  addPrefix(prefix: string, iri: string): void {
    this.prefixes.set(prefix, iri);
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Objects of every triple matching subject and predicate, in emission order
   */
  objects(subject: string, predicate: string): string[] {
    return this.triples
      .filter((t) => t.subject === subject && t.predicate === predicate)
      .map((t) => t.object);
  }

  /**
   * Subjects of every triple matching predicate and object, in emission order
   */
  subjects(predicate: string, object: string): string[] {
    return this.triples
      .filter((t) => t.predicate === predicate && t.object === object)
      .map((t) => t.subject);
  }

  /** `rdf:type` objects of a subject */
  typesOf(subject: string): string[] {
    return this.objects(subject, RDF_TYPE);
  }

  private record(
    subject: string,
    predicate: string,
    object: string,
    isIri: boolean,
    datatype: string | null
  ): void {
    if (this.closed) {
      throw new SinkError("Cannot emit to a closed sink", ErrorCode.SINK_CLOSED);
    }
    this.triples.push({ subject, predicate, object, isIri, datatype });
  }
}
