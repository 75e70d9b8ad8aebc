/**
 * N-Triples sink (.nt)
 *
 * One fact per line with full IRIs. Booleans and integers are typed literals;
 * prefixes are recorded as comments only.
 *
 * @module
 */

import { XSD } from "../../rdf/ontology.js";
import { TextTripleSink, typedLiteral } from "./TextTripleSink.js";

export class NTriplesSink extends TextTripleSink {
  addPrefix(prefix: string, iri: string): void {
    this.appendLine(`# @prefix ${prefix}: <${iri}> .`);
  }

  protected formatBool(value: boolean): string {
    return typedLiteral(value ? "true" : "false", XSD.boolean);
  }

  protected formatInt(value: number): string {
    return typedLiteral(String(value), XSD.integer);
  }
}
