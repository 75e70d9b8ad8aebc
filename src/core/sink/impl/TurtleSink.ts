/**
 * Turtle sink (.ttl)
 *
 * Prefixes are collected and written once, ahead of the first triple.
 * Booleans and integers use Turtle's bare literal tokens.
 *
 * @module
 */

import { TextTripleSink } from "./TextTripleSink.js";

export class TurtleSink extends TextTripleSink {
  private readonly prefixes = new Map<string, string>();
  private prefixesWritten = false;

  addPrefix(prefix: string, iri: string): void {
    this.prefixes.set(prefix, iri);
  }

  protected beforeTriple(): void {
    if (this.prefixesWritten) return;
    this.prefixesWritten = true;

    for (const [prefix, iri] of this.prefixes) {
      this.appendLine(`@prefix ${prefix}: <${iri}> .`);
    }
    if (this.prefixes.size > 0) {
      this.appendLine("");
    }
  }

  protected formatBool(value: boolean): string {
    return value ? "true" : "false";
  }

  protected formatInt(value: number): string {
    return String(value);
  }
}
