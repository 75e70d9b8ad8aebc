/**
 * typegraph-rdf
 *
 * @example
 * ```typescript
 * import { loadSymbolSetFromFile, MemoryTripleSink, SymbolGraphExtractor } from "typegraph-rdf";
 *
 * const symbols = await loadSymbolSetFromFile("Sample.symbols.json");
 * const sink = new MemoryTripleSink();
 * new SymbolGraphExtractor(sink).extract(symbols, symbols.targetModule);
 * await sink.close();
 * ```
 */

export * from "./core/index.js";
export * from "./utils/index.js";
