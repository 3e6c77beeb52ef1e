// ─── @logex/core ───────────────────────────────────────────────────
// Embeddable expression engine. Pure TypeScript, synchronous, no
// framework dependencies. Re-exports the engine, wire format and
// standard library.

export * from "./engine/index";
export * from "./schema/index";
export * from "./stdlib/index";
