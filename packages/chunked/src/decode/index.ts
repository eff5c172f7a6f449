export * from "./combinators.js";
export * from "./decoders.js";
export * from "./types.js";
