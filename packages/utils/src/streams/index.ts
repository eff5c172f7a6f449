export * from "./async-iterable.js";
export * from "./byte-source.js";
export * from "./encoding.js";
