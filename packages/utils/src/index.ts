export * from "./compression/index.js";
export * from "./streams/index.js";
