export * from "./pako-compression.js";
export * from "./types.js";
