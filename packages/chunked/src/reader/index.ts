export * from "./atomic-flag.js";
export * from "./chunked-reader.js";
export * from "./types.js";
