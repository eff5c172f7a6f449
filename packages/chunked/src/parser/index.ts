export * from "./create-parser.js";
export * from "./fixed-boundary-parser.js";
export * from "./length-prefixed-parser.js";
export * from "./types.js";
