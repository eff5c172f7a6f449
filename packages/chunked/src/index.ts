export * from "./decode/index.js";
export * from "./errors.js";
export * from "./media/index.js";
export * from "./parser/index.js";
export * from "./reader/index.js";
