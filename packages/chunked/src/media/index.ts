export * from "./media-type.js";
