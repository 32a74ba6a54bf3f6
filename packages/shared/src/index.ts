export * from "./types.js";
export * from "./config.js";
export * from "./did.js";
export * from "./format.js";
