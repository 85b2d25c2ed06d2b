export * from "./types.js";
export * from "./errors.js";
export * from "./stable-json.js";
