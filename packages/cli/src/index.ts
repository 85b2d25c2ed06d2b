export * from "./commands.js";
export * from "./format.js";
