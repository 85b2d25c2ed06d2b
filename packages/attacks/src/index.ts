export * from "./library.js";
export * from "./simulator.js";
export * from "./indicators.js";
export * from "./evaluator.js";
export * from "./payloads.js";
export * from "./orchestrator.js";
