export * from "./registry.js";
export * from "./detector.js";
export * from "./scorer.js";
export * from "./review-queue.js";
