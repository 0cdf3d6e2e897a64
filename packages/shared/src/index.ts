export * from "./types.js";
export * from "./errors.js";
export * from "./clip-planner.js";
export * from "./schemas.js";
