/**
 * Shared type foundations for the reasoning pipeline.
 */

export * from "./pipeline.js";
export * from "./collaborators.js";
