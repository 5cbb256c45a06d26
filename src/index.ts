/**
 * driftlens: drift detection between declared infrastructure and live
 * cloud resources.
 *
 * Declared and live resources are normalized into one canonical model,
 * matched by identity, diffed path by path and classified by risk.
 * Every type-specific rule lives in the versioned policy file.
 */

export * from "./schemas/index.js";
export * from "./drift/index.js";
export * from "./policy/index.js";
export * from "./remediation/index.js";
export * from "./events/index.js";
export * from "./config/index.js";
