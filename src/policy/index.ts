export { PolicyCatalog, lookupRawPath, isPlainObject } from "./catalog.js";
export type { EntityTypeRecord } from "./catalog.js";
export { loadPolicy, parsePolicy, lintPolicy, DEFAULT_POLICY_PATH } from "./loader.js";
export type { PolicyLintIssue } from "./loader.js";
