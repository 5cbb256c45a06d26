export { loadDriftConfig, getConfigValue, validateConfig, DEFAULT_CONFIG_FILE } from "./manager.js";
export type { ConfigLintIssue } from "./manager.js";
