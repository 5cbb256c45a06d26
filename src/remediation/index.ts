export { planRemediation, shellQuote } from "./planner.js";
export type { RemediationAction, RemediationCommand, RemediationOptions } from "./planner.js";
