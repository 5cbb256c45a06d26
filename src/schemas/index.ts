export * from "./policy.js";
export * from "./resource.js";
export * from "./config.js";
export * from "./event.js";
