export * from "./broker-config.js";
export * from "./credentials.js";
export * from "./errors.js";
export * from "./placeholders.js";
export * from "./setup-inspection.js";
