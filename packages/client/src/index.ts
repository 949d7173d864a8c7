export * from "./broker-client.js";
export * from "./dry-run.js";
