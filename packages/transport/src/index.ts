export * from "./classify.js";
export * from "./dispatcher.js";
export * from "./fetch-http-client.js";
export * from "./retry.js";
export * from "./retrying-exchange.js";
export * from "./telemetry.js";
export * from "./transport-failure.js";
export { toUrl, safeJsonParse, headerValue, type QueryValue } from "./utils.js";
