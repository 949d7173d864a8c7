export * from "./nonce-counter.js";
export * from "./signers.js";
