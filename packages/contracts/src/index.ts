export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/account.js";
export * from "./types/credential.js";
export * from "./types/session.js";
export * from "./types/http.js";

export * from "./ports/keys/encryption-key-port.js";
export * from "./ports/sessions/session-store-port.js";
export * from "./ports/signing/signing-context-port.js";
