export type { CredentialHandle, CredentialVaultOptions } from "./credential-vault.js";
export { CredentialVault } from "./credential-vault.js";

export type { ScryptParameters } from "./passcode-key.js";
export { PasscodeKey, DEFAULT_SCRYPT_PARAMETERS } from "./passcode-key.js";

export type { OneTimeCode } from "./one-time-code.js";
export { resolveOneTimeCode } from "./one-time-code.js";
