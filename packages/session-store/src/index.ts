export * from "./envelope.js";
export * from "./envelope-session-store.js";
export * from "./file-session-store.js";
export * from "./memory-session-store.js";
export * from "./serial-queue.js";
