export * from "./account.ts";
export * from "./api.ts";
export * from "./app.ts";
export * from "./config.ts";
export * from "./cooldown.ts";
export * from "./errors.ts";
export * from "./init.ts";
export * from "./ledger.ts";
export * from "./listen.ts";
export * from "./mutex.ts";
export * from "./service.ts";
export * from "./viem-ledger.ts";
