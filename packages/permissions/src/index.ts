export * from "./errors";
export * from "./policy";
export * from "./quotaAuthority";
