export * from "./types/quota.js";
export * from "./types/probe.js";
export * from "./types/session.js";
