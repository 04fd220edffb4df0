export * from "./constants.js";
export * from "./types/ping.js";
export * from "./types/retry.js";
