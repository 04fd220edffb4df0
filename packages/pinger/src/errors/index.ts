export { PingerError } from "./pinger-error.js";
export { ConfigError } from "./config-error.js";
