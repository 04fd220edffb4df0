export { formatError, formatErrorDetail } from "./format-error.js";
export { pickOne, randomInt, uniform } from "./random.js";
export { formatSeconds } from "./seconds.js";
export { sleep } from "./sleep.js";
