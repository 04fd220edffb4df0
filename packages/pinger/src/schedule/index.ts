export { computeNextIntervalMs, type IntervalBounds } from "./interval.js";
