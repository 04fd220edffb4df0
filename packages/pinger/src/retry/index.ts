export { deliver, type DeliveryContext } from "./deliver.js";
export { retryDelayMs, startDelivery, streakBackoffMs, transition, type RetryPolicy } from "./policy.js";
