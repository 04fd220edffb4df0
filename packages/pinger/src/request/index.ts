export { buildPingRequest, pickTarget, randomHeaders, randomizeUrl, type RequestRandomization } from "./build-request.js";
