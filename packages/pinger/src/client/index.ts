export { HttpPingClient } from "./http-ping-client.js";
