export { APITransport } from "./api.js";
export type { Transport, HttpMethod } from "./types.js";
