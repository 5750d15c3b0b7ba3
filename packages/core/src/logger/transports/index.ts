export type { ConsoleTransportOptions } from "./console.js";
export { ConsoleTransport } from "./console.js";
export type { JsonTransportOptions } from "./json.js";
export { JsonTransport } from "./json.js";
