/**
 * Transport Exports
 */

export { ConsoleTransport, type ConsoleTransportOptions, type ConsoleWriter } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
