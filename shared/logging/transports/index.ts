/**
 * Transport Exports
 */

export { ConsoleTransport, type ConsoleTransportOptions, type ConsoleSink } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
