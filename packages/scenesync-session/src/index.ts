export * from "./messages.js";
export * from "./codec.js";
export * from "./transport.js";
export * from "./wire.js";
export * from "./host.js";
export * from "./client.js";
export * from "./in-memory.js";
export * from "./server.js";
export * from "./config.js";
