export * from "./config.js";
export * from "./hubs.js";
