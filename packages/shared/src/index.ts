export * from "./platform.js";
export * from "./types.js";
export * from "./env-file.js";
export * from "./logger.js";
export * from "./validation.js";
