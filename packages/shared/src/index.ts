export * from "./types/record.js";
export * from "./types/gpu.js";
export * from "./types/status.js";
