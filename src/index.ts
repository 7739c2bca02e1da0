export * from "./core/index.js";
export * from "./cache/index.js";
export * from "./history/index.js";
export * from "./remote/index.js";
export * from "./analysis/index.js";
export * from "./graph/index.js";
export * from "./aggregate/index.js";
export * from "./pipeline/index.js";
