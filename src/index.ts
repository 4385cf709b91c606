export * from "./config/index.js";
export * from "./ingest/index.js";
export * from "./report/index.js";
export * from "./scanner/index.js";
export * from "./scoring/index.js";
