export * from "./allocation-engine.js";
export * from "./coerce.js";
export * from "./errors.js";
export * from "./ledger-crossing.js";
export * from "./metrics.js";
export * from "./stock-pool.js";
