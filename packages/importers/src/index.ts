export * from "./column-mapper.js";
export * from "./dispatch-workbook.js";
export * from "./ledger-workbook.js";
export * from "./types.js";
export * from "./warehouse-workbook.js";
export * from "./workbook.js";
