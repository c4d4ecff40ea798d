export const requestFields = [
  "itemId",
  "materialCode",
  "materialDescription",
  "siteCode",
  "planName",
  "requestedQty"
] as const;

export const stockFields = ["itemId", "stockDescription", "materialCode", "availableQty"] as const;

export type RequestField = (typeof requestFields)[number];
export type StockField = (typeof stockFields)[number];

export const requiredRequestFields = ["materialCode", "requestedQty"] as const satisfies readonly RequestField[];
export const requiredStockFields = ["materialCode", "availableQty"] as const satisfies readonly StockField[];

export const tableKinds = ["requests", "stock", "ledger", "dispatch-plan"] as const;
export type TableKind = (typeof tableKinds)[number];

export const priorityModes = ["input-order", "plan-number"] as const;
export type PriorityMode = (typeof priorityModes)[number];

export const dataQualityCodes = ["QTY_COERCED", "UNMATCHED_MATERIAL", "CONFLICTING_DESCRIPTION"] as const;
export type DataQualityCode = (typeof dataQualityCodes)[number];
