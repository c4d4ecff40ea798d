import { z } from "zod";
import { dataQualityCodes, priorityModes, requestFields, stockFields } from "./fields.js";

export const priorityModeSchema = z.enum(priorityModes);

// Raw cells straight out of a sheet or a JSON body; coercion happens in the engine.
const rawCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.date()]).optional();

export const rawRequestRecordSchema = z.object({
  itemId: rawCellSchema,
  materialCode: rawCellSchema,
  materialDescription: rawCellSchema,
  siteCode: rawCellSchema,
  planName: rawCellSchema,
  requestedQty: rawCellSchema
});

export const rawStockRecordSchema = z.object({
  itemId: rawCellSchema,
  stockDescription: rawCellSchema,
  materialCode: rawCellSchema,
  availableQty: rawCellSchema
});

export const requestLineSchema = z.object({
  itemId: z.string(),
  materialCode: z.string(),
  materialDescription: z.string(),
  siteCode: z.string(),
  planName: z.string(),
  requestedQty: z.number().nonnegative()
});

export const stockEntrySchema = z.object({
  itemId: z.string(),
  stockDescription: z.string(),
  materialCode: z.string(),
  availableQty: z.number().nonnegative()
});

export const outputLineSchema = requestLineSchema.extend({
  stockDescription: z.string(),
  allocatedQty: z.number().nonnegative(),
  unmetQty: z.number().nonnegative(),
  dispatchable: z.boolean(),
  stockBefore: z.number().nonnegative(),
  stockAfter: z.number().nonnegative(),
  sourceRow: z.number().int().nonnegative()
});

export const reconciliationMetricsSchema = z.object({
  totalRows: z.number().int().nonnegative(),
  totalUnmetQty: z.number().nonnegative(),
  dispatchableRows: z.number().int().nonnegative(),
  nonDispatchableRows: z.number().int().nonnegative(),
  totalAllocatedQty: z.number().nonnegative(),
  splitRequests: z.number().int().nonnegative()
});

export const dataQualityIssueSchema = z.object({
  table: z.enum(["requests", "stock"]),
  row: z.number().int().nonnegative(),
  field: z.string(),
  code: z.enum(dataQualityCodes),
  message: z.string()
});

export const reconcileOptionsSchema = z.object({
  priority: priorityModeSchema.default("input-order")
});

export const reconciliationResultSchema = z.object({
  lines: z.array(outputLineSchema),
  metrics: reconciliationMetricsSchema,
  issues: z.array(dataQualityIssueSchema)
});

// ============================================================================
// COLUMN MAPPING
// ============================================================================

export const requestColumnMappingSchema = z.record(z.enum(requestFields), z.string().min(1));
export const stockColumnMappingSchema = z.record(z.enum(stockFields), z.string().min(1));

export const sheetSelectionSchema = z.object({
  requestSheet: z.string().min(1).optional(),
  stockSheet: z.string().min(1).optional(),
  requestMapping: requestColumnMappingSchema.optional(),
  stockMapping: stockColumnMappingSchema.optional()
});

export const columnProfileSchema = z.object({
  name: z.string(),
  inferredType: z.enum(["number", "text", "date", "boolean", "mixed", "empty"]),
  nonBlankCount: z.number().int().nonnegative(),
  blankCount: z.number().int().nonnegative(),
  example: z.union([z.string(), z.number(), z.boolean(), z.null()])
});

export const sheetProfileSchema = z.object({
  sheetName: z.string(),
  totalRows: z.number().int().nonnegative(),
  totalColumns: z.number().int().nonnegative(),
  columns: z.array(columnProfileSchema),
  availableSheets: z.array(z.string())
});

// ============================================================================
// LEDGER CROSSING
// ============================================================================

export const ledgerCrossingOptionsSchema = z.object({
  observation: z.string().default(""),
  newWorkOrder: z.string().min(1),
  newJobNumber: z.string().min(1)
});

// ============================================================================
// REQUEST BODY SCHEMAS (for API input validation)
// ============================================================================

export const reconcileRecordsBodySchema = z.object({
  requests: z.array(rawRequestRecordSchema.passthrough()),
  stock: z.array(rawStockRecordSchema.passthrough()),
  options: reconcileOptionsSchema.partial().optional()
});

const booleanFieldSchema = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((value) => value === true || value === "true" || value === "1");

// Multipart text fields arrive as strings; mappings are JSON-encoded.
const jsonFieldSchema = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" });
        return z.NEVER;
      }
    })
    .pipe(schema);

export const reconcileUploadFieldsSchema = z.object({
  requestSheet: z.string().min(1).optional(),
  stockSheet: z.string().min(1).optional(),
  requestMapping: jsonFieldSchema(requestColumnMappingSchema).optional(),
  stockMapping: jsonFieldSchema(stockColumnMappingSchema).optional(),
  priority: priorityModeSchema.optional(),
  format: z.enum(["json", "xlsx"]).default("json"),
  auditColumns: booleanFieldSchema.default(false)
});

export const inspectUploadFieldsSchema = z.object({
  requestSheet: z.string().min(1).optional(),
  stockSheet: z.string().min(1).optional()
});

export const warehouseExportFieldsSchema = z.object({
  sheet: z.string().min(1).optional(),
  warehouse: z.string().trim().optional(),
  format: z.enum(["json", "xlsx"]).default("xlsx")
});

export type RequestLine = z.infer<typeof requestLineSchema>;
export type StockEntry = z.infer<typeof stockEntrySchema>;
export type OutputLine = z.infer<typeof outputLineSchema>;
export type ReconciliationMetrics = z.infer<typeof reconciliationMetricsSchema>;
export type DataQualityIssue = z.infer<typeof dataQualityIssueSchema>;
export type ReconcileOptions = z.input<typeof reconcileOptionsSchema>;
export type ReconciliationResult = z.infer<typeof reconciliationResultSchema>;
export type SheetSelection = z.infer<typeof sheetSelectionSchema>;
export type ColumnProfile = z.infer<typeof columnProfileSchema>;
export type SheetProfile = z.infer<typeof sheetProfileSchema>;
export type LedgerCrossingOptions = z.input<typeof ledgerCrossingOptionsSchema>;
