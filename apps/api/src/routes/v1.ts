import express from "express";
import multer from "multer";
import type * as XLSX from "xlsx";
import {
  inspectUploadFieldsSchema,
  ledgerCrossingOptionsSchema,
  reconcileRecordsBodySchema,
  reconcileUploadFieldsSchema,
  reconciliationResultSchema,
  warehouseExportFieldsSchema,
  type ReconciliationResult
} from "@dispatch/contracts";
import { crossLedger, reconcile } from "@dispatch/allocation-engine";
import {
  DISPATCH_SHEET_NAME,
  WAREHOUSE_EXPORT_FILE,
  describeSheet,
  filterByWarehouse,
  listSheets,
  listWarehouses,
  loadDispatchInputs,
  loadWarehouseTable,
  readDispatchPlanWorkbook,
  readLedgerWorkbook,
  readSheetHeaders,
  readWorkbook,
  suggestColumnMapping,
  suggestSheets,
  writeDispatchWorkbook,
  writeLedgerWorkbook,
  writeWarehouseWorkbook,
  type MappingTable
} from "@dispatch/importers";
import type { AppConfig } from "../config.js";
import { send400 } from "../lib/api-error.js";

const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
const PREVIEW_LINES = 30;

function logReconciliation(source: string, result: ReconciliationResult) {
  const { metrics } = result;
  console.log(
    `[reconcile] ${source}: ${metrics.totalRows} lines, ${metrics.dispatchableRows} dispatchable, ` +
      `allocated=${metrics.totalAllocatedQty} unmet=${metrics.totalUnmetQty} issues=${result.issues.length}`
  );
}

function sheetSummary(workbook: XLSX.WorkBook, table: MappingTable, sheetName: string) {
  const headers = readSheetHeaders(workbook, sheetName);
  return {
    sheetName,
    headers,
    suggestedMapping: suggestColumnMapping(table, headers),
    profile: describeSheet(workbook, sheetName)
  };
}

function sendWorkbook(res: express.Response, fileName: string, buffer: Buffer) {
  res.setHeader("Content-Type", XLSX_CONTENT_TYPE);
  res.setHeader("Content-Disposition", `attachment; filename="${fileName}"`);
  res.send(buffer);
}

function uploadedFile(files: express.Request["files"], field: string): Express.Multer.File | undefined {
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

export function createV1Router(config: AppConfig) {
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: config.uploadLimitBytes } });
  const v1Router = express.Router();

  v1Router.get("/health", (_req, res) => {
    res.json({ ok: true, service: "material-dispatch-api", version: "v1" });
  });

  v1Router.post("/workbooks/inspect", upload.single("file"), (req, res) => {
    if (!req.file) {
      return send400(res, "file is required");
    }
    const fields = inspectUploadFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      return send400(res, "Invalid form fields", fields.error.flatten());
    }

    const workbook = readWorkbook(req.file.buffer);
    const sheets = listSheets(workbook);
    const suggested = suggestSheets(sheets);
    return res.json({
      fileName: req.file.originalname,
      sheets,
      suggested,
      requests: sheetSummary(workbook, "requests", fields.data.requestSheet ?? suggested.requestSheet),
      stock: sheetSummary(workbook, "stock", fields.data.stockSheet ?? suggested.stockSheet)
    });
  });

  v1Router.post("/reconciliations", upload.single("file"), (req, res) => {
    if (!req.file) {
      return send400(res, "file is required");
    }
    const fields = reconcileUploadFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      return send400(res, "Invalid form fields", fields.error.flatten());
    }
    const { format, auditColumns, priority, ...selection } = fields.data;

    const inputs = loadDispatchInputs(readWorkbook(req.file.buffer), selection);
    const result = reconcile(inputs.requests, inputs.stock, { priority: priority ?? config.defaultPriority });
    logReconciliation(req.file.originalname, result);

    if (format === "xlsx") {
      return sendWorkbook(
        res,
        `${DISPATCH_SHEET_NAME}.xlsx`,
        writeDispatchWorkbook(result.lines, { includeAuditColumns: auditColumns })
      );
    }
    return res.json({
      requestSheet: inputs.requestSheet,
      stockSheet: inputs.stockSheet,
      ...reconciliationResultSchema.parse(result),
      preview: result.lines.slice(0, PREVIEW_LINES)
    });
  });

  v1Router.post("/workbooks/warehouse-export", upload.single("file"), (req, res) => {
    if (!req.file) {
      return send400(res, "file is required");
    }
    const fields = warehouseExportFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      return send400(res, "Invalid form fields", fields.error.flatten());
    }

    const table = loadWarehouseTable(readWorkbook(req.file.buffer), fields.data.sheet);
    const filtered = filterByWarehouse(table, fields.data.warehouse);
    console.log(
      `[warehouse] ${req.file.originalname}: ${filtered.rows.length} of ${table.rows.length} rows for ${fields.data.warehouse || "all warehouses"}`
    );

    if (fields.data.format === "xlsx") {
      return sendWorkbook(res, WAREHOUSE_EXPORT_FILE, writeWarehouseWorkbook(filtered));
    }
    return res.json({
      sheetName: filtered.sheetName,
      headers: filtered.headers,
      warehouses: listWarehouses(table),
      rows: filtered.rows
    });
  });

  v1Router.post("/reconciliations/records", (req, res) => {
    const body = reconcileRecordsBodySchema.safeParse(req.body);
    if (!body.success) {
      return send400(res, "Invalid request body", body.error.flatten());
    }
    const { requests, stock, options } = body.data;
    const result = reconcile(requests, stock, { priority: options?.priority ?? config.defaultPriority });
    logReconciliation("records", result);
    return res.json(reconciliationResultSchema.parse(result));
  });

  v1Router.post(
    "/ledger-crossings",
    upload.fields([
      { name: "master", maxCount: 1 },
      { name: "dispatch", maxCount: 1 }
    ]),
    (req, res) => {
      const master = uploadedFile(req.files, "master");
      const dispatch = uploadedFile(req.files, "dispatch");
      if (!master || !dispatch) {
        return send400(res, "master and dispatch files are required");
      }
      const options = ledgerCrossingOptionsSchema.safeParse(req.body);
      if (!options.success) {
        return send400(res, "Invalid form fields", options.error.flatten());
      }

      const ledger = readLedgerWorkbook(master.buffer);
      const plan = readDispatchPlanWorkbook(dispatch.buffer);
      const result = crossLedger(ledger.entries, plan, options.data);
      console.log(
        `[ledger] ${master.originalname}: ${result.crossedRows} crossed, ${result.skippedPlanRows} plan rows without a ledger entry`
      );

      res.setHeader("X-Crossed-Rows", String(result.crossedRows));
      res.setHeader("X-Skipped-Plan-Rows", String(result.skippedPlanRows));
      return sendWorkbook(res, "ledger-crossed.xlsx", writeLedgerWorkbook(ledger.headers, result.entries));
    }
  );

  return v1Router;
}
