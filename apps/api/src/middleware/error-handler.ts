import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { isMissingFieldsError } from "@dispatch/allocation-engine";
import { SheetNotFoundError, WorkbookReadError } from "@dispatch/importers";
import { ErrorCode, send400, send404, send422, sendError } from "../lib/api-error.js";

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isMissingFieldsError(err)) {
    return send422(res, err.message, { table: err.table, fields: err.fields });
  }
  if (err instanceof SheetNotFoundError) {
    return send404(res, err.message, { sheetName: err.sheetName, availableSheets: err.availableSheets });
  }
  if (err instanceof WorkbookReadError) {
    return send400(res, err.message);
  }
  if (err instanceof ZodError) {
    return send400(res, "Invalid request", err.flatten());
  }
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") {
      return sendError(res, 413, "Uploaded file is too large", ErrorCode.PAYLOAD_TOO_LARGE);
    }
    return send400(res, err.message, { field: err.field });
  }
  // Body parser invalid JSON
  if (err instanceof SyntaxError && "body" in err) {
    return send400(res, "invalid json");
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error("[api] unhandled error", { method: req.method, url: req.originalUrl || req.url, message });
  return sendError(res, 500, "Internal server error", ErrorCode.INTERNAL_ERROR);
}
