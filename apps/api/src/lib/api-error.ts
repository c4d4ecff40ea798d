import type { Response } from "express";

/** Codes carried by the error envelope of every failed request. */
export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_FOUND: "NOT_FOUND",
  BAD_REQUEST: "BAD_REQUEST",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Standard error response shape:
 *   { error: string, code: string, details?: object }
 */
export function sendError(
  res: Response,
  status: number,
  error: string,
  code: ErrorCodeType = ErrorCode.BAD_REQUEST,
  details?: object,
): void {
  const body: { error: string; code: string; details?: object } = { error, code };
  if (details) body.details = details;
  res.status(status).json(body);
}

export function send404(res: Response, message: string, details?: object): void {
  sendError(res, 404, message, ErrorCode.NOT_FOUND, details);
}

export function send400(res: Response, message: string, details?: object): void {
  sendError(res, 400, message, ErrorCode.BAD_REQUEST, details);
}

export function send422(res: Response, message: string, details?: object): void {
  sendError(res, 422, message, ErrorCode.VALIDATION_FAILED, details);
}
