import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";

import { RiskError, RiskErrorCode } from "../risk/errors";
import { logger as defaultLogger, type Logger } from "../observability/logger";

export interface ErrorResponseBody {
  title: string;
  detail?: string;
  requestId: string;
  issues?: Array<{ path: string; message: string }>;
  fields?: string[];
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly title: string;
  public readonly detail?: string;

  constructor(status: number, title: string, detail?: string, options?: ErrorOptions) {
    super(detail ?? title, options);
    this.status = status;
    this.title = title;
    this.detail = detail;
    this.name = "HttpError";
  }
}

const RISK_ERROR_STATUS: Record<RiskErrorCode, { status: number; title: string }> = {
  DATA_UNAVAILABLE: { status: 503, title: "ServiceUnavailable" },
  MODEL_NOT_READY: { status: 503, title: "ModelNotReady" },
  MALFORMED_RECORD: { status: 400, title: "MalformedRecord" },
  INVALID_CUSTOMER_DATA: { status: 400, title: "InvalidCustomerData" },
};

function requestIdOf(req: Request): string {
  return req.id === undefined ? "unknown" : String(req.id);
}

export function sendError(
  req: Request,
  res: Response,
  status: number,
  title: string,
  extra: Omit<ErrorResponseBody, "title" | "requestId"> = {},
) {
  const body: ErrorResponseBody = { title, requestId: requestIdOf(req), ...extra };
  return res.status(status).json(body);
}

function hasClientStatus(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function createErrorHandler(log: Logger = defaultLogger) {
  return function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
    if (res.headersSent) {
      return;
    }
    const requestId = requestIdOf(req);

    if (err instanceof HttpError) {
      const line = `${err.title}: ${err.detail ?? err.message}`;
      if (err.status >= 500) {
        log.error({ requestId, status: err.status }, line);
      } else {
        log.warn({ requestId, status: err.status }, line);
      }
      return sendError(req, res, err.status, err.title, err.detail ? { detail: err.detail } : {});
    }

    if (err instanceof RiskError) {
      const { status, title } = RISK_ERROR_STATUS[err.code];
      const rawFields = err.details?.fields;
      const fields = Array.isArray(rawFields) ? rawFields.map(String) : undefined;
      const logFields = { requestId, status, code: err.code };
      if (status >= 500) {
        log.error(logFields, err.message);
      } else {
        log.warn(logFields, err.message);
      }
      return sendError(req, res, status, title, { detail: err.message, ...(fields ? { fields } : {}) });
    }

    if (err instanceof ZodError) {
      log.warn({ requestId, status: 400 }, "validation_failed");
      return sendError(req, res, 400, "ValidationFailed", {
        detail: "Validation failed",
        issues: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
    }

    // Body-parser failures (malformed JSON, oversized payloads) carry a 4xx status.
    if (hasClientStatus(err)) {
      log.warn({ requestId, status: err.status }, err.message);
      return sendError(req, res, err.status, "BadRequest", { detail: err.message });
    }

    const message = err instanceof Error ? err.message : "Unexpected error";
    log.error({ err, requestId }, "request_error");
    return sendError(req, res, 500, "InternalServerError", { detail: message });
  };
}
