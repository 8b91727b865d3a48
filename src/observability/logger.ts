import { randomUUID } from "node:crypto";
import pino, { type Logger } from "pino";
import pinoHttp from "pino-http";

export type { Logger };

const REQUEST_ID_HEADER = "x-request-id";

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({
    name: "risk-signals",
    level,
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie"],
      remove: true,
    },
  });
}

export const logger = createLogger();

export function createHttpLogger(base: Logger = logger) {
  return pinoHttp({
    logger: base,
    genReqId(req, res) {
      const headerId = req.headers[REQUEST_ID_HEADER];
      const incoming = Array.isArray(headerId) ? headerId[0] : headerId;
      const id = incoming && incoming.trim() ? incoming.trim() : randomUUID();
      res.setHeader(REQUEST_ID_HEADER, id);
      return id;
    },
    customLogLevel(_req, res, err) {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },
  });
}
