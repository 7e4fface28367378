import type { ErrorRequestHandler } from "express";

const isBodyParseError = (err: unknown): boolean =>
  typeof err === "object" &&
  err !== null &&
  "type" in err &&
  err.type === "entity.parse.failed";

// body-parser tags request faults (too large, bad charset) with a 4xx status.
const clientErrorStatus = (err: unknown): number | null => {
  if (typeof err !== "object" || err === null) return null;
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : null;
};

export const jsonErrors: ErrorRequestHandler = (err, req, res, next) => {
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: "Invalid JSON payload" });
  }

  if (res.headersSent) {
    return next(err);
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    const message = err instanceof Error ? err.message : "Bad request";
    console.error(`[ERROR] Rejected ${req.method} ${req.path} (${status}): ${message}`);
    return res.status(status).json({ error: message });
  }

  console.error(`[ERROR] Unhandled error on ${req.method} ${req.path}:`, err);
  return res.status(500).json({ error: "Internal server error" });
};
