import type { RequestHandler } from "express";

// Static documentation assets are not worth a line each.
const QUIET_PREFIXES = ["/docs", "/reference"];

export const requestLogger: RequestHandler = (req, res, next) => {
  if (QUIET_PREFIXES.some((prefix) => req.path.startsWith(prefix))) {
    next();
    return;
  }

  const startedAt = process.hrtime.bigint();

  res.on("finish", () => {
    const line = JSON.stringify({
      type: "http_request",
      requestId: req.requestId ?? null,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Number((process.hrtime.bigint() - startedAt) / 1_000_000n),
      userId: req.user?.id ?? null,
      role: req.user?.role ?? null,
    });

    // One JSON line per request, at a level matching the status. No bodies, no tokens.
    if (res.statusCode >= 500) console.error(line);
    else if (res.statusCode >= 400) console.warn(line);
    else console.log(line);
  });

  next();
};
