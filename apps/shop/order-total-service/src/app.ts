import express, { type NextFunction, type Request, type Response } from "express";
import type { Config } from "./config";
import { computeTotal, validateOrder } from "./order";
import { lookupRate, RateLookupError } from "./rates";

export const INSTRUCTIONS =
  "Try POSTing data to /compute such as: `curl localhost:8002/compute -XPOST -d '...'`";

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "api,Keep-Alive,User-Agent,Content-Type",
};

/** Every /compute response goes out with these, errors included. */
function withCors(_req: Request, res: Response, next: NextFunction) {
  res.set(CORS_HEADERS);
  next();
}

/**
 * Aborts res.locals.disconnected if the client goes away before the response
 * is written. Runs ahead of the body reader so a slow upload is covered too.
 */
export function trackDisconnect(_req: Request, res: Response, next: NextFunction) {
  const disconnected = new AbortController();
  res.locals.disconnected = disconnected.signal;
  res.on("close", () => {
    if (!res.writableFinished) disconnected.abort();
  });
  next();
}

function disconnectSignal(res: Response): AbortSignal | undefined {
  const signal: unknown = res.locals.disconnected;
  return signal instanceof AbortSignal ? signal : undefined;
}

function notFound(_req: Request, res: Response) {
  res.status(404).end();
}

function sendError(res: Response, status: number, message: string) {
  res.status(status).json({ status: "error", message });
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

function handleError(err: unknown, _req: Request, res: Response, next: NextFunction) {
  console.error("[OrderTotal] Request error:", err);
  if (res.headersSent) return next(err);
  const status = statusOf(err);
  // body reader errors (413, 415, ...) carry a message meant for the client
  const message = status < 500 && err instanceof Error ? err.message : "Internal server error";
  sendError(res, status, message);
}

export function createApp(config: Config) {
  const app = express();
  app.set("case sensitive routing", true);
  app.set("strict routing", true);

  // express would otherwise answer HEAD through the GET handler
  app.head("/", notFound);
  app.get("/", (_req, res) => {
    res.type("text/plain").send(INSTRUCTIONS);
  });

  app
    .route("/compute")
    .all(withCors)
    .options((_req, res) => {
      res.status(200).end();
    })
    // curl -d sends form content-type, so read the body as text whatever it claims to be
    .post(trackDisconnect, express.text({ type: () => true }), async (req, res) => {
      const raw = typeof req.body === "string" ? req.body : "";
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        console.error("[OrderTotal] Malformed order body:", err);
        return sendError(res, 400, "Invalid order: body is not valid JSON");
      }
      const validated = validateOrder(parsed);
      if ("error" in validated) {
        return sendError(res, 400, `Invalid order: ${validated.error}`);
      }
      const { order } = validated;

      const disconnected = disconnectSignal(res);

      try {
        const rate = await lookupRate(config.rateServiceUrl, order.shipping_zip, {
          timeoutMs: config.rateServiceTimeoutMs,
          signal: disconnected,
        });
        res.type("application/json").send(JSON.stringify(computeTotal(order, rate), null, 2));
      } catch (err) {
        if (disconnected?.aborted) {
          console.log(`[OrderTotal] Client went away, rate lookup for order ${order.order_id} cancelled`);
          return;
        }
        console.error("[OrderTotal] Rate lookup failed:", err);
        if (err instanceof RateLookupError) {
          return sendError(res, err.status, err.message);
        }
        throw err;
      }
    });

  app.use(notFound);
  app.use(handleError);

  return app;
}
