// HTTP front end: JSON routes over one shared agent
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { readFileSync } from "node:fs";
import type { Server } from "node:http";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { CalculatorAgent } from "../lib/agent.ts";
import { serializeEntry } from "../lib/history.ts";
import type { Logger } from "../logger.ts";

// Browser page for GET /; it talks to the JSON routes below
const INDEX_HTML_PATH = fileURLToPath(new URL("./static/index.html", import.meta.url));

// Blank queries are rejected, but the query reaches the agent untouched
const CalculateRequestSchema = z.object({
  query: z.string().refine((s) => s.trim().length > 0),
});

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().min(1),
});

interface ApiError {
  error: string;
  message?: string;
}

export interface WebAppOptions {
  /** Default number of entries for GET /history */
  historyLimit?: number;
}

/**
 * Build the express app. processQuery is synchronous, so requests sharing
 * the agent never interleave inside a history update.
 */
export function createWebApp(
  agent: CalculatorAgent,
  logger: Logger,
  options: WebAppOptions = {},
): express.Express {
  const historyLimit = options.historyLimit ?? 10;
  const indexHtml = readFileSync(INDEX_HTML_PATH, "utf-8");
  const app = express();

  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info({ method: req.method, url: req.url }, "request");
    next();
  });

  app.get("/", (_req: Request, res: Response) => {
    res.type("html").send(indexHtml);
  });

  /**
   * POST /calculate {query}
   */
  app.post("/calculate", (req: Request, res: Response) => {
    const body = CalculateRequestSchema.safeParse(req.body);
    if (!body.success) {
      sendError(res, 400, { error: "No query provided" });
      return;
    }
    res.json({ result: agent.processQuery(body.data.query) });
  });

  /**
   * GET /history?limit=N
   */
  app.get("/history", (req: Request, res: Response) => {
    const query = HistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendError(res, 400, { error: "Bad Request", message: "limit must be an integer from 1 to 1000" });
      return;
    }
    const entries = agent.recentHistory(query.data.limit ?? historyLimit);
    res.json({ history: entries.map(serializeEntry) });
  });

  /**
   * GET /history/search?q=keyword
   */
  app.get("/history/search", (req: Request, res: Response) => {
    const query = SearchQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendError(res, 400, { error: "Bad Request", message: "q is required" });
      return;
    }
    res.json({ history: agent.searchHistory(query.data.q).map(serializeEntry) });
  });

  /**
   * POST /clear
   */
  app.post("/clear", (_req: Request, res: Response) => {
    agent.clearHistory();
    res.json({ success: true });
  });

  app.use(errorHandler(logger));

  return app;
}

function sendError(res: Response, status: number, body: ApiError): void {
  res.status(status).json(body);
}

/**
 * Error handling middleware: malformed JSON -> 400, anything else -> 500
 */
function errorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof SyntaxError && "body" in error) {
      sendError(res, 400, { error: "Invalid JSON body" });
      return;
    }

    logger.error({ err: error, method: req.method, url: req.url }, "request failed");
    sendError(res, 500, { error: "Internal Server Error" });
  };
}

/**
 * Listen and resolve once the port is bound
 */
export function startWebServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}
