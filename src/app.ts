import express, { NextFunction, Request, Response } from "express";
import { isJsonObject } from "./catalog/products-json";
import { PageFetcher } from "./core/fetcher";
import { Logger, silentLogger } from "./core/logger";
import { getErrorMessage, HttpClientOptions } from "./core/utils";
import { ScrapeFailure, ValidationError } from "./errors";
import { buildInsights } from "./orchestrator";

export const SERVICE_NAME = "storefront-insights";

export interface AppOptions {
  fetcher?: PageFetcher;
  http?: HttpClientOptions;
  logger?: Logger;
}

interface ErrorBody {
  error: string;
  message: string;
}

/** Map a thrown error onto a status class and a JSON body. */
export function toErrorResponse(err: unknown): {
  status: number;
  body: ErrorBody;
} {
  if (err instanceof ValidationError) {
    return {
      status: 400,
      body: { error: "validation_error", message: err.message },
    };
  }
  if (err instanceof ScrapeFailure) {
    return {
      status: 502,
      body: { error: "website_not_accessible", message: err.message },
    };
  }
  return {
    status: 500,
    body: { error: "internal_error", message: getErrorMessage(err) },
  };
}

export function createApp(options: AppOptions = {}) {
  const app = express();
  const logger = options.logger ?? silentLogger;

  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ status: "healthy", service: SERVICE_NAME });
  });

  app.post("/fetch_insights", async (req, res) => {
    const body: unknown = req.body;
    const websiteUrl = isJsonObject(body) ? body.website_url : undefined;

    if (typeof websiteUrl !== "string" || !websiteUrl.trim()) {
      res.status(400).json({
        error: "validation_error",
        message: "Missing website_url parameter",
      });
      return;
    }

    try {
      const insights = await buildInsights(websiteUrl, {
        fetcher: options.fetcher,
        http: options.http,
        logger,
      });
      res.json(insights);
    } catch (err) {
      const { status, body: errorBody } = toErrorResponse(err);
      logger(
        status >= 500 ? "error" : "warn",
        `POST /fetch_insights -> ${status}: ${errorBody.message}`
      );
      res.status(status).json(errorBody);
    }
  });

  app.use((req, res) => {
    res.status(404).json({
      error: "not_found",
      message: `No route for ${req.method} ${req.path}`,
    });
  });

  // Four arguments mark this as the error handler; body-parser reports bad JSON here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({
        error: "validation_error",
        message: "Request body is not valid JSON",
      });
      return;
    }
    logger("error", `Unhandled error: ${getErrorMessage(err)}`);
    res.status(500).json({ error: "internal_error", message: getErrorMessage(err) });
  });

  return app;
}
