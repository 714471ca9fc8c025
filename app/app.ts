/**
 * Express application: middleware, API routes and error fallbacks.
 * Kept separate from the entry point so tests can mount it on an ephemeral port.
 */

import compression from "compression";
import express from "express";
import type { ErrorRequestHandler, RequestHandler, Response as ExpressResponse, Router } from "express";
import morgan from "morgan";
import { resolveActor } from "~/lib/auth/actor";
import type { ActorHeaders } from "~/lib/auth/actor";
import type { AppSettings } from "~/lib/config/settings";
import type { RouteDefinition, RouteHandler } from "~/lib/http/route";
import { UnauthenticatedError } from "~/lib/errors";
import { toErrorResponse } from "~/lib/http/responses";
import { getLogger } from "~/lib/log/logger";
import type { TaskRuntime } from "~/lib/task-queue/startup";
import routes from "./routes";

const log = getLogger({ module: "App" });

// Bulk delete accepts up to 10k keys of up to 1 KiB each
const JSON_BODY_LIMIT = "12mb";

async function sendResponse(res: ExpressResponse, response: Response): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.send(await response.text());
}

function mount(handler: RouteHandler, runtime: TaskRuntime, headers: ActorHeaders): RequestHandler {
  return (req, res, next) => {
    const actor = resolveActor(req.headers, headers);
    const pending = actor
      ? handler({ params: req.params, body: req.body, actor, runtime })
      : Promise.resolve(toErrorResponse(new UnauthenticatedError(), log, "request rejected", "Authentication required"));

    pending.then(response => sendResponse(res, response)).catch(next);
  };
}

function register(router: Router, definition: RouteDefinition, handler: RequestHandler): void {
  switch (definition.method) {
    case "get":
      router.get(definition.path, handler);
      break;
    case "post":
      router.post(definition.path, handler);
      break;
    case "delete":
      router.delete(definition.path, handler);
      break;
  }
}

function httpStatusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

const handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const status = httpStatusOf(error);

  if (error instanceof SyntaxError && status === 400) {
    res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_ERROR" });
    return;
  }
  if (status === 413) {
    res.status(413).json({ error: "Request body too large", code: "VALIDATION_ERROR" });
    return;
  }

  log.error({ err: error, method: req.method, path: req.path }, "unhandled request error");
  if (!res.headersSent) {
    res.status(500).json({ error: "Internal server error", code: "INTERNAL" });
  }
};

export function createApp(runtime: TaskRuntime, settings: Pick<AppSettings, "env" | "auth">) {
  const app = express();

  // Trust proxy for correct client IP
  app.set("trust proxy", true);

  app.use(compression());

  if (settings.env === "development") {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  const router = express.Router();
  for (const definition of routes) {
    register(router, definition, mount(definition.handler, runtime, settings.auth));
  }
  app.use(router);

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found", code: "NOT_FOUND" });
  });

  app.use(handleError);

  return app;
}
