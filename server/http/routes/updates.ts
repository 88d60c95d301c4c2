import { toErrorMessage } from "../../abort.js";
import { RollbackUnavailableError, UpdateBusyError, type UpdateController } from "../../updater/controller.js";
import type { RouteRequest, RouteResponse } from "../middleware.js";

export type RouteHandler = (request: RouteRequest, response: RouteResponse) => void | Promise<void>;

export interface RouteRegistrar {
  get(path: string, handler: RouteHandler): unknown;
  post(path: string, handler: RouteHandler): unknown;
}

export interface UpdateRouteDependencies {
  controller: Pick<UpdateController, "getStatus" | "requestCheck" | "rollbackNow">;
}

function handleUpdateRouteError(response: RouteResponse, error: unknown): void {
  if (error instanceof UpdateBusyError || error instanceof RollbackUnavailableError) {
    response.status(409).json({ error: error.message, code: error.code });
    return;
  }

  response.status(500).json({
    error: toErrorMessage(error)
  });
}

export function registerUpdateRoutes(app: RouteRegistrar, deps: UpdateRouteDependencies): void {
  app.get("/health", (_request, response) => {
    const status = deps.controller.getStatus();
    response.json({
      ok: true,
      now: new Date().toISOString(),
      ...(status.currentVersion ? { version: status.currentVersion } : {}),
      running: status.process !== null
    });
  });

  app.get("/api/updates/status", (_request, response) => {
    try {
      response.json({
        status: deps.controller.getStatus()
      });
    } catch (error) {
      handleUpdateRouteError(response, error);
    }
  });

  app.post("/api/updates/check", (_request, response) => {
    try {
      deps.controller.requestCheck();
      response.status(202).json({
        requested: true,
        status: deps.controller.getStatus()
      });
    } catch (error) {
      handleUpdateRouteError(response, error);
    }
  });

  app.post("/api/updates/rollback", async (_request, response) => {
    try {
      const outcome = await deps.controller.rollbackNow();
      const status = deps.controller.getStatus();
      if (outcome.kind === "rollback_failed") {
        response.status(500).json({ error: outcome.error, outcome, status });
        return;
      }
      response.json({ outcome, status });
    } catch (error) {
      handleUpdateRouteError(response, error);
    }
  });
}
