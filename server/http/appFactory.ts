import express from "express";

import type { ControlApiConfig } from "../runtime/config.js";
import type { SupervisorLogger } from "../runtime/logger.js";
import {
  createApiAuthMiddleware,
  createCorsMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware
} from "./middleware.js";
import { registerUpdateRoutes, type UpdateRouteDependencies } from "./routes/updates.js";

export interface ControlAppDependencies extends UpdateRouteDependencies {
  config: ControlApiConfig;
  logger: SupervisorLogger;
}

export function createControlApp(deps: ControlAppDependencies): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: deps.config.corsOrigins,
      allowAnyOrigin: deps.config.allowAnyCorsOrigin
    })
  );
  app.use(express.json({ limit: "16kb" }));
  app.use(createApiAuthMiddleware(deps.config.authToken));

  registerUpdateRoutes(app, { controller: deps.controller });

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware(deps.logger));

  return app;
}
