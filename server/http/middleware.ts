import cors from "cors";
import type { IncomingHttpHeaders } from "node:http";
import { timingSafeEqual } from "node:crypto";

import type { SupervisorLogger } from "../runtime/logger.js";

export interface RouteRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
}

export interface RouteResponse {
  status(code: number): RouteResponse;
  json(payload: unknown): unknown;
  setHeader(name: string, value: string): unknown;
}

export function extractBearerToken(value: string | undefined): string {
  if (!value) {
    return "";
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return "";
  }

  const match = trimmed.match(/^bearer\s+(.+)$/i);
  if (match?.[1]) {
    return match[1].trim();
  }

  return trimmed;
}

function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}

/** Accepts `Authorization: Bearer <token>` or `x-api-token: <token>`. An empty expected token never matches. */
export function isAuthorizedRequest(headers: IncomingHttpHeaders, expectedToken: string): boolean {
  const expected = expectedToken.trim();
  if (expected.length === 0) {
    return false;
  }

  const bearerToken = extractBearerToken(
    typeof headers.authorization === "string" ? headers.authorization : undefined
  );
  const headerToken = typeof headers["x-api-token"] === "string" ? headers["x-api-token"].trim() : "";
  const candidate = bearerToken || headerToken;

  return candidate.length > 0 && constantTimeEquals(candidate, expected);
}

export function createSecurityHeadersMiddleware(): (request: RouteRequest, response: RouteResponse, next: () => void) => void {
  return (_request, response, next) => {
    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("X-Frame-Options", "DENY");
    response.setHeader("Referrer-Policy", "no-referrer");
    next();
  };
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowAnyOrigin: boolean;
}

export function createCorsMiddleware(config: CorsConfig) {
  return cors({
    origin: (origin, callback) => {
      if (!origin || config.allowAnyOrigin || config.allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(null, false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-token"],
    credentials: false,
    maxAge: 600
  });
}

export function createApiAuthMiddleware(
  apiAuthToken: string,
  publicPaths: readonly string[] = ["/health"]
): (request: RouteRequest, response: RouteResponse, next: () => void) => void {
  const open = new Set(publicPaths);

  return (request, response, next) => {
    if (request.method === "OPTIONS" || open.has(request.path)) {
      next();
      return;
    }

    if (!isAuthorizedRequest(request.headers, apiAuthToken)) {
      response.status(401).json({ error: "Unauthorized" });
      return;
    }

    next();
  };
}

export function createNotFoundMiddleware(): (request: RouteRequest, response: RouteResponse) => void {
  return (_request, response) => {
    response.status(404).json({ error: "Not found" });
  };
}

export function createErrorMiddleware(
  logger: SupervisorLogger
): (error: unknown, request: RouteRequest, response: RouteResponse, next: (error?: unknown) => void) => void {
  return (error, request, response, _next) => {
    void _next;
    logger.error(`Unhandled error on ${request.method} ${request.path}.`, error);
    response.status(500).json({ error: "Internal server error" });
  };
}
