import type { IncomingHttpHeaders } from "node:http";

import type { RouteRequest, RouteResponse } from "../../server/http/middleware.js";
import type { RouteHandler, RouteRegistrar } from "../../server/http/routes/updates.js";

interface MockResponse extends RouteResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  status(code: number): MockResponse;
  json(payload: unknown): MockResponse;
  setHeader(name: string, value: string): MockResponse;
}

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

export function createRouteHarness(): {
  app: RouteRegistrar;
  route(method: "GET" | "POST", path: string): RouteHandler;
} {
  const routes = new Map<string, RouteHandler>();

  const register = (method: "GET" | "POST") => (path: string, handler: RouteHandler): void => {
    routes.set(routeKey(method, path), handler);
  };

  return {
    app: {
      get: register("GET"),
      post: register("POST")
    },
    route(method, path) {
      const handler = routes.get(routeKey(method, path));
      if (!handler) {
        throw new Error(`Route not registered: ${method} ${path}`);
      }
      return handler;
    }
  };
}

export function createMockResponse(): MockResponse {
  const response: MockResponse = {
    statusCode: 200,
    body: undefined,
    headers: {},
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    json(payload: unknown) {
      this.body = payload;
      return this;
    },
    setHeader(name: string, value: string) {
      this.headers[name.toLowerCase()] = value;
      return this;
    }
  };

  return response;
}

export function createMockRequest(
  request: Partial<{ path: string; method: string; headers: IncomingHttpHeaders }> = {}
): RouteRequest {
  return {
    path: request.path ?? "/",
    method: request.method ?? "GET",
    headers: request.headers ?? {}
  };
}

export async function invokeRoute(
  handler: RouteHandler,
  request: Partial<{ path: string; method: string; headers: IncomingHttpHeaders }> = {}
): Promise<MockResponse> {
  const response = createMockResponse();
  await handler(createMockRequest(request), response);
  return response;
}
