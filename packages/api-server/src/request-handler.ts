import { createHash, timingSafeEqual } from "node:crypto";

import { ShellpassErrorCodes, type Result, type ShellpassError } from "@shellpass/contracts";
import type { SessionOrchestrator } from "@shellpass/orchestrator";
import {
  createShellpassCounter,
  createShellpassHistogram,
  createShellpassLogger,
  getShellpassTracer,
  runWithSpan,
  SpanStatusCode,
  type ShellpassCounter,
  type ShellpassHistogram,
  type ShellpassInstrumentationOptions,
  type ShellpassLogger,
  type ShellpassTracer,
} from "@shellpass/telemetry";

export type SessionOrchestratorLike = Pick<
  SessionOrchestrator,
  "createSession" | "getSession" | "deleteSession" | "resolveTerminal" | "exportLeads" | "health"
>;

export interface ConnectionInfo {
  readonly remoteAddress?: string;
}

export type ShellpassRequestHandler = (request: Request, connection?: ConnectionInfo) => Promise<Response>;

export interface RequestHandlerMetrics {
  readonly requestCounter: ShellpassCounter;
  readonly requestDuration: ShellpassHistogram;
}

export interface RequestHandlerOptions {
  /** Secret required by the lead export. Without one the export is always refused. */
  readonly adminSecret?: string;
  /** Honour `X-Forwarded-For` when recording the client address of a lead. */
  readonly trustProxy?: boolean;
  readonly metrics?: RequestHandlerMetrics;
  readonly instrumentation?: ShellpassInstrumentationOptions;
  readonly tracer?: ShellpassTracer;
  readonly logger?: ShellpassLogger;
}

const HttpErrorCodes = {
  routeNotFound: "route.not_found",
  methodNotAllowed: "route.method_not_allowed",
  invalidJson: "request.invalid_json",
  internalError: "internal_error",
} as const;

const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  [ShellpassErrorCodes.invalidEmail]: 400,
  [ShellpassErrorCodes.capacityExceeded]: 503,
  [ShellpassErrorCodes.startFailed]: 502,
  [ShellpassErrorCodes.notFound]: 404,
  [ShellpassErrorCodes.notReady]: 409,
  [ShellpassErrorCodes.expired]: 410,
  [ShellpassErrorCodes.leadsUnauthorized]: 403,
  [ShellpassErrorCodes.leadStoreFailed]: 503,
  [HttpErrorCodes.routeNotFound]: 404,
  [HttpErrorCodes.methodNotAllowed]: 405,
  [HttpErrorCodes.invalidJson]: 400,
};

type RouteName = "create_session" | "session" | "terminal" | "leads" | "health" | "unmatched";

interface MatchedRoute {
  readonly name: RouteName;
  readonly methods: ReadonlyArray<string>;
  readonly sessionId?: string;
}

const SESSION_PATH = /^\/api\/session\/([^/]+)$/;
const TERMINAL_PATH = /^\/terminal\/([^/]+)$/;

const normalizePath = (path: string): string => (path.endsWith("/") && path !== "/" ? path.slice(0, -1) : path);

const decodeSegment = (segment: string | undefined): string | undefined => {
  if (segment === undefined) {
    return undefined;
  }
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
};

const matchRoute = (pathname: string): MatchedRoute => {
  const path = normalizePath(pathname);
  if (path === "/api/session") {
    return { name: "create_session", methods: ["POST"] };
  }
  if (path === "/api/leads") {
    return { name: "leads", methods: ["GET"] };
  }
  if (path === "/api/health") {
    return { name: "health", methods: ["GET"] };
  }

  const session = SESSION_PATH.exec(path);
  const sessionId = decodeSegment(session?.[1]);
  if (sessionId) {
    return { name: "session", methods: ["GET", "DELETE"], sessionId };
  }

  const terminal = TERMINAL_PATH.exec(path);
  const terminalId = decodeSegment(terminal?.[1]);
  if (terminalId) {
    return { name: "terminal", methods: ["GET"], sessionId: terminalId };
  }

  return { name: "unmatched", methods: [] };
};

const json = (status: number, body: unknown, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });

const errorResponse = (code: string, message: string, headers?: Record<string, string>): Response =>
  json(STATUS_BY_CODE[code] ?? 500, { error: { code, message } }, headers);

const fromResult = <T>(result: Result<T, ShellpassError>, status: number): Response =>
  result.ok ? json(status, result.value) : errorResponse(result.error.code, result.error.message);

const digest = (value: string): Buffer => createHash("sha256").update(value).digest();

/** Compares fixed-length digests so the check takes the same time whatever the input. */
const secretMatches = (expected: string, provided: string): boolean =>
  timingSafeEqual(digest(expected), digest(provided));

const readProvidedSecret = (request: Request, url: URL): string | undefined => {
  const authorization = request.headers.get("authorization");
  if (authorization?.toLowerCase().startsWith("bearer ")) {
    return authorization.slice("bearer ".length).trim();
  }
  return url.searchParams.get("secret") ?? undefined;
};

const readEmail = async (request: Request): Promise<{ readonly email: unknown } | undefined> => {
  try {
    const body: unknown = await request.json();
    if (typeof body === "object" && body !== null && "email" in body) {
      return { email: body.email };
    }
    return { email: undefined };
  } catch {
    return undefined;
  }
};

const clientAddress = (
  request: Request,
  connection: ConnectionInfo | undefined,
  trustProxy: boolean,
): string | undefined => {
  if (trustProxy) {
    const forwarded = request.headers.get("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) {
      return forwarded;
    }
  }
  return connection?.remoteAddress;
};

const resolveMetrics = (
  metrics: RequestHandlerMetrics | undefined,
  instrumentation: ShellpassInstrumentationOptions,
): RequestHandlerMetrics => {
  if (metrics) {
    return metrics;
  }

  return {
    requestCounter: createShellpassCounter("shellpass_http_requests_total", {
      description: "Count of HTTP requests handled.",
      instrumentation,
    }),
    requestDuration: createShellpassHistogram("shellpass_http_request_duration_ms", {
      description: "HTTP request duration.",
      unit: "ms",
      instrumentation,
    }),
  };
};

export const createShellpassRequestHandler = (
  orchestrator: SessionOrchestratorLike,
  options: RequestHandlerOptions = {},
): ShellpassRequestHandler => {
  const instrumentation = options.instrumentation ?? { name: "api-server" };
  const metrics = resolveMetrics(options.metrics, instrumentation);
  const tracer = options.tracer ?? getShellpassTracer(instrumentation);
  const logger = options.logger ?? createShellpassLogger({ name: instrumentation.name ?? "api-server" });
  const adminSecret = options.adminSecret;
  const trustProxy = options.trustProxy ?? true;

  const route = async (
    request: Request,
    url: URL,
    matched: MatchedRoute,
    connection: ConnectionInfo | undefined,
  ): Promise<Response> => {
    if (matched.name === "unmatched") {
      return errorResponse(HttpErrorCodes.routeNotFound, "Route not found.");
    }
    if (!matched.methods.includes(request.method)) {
      return errorResponse(HttpErrorCodes.methodNotAllowed, "Method not allowed.", {
        allow: matched.methods.join(", "),
      });
    }

    switch (matched.name) {
      case "create_session": {
        const body = await readEmail(request);
        if (!body) {
          return errorResponse(HttpErrorCodes.invalidJson, "Request body must be JSON.");
        }
        const ip = clientAddress(request, connection, trustProxy);
        const created = await orchestrator.createSession({ email: body.email, ...(ip ? { ip } : {}) });
        return fromResult(created, 201);
      }
      case "session": {
        const sessionId = matched.sessionId ?? "";
        if (request.method === "DELETE") {
          return fromResult(await orchestrator.deleteSession(sessionId), 202);
        }
        return fromResult(orchestrator.getSession(sessionId), 200);
      }
      case "terminal": {
        const target = orchestrator.resolveTerminal(matched.sessionId ?? "");
        if (!target.ok) {
          return errorResponse(target.error.code, target.error.message);
        }
        return new Response(null, { status: 302, headers: { location: target.value.path } });
      }
      case "leads": {
        const provided = readProvidedSecret(request, url);
        if (!adminSecret || provided === undefined || !secretMatches(adminSecret, provided)) {
          logger.warn("api.leads_unauthorized", { configured: Boolean(adminSecret) });
          return errorResponse(ShellpassErrorCodes.leadsUnauthorized, "Unauthorized.");
        }
        const leads = await orchestrator.exportLeads();
        if (!leads.ok) {
          return errorResponse(leads.error.code, leads.error.message);
        }
        return json(200, { leads: leads.value });
      }
      case "health":
        return json(200, orchestrator.health());
    }
  };

  return async (request: Request, connection?: ConnectionInfo): Promise<Response> => {
    const url = new URL(request.url);
    const matched = matchRoute(url.pathname);
    const start = performance.now();

    const record = (status: number) => {
      const attributes = { route: matched.name, method: request.method, status };
      metrics.requestCounter.add(1, attributes);
      metrics.requestDuration.record(performance.now() - start, attributes);
    };

    try {
      return await runWithSpan(
        tracer,
        "api.request",
        async (span) => {
          span.setAttribute("http.method", request.method);
          span.setAttribute("http.target", url.pathname);

          const response = await route(request, url, matched, connection);
          span.setAttribute("http.status_code", response.status);
          record(response.status);
          logger.debug("api.request_completed", {
            route: matched.name,
            method: request.method,
            status: response.status,
          });
          return response;
        },
        {
          attributes: { "http.route": matched.name },
          onError: (error, span) => {
            span.setStatus({ code: SpanStatusCode.ERROR });
            span.setAttribute("http.status_code", 500);
            logger.error("api.request_failed", {
              route: matched.name,
              method: request.method,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        },
      );
    } catch {
      record(500);
      return errorResponse(HttpErrorCodes.internalError, "Internal server error.");
    }
  };
};
