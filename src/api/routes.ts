/**
 * HTTP routes for workloads and migrations.
 *
 * Endpoints:
 *   GET    /health
 *   POST   /workloads                  GET /workloads
 *   GET    /workloads/{ip}             PUT /workloads/{ip}      DELETE /workloads/{ip}
 *   POST   /migrations                 GET /migrations
 *   GET    /migrations/{id}            PUT /migrations/{id}     DELETE /migrations/{id}
 *   POST   /migrations/{id}/start      (?async=true returns 202 without waiting)
 *   GET    /migrations/{id}/status
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { httpStatusFor } from "../errors.js";
import { InvalidJsonError, readJsonBody, sendJson, type MigratorHttpHandler } from "../server.js";
import type { MigrationService } from "../services/migrations.js";
import type { WorkloadService } from "../services/workloads.js";
import type { Logger } from "../types.js";
import {
  decodeMigration,
  decodeMigrationPatch,
  decodeStartDelay,
  decodeWorkload,
  decodeWorkloadPatch,
} from "./codec.js";

export interface ApiContext {
  workloads: WorkloadService;
  migrations: MigrationService;
  logger: Logger;
  /** Used when a start request carries no delay. */
  defaultDelayMinutes: number;
}

interface RouteResult {
  status: number;
  /** null sends an empty body. */
  body: unknown;
}

interface RouteRequest {
  params: string[];
  query: URLSearchParams;
  body(): Promise<unknown>;
}

type RouteHandler = (req: RouteRequest, ctx: ApiContext) => Promise<RouteResult> | RouteResult;

interface Route {
  /** Literal segments; "*" captures one segment into params. */
  pattern: string[];
  methods: Partial<Record<string, RouteHandler>>;
}

const ok = (body: unknown): RouteResult => ({ status: 200, body });

const ROUTES: Route[] = [
  {
    pattern: ["health"],
    methods: { GET: () => ok({ ok: true }) },
  },
  {
    pattern: ["workloads"],
    methods: {
      GET: (_req, ctx) => ok(ctx.workloads.list().map((w) => w.toRecord())),
      POST: async (req, ctx) => {
        const workload = ctx.workloads.create(decodeWorkload(await req.body()));
        return { status: 201, body: workload.toRecord() };
      },
    },
  },
  {
    pattern: ["workloads", "*"],
    methods: {
      GET: (req, ctx) => ok(ctx.workloads.get(req.params[0]).toRecord()),
      PUT: async (req, ctx) =>
        ok(ctx.workloads.update(req.params[0], decodeWorkloadPatch(await req.body())).toRecord()),
      DELETE: (req, ctx) => {
        ctx.workloads.remove(req.params[0]);
        return { status: 204, body: null };
      },
    },
  },
  {
    pattern: ["migrations"],
    methods: {
      GET: (_req, ctx) => ok(ctx.migrations.list().map((m) => m.toRecord())),
      POST: async (req, ctx) => {
        const migration = ctx.migrations.create(decodeMigration(await req.body()));
        return { status: 201, body: migration.toRecord() };
      },
    },
  },
  {
    pattern: ["migrations", "*"],
    methods: {
      GET: (req, ctx) => ok(ctx.migrations.get(req.params[0]).toRecord()),
      PUT: async (req, ctx) =>
        ok(ctx.migrations.update(req.params[0], decodeMigrationPatch(await req.body())).toRecord()),
      DELETE: (req, ctx) => {
        ctx.migrations.remove(req.params[0]);
        return { status: 204, body: null };
      },
    },
  },
  {
    pattern: ["migrations", "*", "start"],
    methods: {
      POST: async (req, ctx) => {
        const delayMs = decodeStartDelay(await req.body(), ctx.defaultDelayMinutes);
        if (req.query.get("async") === "true") {
          return { status: 202, body: ctx.migrations.startInBackground(req.params[0], delayMs).toRecord() };
        }
        const migration = await ctx.migrations.start(req.params[0], delayMs);
        return ok(migration.toRecord());
      },
    },
  },
  {
    pattern: ["migrations", "*", "status"],
    methods: { GET: (req, ctx) => ok(ctx.migrations.status(req.params[0])) },
  },
];

function matchRoute(segments: string[]): { route: Route; params: string[] } | null {
  for (const route of ROUTES) {
    if (route.pattern.length !== segments.length) continue;
    const params: string[] = [];
    const matched = route.pattern.every((part, i) => {
      if (part === "*") {
        params.push(segments[i]);
        return true;
      }
      return part === segments[i];
    });
    if (matched) return { route, params };
  }
  return null;
}

function splitPath(pathname: string): string[] | null {
  try {
    return pathname.split("/").filter(Boolean).map((s) => decodeURIComponent(s));
  } catch {
    // malformed percent-encoding
    return null;
  }
}

/**
 * Create the request handler. Unknown paths are declined (the server
 * answers 404); known paths with another method get 405.
 */
export function createApiHandler(ctx: ApiContext): MigratorHttpHandler {
  const { logger } = ctx;

  return async (req: IncomingMessage, res: ServerResponse): Promise<boolean> => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const segments = splitPath(url.pathname);
    const match = segments ? matchRoute(segments) : null;
    if (!match) return false;

    const method = req.method ?? "GET";
    const handler = match.route.methods[method];
    if (!handler) {
      res.setHeader("Allow", Object.keys(match.route.methods).join(", "));
      sendJson(res, 405, { error: "method not allowed" });
      return true;
    }

    try {
      const result = await handler(
        { params: match.params, query: url.searchParams, body: () => readJsonBody(req) },
        ctx,
      );
      sendJson(res, result.status, result.body);
    } catch (err) {
      if (err instanceof InvalidJsonError) {
        sendJson(res, 400, { error: err.message });
        return true;
      }
      const status = httpStatusFor(err);
      const msg = err instanceof Error ? err.message : String(err);
      if (status === 500) {
        logger.error(`[migrator:api] ${method} ${url.pathname} failed: ${msg}`);
        sendJson(res, 500, { error: "internal server error" });
      } else {
        logger.debug?.(`[migrator:api] ${method} ${url.pathname} → ${status}: ${msg}`);
        sendJson(res, status, { error: msg });
      }
    }
    return true;
  };
}
