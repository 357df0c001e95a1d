/**
 * API Server
 *
 * Small JSON API over the intake store: pipeline health, fulfillment
 * records and the local policyholder directory. Fulfillment records are
 * read-only here; only the pipeline writes them. A claim fetched by its id
 * carries freshly signed archive URLs.
 */

import * as http from "node:http";
import { z } from "zod";
import { FULFILLMENT_STATUSES } from "../types/fulfillment.js";
import { normalizeEmail, type SqlitePolicyholderStore } from "../storage/policyholders.js";
import type { FulfillmentGateway } from "../storage/fulfillments.js";
import type { FulfillmentRecord } from "../types/fulfillment.js";
import type { ArchivalUploader } from "../services/archival-uploader.js";
import type { PipelineStats } from "../services/intake-pipeline.js";
import type { Logger } from "../services/logger.js";

const PORT = 3001;

export interface ApiDependencies {
  gateway: FulfillmentGateway;
  policyholders: SqlitePolicyholderStore;
  archive: ArchivalUploader;
  stats: () => PipelineStats;
  logger?: Logger;
}

type RouteHandler = (
  params: Record<string, string>,
  query: URLSearchParams,
  body: unknown
) => Promise<unknown>;

type Method = "GET" | "POST";

// =============================================
// REQUEST/RESPONSE HELPERS
// =============================================

/** Send JSON response with CORS headers */
function json(res: http.ServerResponse, data: unknown, status = 200) {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(JSON.stringify(data));
}

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

/** Throw an HTTP error */
function httpError(status: number, message: string): never {
  throw new HttpError(status, message);
}

/** Require that an entity exists, or throw 404 */
function requireEntity<T>(
  entity: T | null | undefined,
  name: string
): asserts entity is T {
  if (!entity) httpError(404, `${name} not found`);
}

/** Parse JSON body from request */
async function parseBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const data = Buffer.concat(chunks).toString("utf-8");
  if (!data) return {};
  try {
    return JSON.parse(data);
  } catch {
    httpError(400, "Request body must be valid JSON");
  }
}

const policyholderSchema = z.object({
  email: z.string().trim().email(),
  policyType: z.string().trim().min(1),
  policyIssuedDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD"),
});

// === ROUTES ===

function buildRoutes(deps: ApiDependencies): Record<Method, Record<string, RouteHandler>> {
  const { gateway, policyholders, archive } = deps;

  /** Stored URLs expire; re-sign them from the archived keys. */
  async function withFreshUrls(record: FulfillmentRecord): Promise<FulfillmentRecord> {
    if (record.status !== "completed" || record.mailContentKey === null) return record;

    const urls = await archive.signedUrls({
      mailContentKey: record.mailContentKey,
      attachmentKeys: record.attachmentKeys,
    });
    return { ...record, ...urls };
  }

  return {
    GET: {
      "/api/health": async () => ({
        status: "ok",
        pipeline: deps.stats(),
        fulfillments: await gateway.countByStatus(),
      }),

      "/api/fulfillments": async (_params, query) => {
        const status = query.get("status");
        if (status === null) return gateway.list();

        const parsed = z.enum(FULFILLMENT_STATUSES).safeParse(status);
        if (!parsed.success) {
          httpError(400, `status must be one of ${FULFILLMENT_STATUSES.join(", ")}`);
        }
        return gateway.list(parsed.data);
      },

      "/api/fulfillments/:id": async (params) => {
        const record = await gateway.find({ id: params.id ?? "" });
        requireEntity(record, "Fulfillment");
        return record;
      },

      "/api/claims/:claimId": async (params) => {
        const record = await gateway.find({ claimId: params.claimId ?? "" });
        requireEntity(record, "Claim");
        return withFreshUrls(record);
      },

      "/api/policyholders/:email": async (params) => {
        const policyholder = await policyholders.lookup(normalizeEmail(params.email ?? ""));
        requireEntity(policyholder, "Policyholder");
        return policyholder;
      },
    },

    POST: {
      "/api/policyholders": async (_params, _query, body) => {
        const parsed = policyholderSchema.safeParse(body);
        if (!parsed.success) {
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
          httpError(400, issues);
        }

        const { created, policyholder } = await policyholders.create(parsed.data);
        if (!created) {
          httpError(409, `Policyholder ${policyholder.email} already exists`);
        }
        return policyholder;
      },
    },
  };
}

// === SERVER ===

function isMethod(method: string): method is Method {
  return method === "GET" || method === "POST";
}

function matchRoute(
  routes: Record<Method, Record<string, RouteHandler>>,
  method: string,
  pathname: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  if (!isMethod(method)) return null;

  const pathParts = pathname.split("/");
  for (const [pattern, handler] of Object.entries(routes[method])) {
    const patternParts = pattern.split("/");
    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let match = true;

    for (const [i, part] of patternParts.entries()) {
      const actual = pathParts[i] ?? "";
      if (part.startsWith(":")) {
        params[part.slice(1)] = decodeURIComponent(actual);
      } else if (part !== actual) {
        match = false;
        break;
      }
    }

    if (match) return { handler, params };
  }

  return null;
}

export function createApiServer(deps: ApiDependencies): http.Server {
  const routes = buildRoutes(deps);
  const logger = deps.logger ?? console;

  async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    // CORS preflight
    if (req.method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }

    const requestUrl = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    try {
      const route = matchRoute(routes, method, requestUrl.pathname);
      if (!route) {
        json(res, { error: "Not found" }, 404);
        return;
      }

      const body = method === "GET" ? undefined : await parseBody(req);
      const result = await route.handler(route.params, requestUrl.searchParams, body);
      json(res, result);
    } catch (err) {
      if (err instanceof HttpError) {
        json(res, { error: err.message }, err.status);
        return;
      }
      logger.error(`[Api] ${method} ${requestUrl.pathname} failed:`, err);
      json(res, { error: "Internal server error" }, 500);
    }
  }

  return http.createServer((req, res) => {
    void handleRequest(req, res);
  });
}

export function startApiServer(deps: ApiDependencies, port = PORT): http.Server {
  const server = createApiServer(deps);
  const logger = deps.logger ?? console;

  server.listen(port, () => {
    logger.log(`[Api] Listening on http://localhost:${port}`);
    logger.log("[Api] Endpoints:");
    logger.log("  GET  /api/health");
    logger.log("  GET  /api/fulfillments?status=pending|completed");
    logger.log("  GET  /api/fulfillments/:id");
    logger.log("  GET  /api/claims/:claimId");
    logger.log("  GET  /api/policyholders/:email");
    logger.log("  POST /api/policyholders");
  });

  return server;
}
