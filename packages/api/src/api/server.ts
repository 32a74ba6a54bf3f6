import express from "express";
import path from "node:path";
import { fileURLToPath } from "node:url";
import swaggerJsdoc from "swagger-jsdoc";
import swaggerUi from "swagger-ui-express";
import type { ApiContext } from "./types.js";
import { NotFoundError, toErrorResponse } from "./errors.js";
import { register as registerBlocks } from "./routes/blocks.js";
import { register as registerExtrinsics } from "./routes/extrinsics.js";
import { register as registerEvents } from "./routes/events.js";
import { register as registerTransfers } from "./routes/transfers.js";
import { register as registerAccounts } from "./routes/accounts.js";
import { register as registerSessions } from "./routes/sessions.js";
import { register as registerContracts } from "./routes/contracts.js";
import { register as registerRuntime } from "./routes/runtime.js";
import { register as registerStats } from "./routes/stats.js";

const here = path.dirname(fileURLToPath(import.meta.url));

/**
 * The API server exposes the indexed DID chain data read-only under
 * /api/v1, with OpenAPI docs at /api-docs.
 */
export function createApiServer(ctx: ApiContext): express.Express {
  const app = express();

  // ---- Swagger / OpenAPI ----
  const swaggerSpec = swaggerJsdoc({
    definition: {
      openapi: "3.0.0",
      info: {
        title: "DIDScan Explorer API",
        version: "0.1.0",
        description:
          "Read API over indexed blocks, extrinsics, events, accounts and runtime metadata of a DID-based chain. DIDs are masked unless the bearer token proves the caller is a party.",
        license: { name: "AGPL-3.0", url: "https://www.gnu.org/licenses/agpl-3.0.html" },
      },
      servers: [{ url: "/", description: "Current host" }],
      components: {
        securitySchemes: {
          bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
        },
        parameters: {
          PageNumber: {
            in: "query",
            name: "page[number]",
            schema: { type: "integer", default: 1, minimum: 1 },
          },
          PageSize: {
            in: "query",
            name: "page[size]",
            schema: { type: "integer", default: ctx.config.pagination.defaultSize, maximum: ctx.config.pagination.maxSize },
          },
          AddressFilter: {
            in: "query",
            name: "filter[address]",
            schema: { type: "string" },
            description: "Hex-encoded DID",
          },
          SearchIndexFilter: {
            in: "query",
            name: "filter[search_index]",
            schema: { type: "string" },
            description: "Search index category ids, comma separated or repeated",
          },
        },
        schemas: {
          ListEnvelope: {
            type: "object",
            properties: {
              data: { type: "array", items: { type: "object" } },
              meta: {
                type: "object",
                properties: {
                  total: { type: "integer" },
                  page: { type: "integer" },
                  pageSize: { type: "integer" },
                  hasMore: { type: "boolean" },
                },
              },
            },
          },
        },
      },
    },
    // scan this file and the route modules for JSDoc comments
    apis: [fileURLToPath(import.meta.url), path.join(here, "routes", "*.{ts,js}")],
  });
  app.use(
    "/api-docs",
    swaggerUi.serve,
    swaggerUi.setup(swaggerSpec, { customCss: ".swagger-ui .topbar { display: none }" }),
  );
  app.get("/api-docs.json", (_req, res) => res.json(swaggerSpec));

  // CORS origin from CORS_ORIGIN; Authorization carries the bearer token
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", ctx.config.corsOrigin);
    res.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    res.header("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.header("Access-Control-Expose-Headers", "X-Cache");
    next();
  });

  /**
   * @openapi
   * /health:
   *   get:
   *     tags: [Health]
   *     summary: API health check
   *     description: Reports whether the data store answers.
   *     responses:
   *       200:
   *         description: API and store reachable
   *       503:
   *         description: Store unreachable
   */
  app.get("/health", async (_req, res) => {
    try {
      const latest = await ctx.stores.withStore((store) =>
        store.findOne("block", [], [{ column: "id", direction: "desc" }]),
      );
      res.json({
        status: "healthy",
        dbConnected: true,
        indexedTip: latest?.id ?? 0,
        cacheEntries: ctx.cache.size,
        rpcEndpoints: ctx.rpcPool?.size ?? 0,
        timestamp: Date.now(),
      });
    } catch (err) {
      console.error("[API] Health check failed:", err);
      res.status(503).json({
        status: "unhealthy",
        dbConnected: false,
        error: String(err),
        timestamp: Date.now(),
      });
    }
  });

  /**
   * @openapi
   * /api/rpc-health:
   *   get:
   *     tags: [System]
   *     summary: RPC pool health
   *     description: Returns health stats for all RPC endpoints in the pool.
   *     responses:
   *       200:
   *         description: RPC pool stats
   */
  app.get("/api/rpc-health", (_req, res) => {
    if (!ctx.rpcPool) {
      res.json({ endpoints: [], message: "RPC pool not initialized" });
      return;
    }
    res.json({
      endpointCount: ctx.rpcPool.size,
      endpoints: ctx.rpcPool.getStats(),
    });
  });

  registerBlocks(app, ctx);
  registerExtrinsics(app, ctx);
  registerEvents(app, ctx);
  registerTransfers(app, ctx);
  registerAccounts(app, ctx);
  registerSessions(app, ctx);
  registerContracts(app, ctx);
  registerRuntime(app, ctx);
  registerStats(app, ctx);

  app.use((req, res) => {
    const { status, body } = toErrorResponse(new NotFoundError(`No route for ${req.method} ${req.path}`));
    res.status(status).json(body);
  });

  // Errors thrown outside the route handlers (malformed query strings and the like)
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, body } = toErrorResponse(err);
    console.error(`[API] ${req.method} ${req.originalUrl} failed:`, err);
    res.status(status).json(body);
  });

  return app;
}
