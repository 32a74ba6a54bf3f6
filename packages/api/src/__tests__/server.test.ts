import { describe, it, expect, vi, beforeEach } from "vitest";
import request from "supertest";
import { StoreError } from "@didscan/db";
import { createApiServer } from "../api/server.js";
import { RpcPool } from "../rpc-pool.js";
import { MemoryStore } from "./helpers/memory-store.js";
import { createTestContext } from "./helpers/context.js";
import { block } from "./helpers/fixtures.js";

class UnreachableStore extends MemoryStore {
  async findOne(): Promise<never> {
    throw new StoreError("connect ECONNREFUSED");
  }
}

describe("createApiServer", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("reports the indexed tip on /health", async () => {
    const app = createApiServer(createTestContext(new MemoryStore({ block: [block({ id: 41 }), block({ id: 42 })] })));
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "healthy", dbConnected: true, indexedTip: 42, rpcEndpoints: 0 });
  });

  it("answers 503 when the store is unreachable", async () => {
    const app = createApiServer(createTestContext(new UnreachableStore()));
    const res = await request(app).get("/health");

    expect(res.status).toBe(503);
    expect(res.body.status).toBe("unhealthy");
    expect(res.body.dbConnected).toBe(false);
  });

  it("sets CORS headers and exposes X-Cache", async () => {
    const res = await request(createApiServer(createTestContext())).get("/api/v1/block");

    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-allow-headers"]).toBe("Content-Type, Authorization");
    expect(res.headers["access-control-expose-headers"]).toBe("X-Cache");
    expect(res.headers["x-cache"]).toBe("MISS");
  });

  it("answers unknown routes with a JSON 404", async () => {
    const res = await request(createApiServer(createTestContext())).get("/api/v1/nothing");

    expect(res.status).toBe(404);
    expect(res.body.errors[0]).toEqual({ status: 404, code: "NotFound", title: "No route for GET /api/v1/nothing" });
  });

  it("lists the RPC endpoints", async () => {
    const withoutPool = await request(createApiServer(createTestContext())).get("/api/rpc-health");
    expect(withoutPool.body).toEqual({ endpoints: [], message: "RPC pool not initialized" });

    const rpcPool = new RpcPool(["ws://localhost:9944"]);
    const withPool = await request(createApiServer(createTestContext(new MemoryStore(), { rpcPool }))).get(
      "/api/rpc-health",
    );
    expect(withPool.body.endpointCount).toBe(1);
    expect(withPool.body.endpoints[0].url).toBe("http://localhost:9944");
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(createApiServer(createTestContext())).get("/api-docs.json");

    expect(res.status).toBe(200);
    expect(res.body.openapi).toBe("3.0.0");
    expect(res.body.paths["/api/v1/balances/transfer"].get.tags).toEqual(["Transfers"]);
    expect(res.body.components.securitySchemes.bearerAuth.scheme).toBe("bearer");
  });
});
