import { describe, it, expect, beforeEach } from "vitest";
import type express from "express";
import request from "supertest";
import { encodeDid } from "@didscan/shared";
import * as transfers from "../api/routes/transfers.js";
import { MemoryStore } from "./helpers/memory-store.js";
import { bearer, createTestContext, mount } from "./helpers/context.js";
import { ALICE, BOB, CAROL, MASKED, block, event, transferEvent } from "./helpers/fixtures.js";

function seed(): MemoryStore {
  return new MemoryStore({
    block: [block({ id: 10, datetime: "2024-02-01T10:00:00.000Z" })],
    event: [
      transferEvent(ALICE, BOB, 100, { block_id: 10, event_idx: 1 }),
      transferEvent(CAROL, BOB, 5, { block_id: 11, event_idx: 0 }),
      event({ block_id: 11, event_idx: 1, module_id: "system", event_id: "ExtrinsicSuccess" }),
    ],
  });
}

function addresses(body: { data: { attributes: { sender: { attributes?: { address: string } } } }[] }) {
  return body.data.map((t) => t.attributes.sender.attributes?.address);
}

describe("GET /api/v1/balances/transfer", () => {
  let store: MemoryStore;
  let app: express.Express;

  beforeEach(() => {
    store = seed();
    app = mount(createTestContext(store), transfers);
  });

  it("returns normalized transfers with masked parties", async () => {
    const res = await request(app).get("/api/v1/balances/transfer");

    expect(res.status).toBe(200);
    expect(res.body.meta).toEqual({ total: 2, page: 1, pageSize: 25, hasMore: false });
    expect(res.body.data.map((t: { id: string }) => t.id)).toEqual(["11-0", "10-1"]);
    expect(res.body.data[0].type).toBe("balancetransfer");
    expect(res.body.data[0].attributes.destination.attributes.address).toBe(MASKED);
    expect(addresses(res.body)).toEqual([MASKED, MASKED]);
  });

  it("reveals only the transfers the caller takes part in", async () => {
    const res = await request(app).get("/api/v1/balances/transfer").set("Authorization", bearer(ALICE));

    expect(addresses(res.body)).toEqual([MASKED, ALICE]);
    expect(res.body.data[1].attributes.destination.attributes.address).toBe(BOB);
  });

  it("caches anonymous responses", async () => {
    const first = await request(app).get("/api/v1/balances/transfer");
    const queries = store.queried.length;
    const second = await request(app).get("/api/v1/balances/transfer");

    expect(first.headers["x-cache"]).toBe("MISS");
    expect(second.headers["x-cache"]).toBe("HIT");
    expect(second.body).toEqual(first.body);
    expect(store.queried).toHaveLength(queries);
  });

  it("never serves or stores revealed responses through the cache", async () => {
    await request(app).get("/api/v1/balances/transfer");
    const revealed = await request(app).get("/api/v1/balances/transfer").set("Authorization", bearer(BOB));
    const anonymous = await request(app).get("/api/v1/balances/transfer");

    expect(revealed.headers["x-cache"]).toBe("MISS");
    expect(addresses(revealed.body)).toEqual([CAROL, ALICE]);
    expect(anonymous.headers["x-cache"]).toBe("HIT");
    expect(addresses(anonymous.body)).toEqual([MASKED, MASKED]);
  });

  it("treats an invalid token as anonymous", async () => {
    const res = await request(app).get("/api/v1/balances/transfer").set("Authorization", "Bearer junk");
    expect(res.status).toBe(200);
    expect(addresses(res.body)).toEqual([MASKED, MASKED]);
  });
});

describe("GET /api/v1/balances/transfer/:id", () => {
  const app = mount(createTestContext(seed()), transfers);

  it("returns one transfer", async () => {
    const res = await request(app).get("/api/v1/balances/transfer/10-1").set("Authorization", bearer(BOB));

    expect(res.status).toBe(200);
    expect(res.body.data.id).toBe("10-1");
    expect(res.body.data.attributes.value).toBe(100);
    expect(res.body.data.attributes.fee).toBe(0);
    expect(res.body.data.attributes.sender.attributes.address).toBe(ALICE);
  });

  it("returns 404 for unknown transfers", async () => {
    const res = await request(app).get("/api/v1/balances/transfer/99-0");

    expect(res.status).toBe(404);
    expect(res.body.data).toBeNull();
    expect(res.body.errors[0].code).toBe("NotFound");
  });
});

describe("GET /api/v1/balances/transfer-history", () => {
  const app = mount(createTestContext(seed()), transfers);

  it("finds transfers by DID text and adds the block datetime", async () => {
    const res = await request(app).get("/api/v1/balances/transfer-history").query({ "filter[address]": BOB });

    expect(res.status).toBe(200);
    expect(res.body.meta.total).toBe(2);
    expect(res.body.data.map((t: { id: string }) => t.id)).toEqual(["11-0", "10-1"]);
    expect(res.body.data[0].attributes.datetime).toBeNull();
    expect(res.body.data[1].attributes.datetime).toBe("2024-02-01T10:00:00.000Z");
  });

  it("finds transfers by raw DID", async () => {
    const res = await request(app)
      .get("/api/v1/balances/transfer-history")
      .query({ "filter[address]": encodeDid(CAROL) });

    expect(res.body.data.map((t: { id: string }) => t.id)).toEqual(["11-0"]);
  });

  it("lists every transfer without an address", async () => {
    const res = await request(app).get("/api/v1/balances/transfer-history");
    expect(res.body.meta.total).toBe(2);
  });

  it("pages the history of a DID in the path", async () => {
    const res = await request(app).get(`/api/v1/balances/transfer-history/${BOB}`).query({ "page[size]": 1 });

    expect(res.body.data.map((t: { id: string }) => t.id)).toEqual(["11-0"]);
    expect(res.body.meta).toEqual({ total: 2, page: 1, pageSize: 1, hasMore: true });
  });

  it("masks history entries for non-participants", async () => {
    const res = await request(app).get(`/api/v1/balances/transfer-history/${CAROL}`).set("Authorization", bearer(ALICE));
    expect(addresses(res.body)).toEqual([MASKED]);
  });

  it("requires a DID in the path", async () => {
    const res = await request(app).get("/api/v1/balances/transfer-history/%20");

    expect(res.status).toBe(400);
    expect(res.body.errors[0]).toEqual({
      status: 400,
      code: "ParameterRequired",
      title: "Required parameter missing: did",
    });
  });
});
