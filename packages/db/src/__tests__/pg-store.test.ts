import { describe, it, expect } from "vitest";
import {
  buildCount,
  buildSelect,
  buildTopHolders,
  buildTransferHistory,
  buildWhere,
  mapRow,
} from "../pg-store.js";
import { StoreError } from "../store.js";
import { recordId } from "../entities.js";

describe("buildSelect", () => {
  it("should render columns, predicates, ordering and paging as parameters", () => {
    const q = buildSelect("log", {
      where: [{ op: "eq", column: "block_id", value: 5 }],
      orderBy: [{ column: "log_idx", direction: "asc" }],
      limit: 10,
      offset: 20,
    });
    expect(q.text).toBe(
      'SELECT "block_id", "log_idx", "type_id", "type", "data" FROM data_log WHERE "block_id" = $1 ORDER BY "log_idx" ASC LIMIT $2 OFFSET $3',
    );
    expect(q.values).toEqual([5, 10, 20]);
  });

  it("should render an explicit NULLS placement", () => {
    const q = buildSelect("searchindex", {
      orderBy: [
        { column: "sorting_value", direction: "desc", nulls: "last" },
        { column: "block_id", direction: "desc" },
      ],
    });
    expect(q.text).toContain('ORDER BY "sorting_value" DESC NULLS LAST, "block_id" DESC');
  });

  it("should omit OFFSET for the first page", () => {
    const q = buildSelect("log", { limit: 25, offset: 0 });
    expect(q.text).toBe('SELECT "block_id", "log_idx", "type_id", "type", "data" FROM data_log LIMIT $1');
    expect(q.values).toEqual([25]);
  });

  it("should reject columns that are not part of the entity", () => {
    expect(() =>
      buildSelect("log", { where: [{ op: "eq", column: "name; DROP TABLE x", value: 1 }] }),
    ).toThrow(StoreError);
  });
});

describe("buildWhere", () => {
  it("should render row-value membership for search-index keys", () => {
    const values: unknown[] = [];
    const sql = buildWhere(
      "event",
      [{ op: "tupleIn", columns: ["block_id", "event_idx"], values: [[1, 2], [3, 4]] }],
      values,
    );
    expect(sql).toBe('WHERE ("block_id", "event_idx") IN (($1, $2), ($3, $4))');
    expect(values).toEqual([1, 2, 3, 4]);
  });

  it("should turn empty membership lists into constant conditions", () => {
    const values: unknown[] = [];
    const sql = buildWhere(
      "event",
      [
        { op: "in", column: "module_id", values: [] },
        { op: "notIn", column: "event_id", values: [] },
      ],
      values,
    );
    expect(sql).toBe("WHERE FALSE AND TRUE");
    expect(values).toEqual([]);
  });

  it("should render null equality as IS NULL", () => {
    const values: unknown[] = [];
    expect(buildWhere("account", [{ op: "eq", column: "index_address", value: null }], values)).toBe(
      'WHERE "index_address" IS NULL',
    );
    expect(values).toEqual([]);
  });

  it("should escape LIKE wildcards in prefix matches", () => {
    const values: unknown[] = [];
    const sql = buildWhere("account", [{ op: "prefix", column: "id", value: "ab_c%" }], values);
    expect(sql).toBe('WHERE "id" LIKE $1');
    expect(values).toEqual(["ab\\_c\\%%"]);
  });

  it("should combine excluded event ids with other predicates", () => {
    const values: unknown[] = [];
    const sql = buildWhere(
      "event",
      [
        { op: "eq", column: "module_id", value: "system" },
        { op: "notIn", column: "event_id", values: ["ExtrinsicSuccess", "ExtrinsicFailed"] },
      ],
      values,
    );
    expect(sql).toBe('WHERE "module_id" = $1 AND "event_id" NOT IN ($2, $3)');
    expect(values).toEqual(["system", "ExtrinsicSuccess", "ExtrinsicFailed"]);
  });
});

describe("buildCount", () => {
  it("should count without a WHERE clause when unfiltered", () => {
    expect(buildCount("block")).toEqual({ text: "SELECT COUNT(*) AS count FROM data_block", values: [] });
  });

  it("should reuse the predicate builder", () => {
    expect(buildCount("extrinsic", [{ op: "eq", column: "signed", value: 1 }])).toEqual({
      text: 'SELECT COUNT(*) AS count FROM data_extrinsic WHERE "signed" = $1',
      values: [1],
    });
  });
});

describe("report queries", () => {
  it("should match transfer participants through JSONB containment", () => {
    const q = buildTransferHistory("0xabc0", 25, 50);
    expect(q.values).toEqual(['[{"value":"0xabc0"}]', 25, 50]);
    expect(q.text).toContain(`e."attributes" @> $1::jsonb`);
    expect(q.text).toContain(`ORDER BY e."block_id" DESC, e."event_idx" DESC LIMIT $2 OFFSET $3`);
  });

  it("should pick the latest snapshot per account under a hex prefix", () => {
    const q = buildTopHolders("6469643a", 100);
    expect(q.values).toEqual(["6469643a%", 100]);
    expect(q.text).toContain('SELECT DISTINCT ON ("account_id")');
    expect(q.text).toContain('ORDER BY "balance_total" DESC NULLS LAST LIMIT $2');
  });
});

describe("mapRow", () => {
  it("should normalize pg values by column kind", () => {
    const block = mapRow("block", {
      id: "42",
      parent_id: 41,
      hash: "0xaa",
      parent_hash: "0xbb",
      state_root: "0xcc",
      extrinsics_root: "0xdd",
      count_extrinsics: 2,
      count_extrinsics_signed: 1,
      count_extrinsics_unsigned: 1,
      count_extrinsics_error: 0,
      count_extrinsics_success: 2,
      count_events: 3,
      count_events_module: 1,
      count_events_system: 2,
      count_accounts_new: 0,
      count_log: 1,
      datetime: new Date("2024-01-02T03:04:05.000Z"),
      session_id: null,
      spec_version_id: 7,
    });
    expect(block.id).toBe(42);
    expect(block.datetime).toBe("2024-01-02T03:04:05.000Z");
    expect(block.session_id).toBeNull();
  });

  it("should parse JSON stored as text and keep decimals as strings", () => {
    const snapshot = mapRow("accountinfosnapshot", {
      block_id: 10,
      account_id: "6469643a",
      balance_total: 123456789012345678901234567890n,
      balance_free: "5",
      balance_reserved: undefined,
      nonce: null,
    });
    expect(snapshot.balance_total).toBe("123456789012345678901234567890");
    expect(snapshot.balance_reserved).toBeNull();

    const log = mapRow("log", { block_id: 1, log_idx: 0, type_id: 2, type: "Seal", data: '{"a":1}' });
    expect(log.data).toEqual({ a: 1 });
    expect(recordId("log", log)).toBe("1-0");
  });
});
