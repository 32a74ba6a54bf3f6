import type { DetailResource, ListResource } from "./types.js";
import { compositeKey, numericOrText, singleKey } from "./keys.js";

// ---- Blocks ----

export const blockList: ListResource<"block"> = {
  entity: "block",
  orderBy: [{ column: "id", direction: "desc" }],
};

export const blockDetail: DetailResource<"block"> = {
  entity: "block",
  keys: numericOrText("id", "hash"),
  includes: {
    extrinsics: {
      entity: "extrinsic",
      where: (b) => [{ op: "eq", column: "block_id", value: b.id }],
      orderBy: [{ column: "extrinsic_idx", direction: "asc" }],
    },
    transactions: {
      entity: "extrinsic",
      where: (b) => [
        { op: "eq", column: "block_id", value: b.id },
        { op: "eq", column: "signed", value: 1 },
      ],
      orderBy: [{ column: "extrinsic_idx", direction: "asc" }],
      omit: ["params"],
    },
    inherents: {
      entity: "extrinsic",
      where: (b) => [
        { op: "eq", column: "block_id", value: b.id },
        { op: "eq", column: "signed", value: 0 },
      ],
      orderBy: [{ column: "extrinsic_idx", direction: "asc" }],
      omit: ["params"],
    },
    events: {
      entity: "event",
      where: (b) => [{ op: "eq", column: "block_id", value: b.id }],
      orderBy: [{ column: "event_idx", direction: "asc" }],
    },
    logs: {
      entity: "log",
      where: (b) => [{ op: "eq", column: "block_id", value: b.id }],
      orderBy: [{ column: "log_idx", direction: "asc" }],
    },
  },
};

// ---- Block totals ----

export const blockTotalList: ListResource<"blocktotal"> = {
  entity: "blocktotal",
  orderBy: [{ column: "id", direction: "desc" }],
  filters: [{ kind: "did", param: "author", column: "author" }],
};

/** Numeric ids only; hash lookups go through the block first */
export const blockTotalDetail: DetailResource<"blocktotal"> = {
  entity: "blocktotal",
  keys: singleKey("id", "int"),
};

// ---- Logs ----

export const logList: ListResource<"log"> = {
  entity: "log",
  orderBy: [
    { column: "block_id", direction: "desc" },
    { column: "log_idx", direction: "desc" },
  ],
};

export const logDetail: DetailResource<"log"> = {
  entity: "log",
  keys: compositeKey(["block_id", "int"], ["log_idx", "int"]),
};

// ---- Contracts ----

export const contractList: ListResource<"contract"> = {
  entity: "contract",
  orderBy: [{ column: "created_at_block", direction: "desc" }],
};

export const contractDetail: DetailResource<"contract"> = {
  entity: "contract",
  keys: singleKey("code_hash", "text"),
};
