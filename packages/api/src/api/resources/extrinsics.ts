import type { DetailResource, ListResource } from "./types.js";
import { compositeKey, hashOr } from "./keys.js";

export const extrinsicList: ListResource<"extrinsic"> = {
  entity: "extrinsic",
  orderBy: [
    { column: "block_id", direction: "desc" },
    { column: "extrinsic_idx", direction: "desc" },
  ],
  filters: [
    { kind: "eq", param: "signed", column: "signed", type: "int" },
    { kind: "eq", param: "module_id", column: "module_id" },
    { kind: "eq", param: "call_id", column: "call_id" },
    { kind: "did", param: "address", column: "address" },
  ],
  searchIndex: { trigger: "search_index", target: "extrinsic_idx" },
};

export const extrinsicDetail: DetailResource<"extrinsic"> = {
  entity: "extrinsic",
  keys: hashOr("extrinsic_hash", compositeKey(["block_id", "int"], ["extrinsic_idx", "int"])),
  includes: {
    events: {
      entity: "event",
      where: (x) => [
        { op: "eq", column: "block_id", value: x.block_id },
        { op: "eq", column: "extrinsic_idx", value: x.extrinsic_idx },
      ],
      orderBy: [{ column: "event_idx", direction: "asc" }],
    },
  },
};
