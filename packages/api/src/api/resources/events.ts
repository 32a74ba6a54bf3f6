import type { DetailResource, ListResource } from "./types.js";
import { compositeKey } from "./keys.js";

const EVENT_ORDER = [
  { column: "block_id", direction: "desc" },
  { column: "event_idx", direction: "desc" },
] as const;

export const eventList: ListResource<"event"> = {
  entity: "event",
  orderBy: [...EVENT_ORDER],
  filters: [
    { kind: "eq", param: "module_id", column: "module_id" },
    {
      kind: "eq",
      param: "event_id",
      column: "event_id",
      // Extrinsic outcome events drown everything else out
      fallback: [{ op: "notIn", column: "event_id", values: ["ExtrinsicSuccess", "ExtrinsicFailed"] }],
    },
  ],
  searchIndex: { trigger: "search_index", target: "event_idx" },
};

export const eventDetail: DetailResource<"event"> = {
  entity: "event",
  keys: compositeKey(["block_id", "int"], ["event_idx", "int"]),
};

// ---- Balance transfers ----

export const transferList: ListResource<"event"> = {
  entity: "event",
  orderBy: [...EVENT_ORDER],
  baseWhere: [
    { op: "eq", column: "module_id", value: "balances" },
    { op: "eq", column: "event_id", value: "Transfer" },
  ],
  searchIndex: {
    trigger: "address",
    target: "event_idx",
    categories: (c) => [c.balanceTransfer, c.claimsClaimed, c.balancesDeposit, c.stakingReward],
  },
};

export const transferDetail: DetailResource<"event"> = {
  entity: "event",
  keys: compositeKey(["block_id", "int"], ["event_idx", "int"]),
};
