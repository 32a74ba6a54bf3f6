import type { EntityKind, EntityRecord, Predicate } from "@didscan/db";
import type { DetailResource, FilterSpec, IncludeSpec, ListResource } from "./types.js";
import { anyOf, singleKey } from "./keys.js";

const ROLE_FLAGS = [
  "is_validator",
  "is_nominator",
  "is_council_member",
  "is_registrar",
  "is_sudo",
  "is_tech_comm_member",
  "is_treasury",
  "was_validator",
  "was_nominator",
  "was_council_member",
  "was_registrar",
  "was_sudo",
  "was_tech_comm_member",
] as const;

const NO_BAD_JUDGEMENT: Predicate = { op: "eq", column: "identity_judgement_bad", value: 0 };

const accountFilters: FilterSpec[] = [
  ...ROLE_FLAGS.map(
    (column): FilterSpec => ({ kind: "flag", param: column, predicates: [{ op: "eq", column, value: true }] }),
  ),
  {
    kind: "flag",
    param: "has_identity",
    predicates: [{ op: "eq", column: "has_identity", value: true }, NO_BAD_JUDGEMENT],
  },
  {
    kind: "flag",
    param: "has_subidentity",
    predicates: [{ op: "eq", column: "has_subidentity", value: true }, NO_BAD_JUDGEMENT],
  },
  {
    kind: "flag",
    param: "identity_judgement_good",
    predicates: [{ op: "gt", column: "identity_judgement_good", value: 0 }, NO_BAD_JUDGEMENT],
  },
  {
    kind: "flag",
    param: "blacklist",
    predicates: [{ op: "gt", column: "identity_judgement_bad", value: 0 }],
  },
];

/** Extrinsics signed by `address`; a missing address matches nothing */
function signedBy(address: string | null): Predicate[] {
  return address === null
    ? [{ op: "in", column: "address", values: [] }]
    : [{ op: "eq", column: "address", value: address }];
}

/** Ten most recent extrinsics signed by the address a record points at */
function recentExtrinsics<K extends EntityKind>(
  address: (record: EntityRecord<K>) => string | null,
): IncludeSpec<K> {
  return {
    entity: "extrinsic",
    where: (record) => signedBy(address(record)),
    orderBy: [
      { column: "block_id", direction: "desc" },
      { column: "extrinsic_idx", direction: "desc" },
    ],
    limit: 10,
  };
}

export const accountList: ListResource<"account"> = {
  entity: "account",
  orderBy: [{ column: "balance_total", direction: "desc" }],
  filters: accountFilters,
};

export const accountDetail: DetailResource<"account"> = {
  entity: "account",
  keys: anyOf(singleKey("address", "text"), singleKey("index_address", "text")),
  includes: {
    recent_extrinsics: recentExtrinsics<"account">((a) => a.id),
    indices: {
      entity: "accountindex",
      where: (a) => [{ op: "eq", column: "account_id", value: a.id }],
      orderBy: [{ column: "updated_at_block", direction: "desc" }],
    },
  },
};

// ---- Account indices ----

export const accountIndexList: ListResource<"accountindex"> = {
  entity: "accountindex",
  orderBy: [{ column: "updated_at_block", direction: "desc" }],
};

export const accountIndexDetail: DetailResource<"accountindex"> = {
  entity: "accountindex",
  keys: singleKey("short_address", "text"),
  includes: {
    recent_extrinsics: recentExtrinsics<"accountindex">((i) => i.account_id),
  },
};
