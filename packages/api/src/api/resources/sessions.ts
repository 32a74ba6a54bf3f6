import type { DetailResource, ListResource } from "./types.js";
import { compositeKey, singleKey } from "./keys.js";

export const sessionList: ListResource<"session"> = {
  entity: "session",
  orderBy: [{ column: "id", direction: "desc" }],
};

export const sessionDetail: DetailResource<"session"> = {
  entity: "session",
  keys: singleKey("id", "int"),
  includes: {
    blocks: {
      entity: "block",
      where: (s) => [{ op: "eq", column: "session_id", value: s.id }],
      orderBy: [{ column: "id", direction: "desc" }],
    },
    validators: {
      entity: "sessionvalidator",
      where: (s) => [{ op: "eq", column: "session_id", value: s.id }],
      orderBy: [{ column: "rank_validator", direction: "asc" }],
    },
  },
};

export const sessionValidatorList: ListResource<"sessionvalidator"> = {
  entity: "sessionvalidator",
  orderBy: [
    { column: "session_id", direction: "asc" },
    { column: "rank_validator", direction: "asc" },
  ],
  filters: [{ kind: "latest", param: "latestSession", source: "session", column: "session_id" }],
};

export const sessionValidatorDetail: DetailResource<"sessionvalidator"> = {
  entity: "sessionvalidator",
  keys: compositeKey(["session_id", "int"], ["rank_validator", "int"]),
  includes: {
    nominators: {
      entity: "sessionnominator",
      where: (v) => [
        { op: "eq", column: "session_id", value: v.session_id },
        { op: "eq", column: "rank_validator", value: v.rank_validator },
      ],
      orderBy: [{ column: "rank_nominator", direction: "asc" }],
    },
  },
};

export const sessionNominatorList: ListResource<"sessionnominator"> = {
  entity: "sessionnominator",
  orderBy: [
    { column: "session_id", direction: "asc" },
    { column: "rank_validator", direction: "asc" },
    { column: "rank_nominator", direction: "asc" },
  ],
  filters: [{ kind: "latest", param: "latestSession", source: "session", column: "session_id" }],
};
