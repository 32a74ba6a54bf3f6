import type { DetailResource, FilterSpec, ListResource } from "./types.js";
import { compositeKey, singleKey } from "./keys.js";

const LATEST_RUNTIME: FilterSpec = {
  kind: "latest",
  param: "latestRuntime",
  source: "runtime",
  column: "spec_version",
};

const MODULE_ID: FilterSpec = { kind: "eq", param: "module_id", column: "module_id" };

// ---- Runtimes ----

export const runtimeList: ListResource<"runtime"> = {
  entity: "runtime",
  orderBy: [{ column: "id", direction: "desc" }],
};

export const runtimeDetail: DetailResource<"runtime"> = {
  entity: "runtime",
  keys: singleKey("id", "int"),
  includes: {
    modules: {
      entity: "runtimemodule",
      where: (r) => [{ op: "eq", column: "spec_version", value: r.spec_version }],
      orderBy: [
        { column: "lookup", direction: "asc" },
        { column: "id", direction: "asc" },
      ],
    },
    types: {
      entity: "runtimetype",
      where: (r) => [{ op: "eq", column: "spec_version", value: r.spec_version }],
      orderBy: [{ column: "type_string", direction: "asc" }],
    },
  },
};

// ---- Calls ----

export const runtimeCallList: ListResource<"runtimecall"> = {
  entity: "runtimecall",
  orderBy: [
    { column: "spec_version", direction: "asc" },
    { column: "module_id", direction: "asc" },
    { column: "call_id", direction: "asc" },
  ],
  filters: [LATEST_RUNTIME, MODULE_ID],
};

export const runtimeCallDetail: DetailResource<"runtimecall"> = {
  entity: "runtimecall",
  keys: compositeKey(["spec_version", "int"], ["module_id", "text"], ["call_id", "text"]),
  includes: {
    params: {
      entity: "runtimecallparam",
      where: (c) => [{ op: "eq", column: "runtime_call_id", value: c.id }],
      orderBy: [{ column: "id", direction: "asc" }],
    },
    recent_extrinsics: {
      entity: "extrinsic",
      where: (c) => [
        { op: "eq", column: "module_id", value: c.module_id },
        { op: "eq", column: "call_id", value: c.call_id },
      ],
      orderBy: [
        { column: "block_id", direction: "desc" },
        { column: "extrinsic_idx", direction: "desc" },
      ],
      limit: 10,
    },
  },
};

// ---- Events ----

export const runtimeEventList: ListResource<"runtimeevent"> = {
  entity: "runtimeevent",
  orderBy: [
    { column: "spec_version", direction: "asc" },
    { column: "module_id", direction: "asc" },
    { column: "event_id", direction: "asc" },
  ],
  filters: [LATEST_RUNTIME, MODULE_ID],
};

export const runtimeEventDetail: DetailResource<"runtimeevent"> = {
  entity: "runtimeevent",
  keys: compositeKey(["spec_version", "int"], ["module_id", "text"], ["event_id", "text"]),
  includes: {
    attributes: {
      entity: "runtimeeventattribute",
      where: (e) => [{ op: "eq", column: "runtime_event_id", value: e.id }],
      orderBy: [{ column: "id", direction: "asc" }],
    },
    recent_events: {
      entity: "event",
      where: (e) => [
        { op: "eq", column: "module_id", value: e.module_id },
        { op: "eq", column: "event_id", value: e.event_id },
      ],
      orderBy: [
        { column: "block_id", direction: "desc" },
        { column: "event_idx", direction: "desc" },
      ],
      limit: 10,
    },
  },
};

// ---- Types ----

export const runtimeTypeList: ListResource<"runtimetype"> = {
  entity: "runtimetype",
  orderBy: [
    { column: "spec_version", direction: "asc" },
    { column: "type_string", direction: "asc" },
  ],
  filters: [LATEST_RUNTIME],
};

// ---- Modules ----

export const runtimeModuleList: ListResource<"runtimemodule"> = {
  entity: "runtimemodule",
  orderBy: [
    { column: "spec_version", direction: "asc" },
    { column: "name", direction: "asc" },
  ],
  filters: [LATEST_RUNTIME],
};

export const runtimeModuleDetail: DetailResource<"runtimemodule"> = {
  entity: "runtimemodule",
  keys: compositeKey(["spec_version", "int"], ["module_id", "text"]),
  includes: {
    calls: {
      entity: "runtimecall",
      where: (m) => [
        { op: "eq", column: "spec_version", value: m.spec_version },
        { op: "eq", column: "module_id", value: m.module_id },
      ],
      orderBy: [
        { column: "lookup", direction: "asc" },
        { column: "id", direction: "asc" },
      ],
    },
    events: {
      entity: "runtimeevent",
      where: (m) => [
        { op: "eq", column: "spec_version", value: m.spec_version },
        { op: "eq", column: "module_id", value: m.module_id },
      ],
      orderBy: [
        { column: "lookup", direction: "asc" },
        { column: "id", direction: "asc" },
      ],
    },
    storage: {
      entity: "runtimestorage",
      where: (m) => [
        { op: "eq", column: "spec_version", value: m.spec_version },
        { op: "eq", column: "module_id", value: m.module_id },
      ],
      orderBy: [{ column: "name", direction: "asc" }],
    },
    constants: {
      entity: "runtimeconstant",
      where: (m) => [
        { op: "eq", column: "spec_version", value: m.spec_version },
        { op: "eq", column: "module_id", value: m.module_id },
      ],
      orderBy: [{ column: "name", direction: "asc" }],
    },
    errors: {
      entity: "runtimeerrormessage",
      where: (m) => [
        { op: "eq", column: "spec_version", value: m.spec_version },
        { op: "eq", column: "module_id", value: m.module_id },
      ],
      orderBy: [
        { column: "name", direction: "asc" },
        { column: "index", direction: "asc" },
      ],
    },
  },
};

// ---- Storage & constants ----

export const runtimeStorageDetail: DetailResource<"runtimestorage"> = {
  entity: "runtimestorage",
  keys: compositeKey(["spec_version", "int"], ["module_id", "text"], ["name", "text"]),
};

export const runtimeConstantList: ListResource<"runtimeconstant"> = {
  entity: "runtimeconstant",
  orderBy: [
    { column: "spec_version", direction: "desc" },
    { column: "module_id", direction: "asc" },
    { column: "name", direction: "asc" },
  ],
};

export const runtimeConstantDetail: DetailResource<"runtimeconstant"> = {
  entity: "runtimeconstant",
  keys: compositeKey(["spec_version", "int"], ["module_id", "text"], ["name", "text"]),
};
