import { blake2b } from "@noble/hashes/blake2.js";
import { bytesToHex, hexToBytes, type Envelope, type PaginationMeta, type ResourceObject, type TypedValue } from "@didscan/shared";
import { ENTITIES, recordId, type EntityKind, type EntityRecord } from "@didscan/db";
import type { PageRequest } from "./params.js";
import type { RelatedRecords } from "./query-resolver.js";

/** String call arguments longer than this are replaced by a content reference */
export const OVERSIZED_PARAM_LENGTH = 200_000;

export function toResource<K extends EntityKind>(
  kind: K,
  record: EntityRecord<K>,
  omit: readonly string[] = [],
): ResourceObject {
  const attributes: Record<string, unknown> = { ...record };
  for (const key of omit) delete attributes[key];
  return { type: ENTITIES[kind].type, id: recordId(kind, record), attributes };
}

export function paginationMeta(page: PageRequest, total: number): PaginationMeta {
  return {
    total,
    page: page.number,
    pageSize: page.size,
    hasMore: page.number * page.size < total,
  };
}

export function renderList<T>(data: T[], page: PageRequest, total: number): Envelope<T[]> {
  return { data, meta: { ...paginationMeta(page, total) } };
}

export function renderItem<T>(data: T, meta?: Record<string, unknown>): Envelope<T> {
  return meta ? { data, meta } : { data };
}

export function renderRelationships(
  related: Map<string, RelatedRecords>,
): Record<string, { data: ResourceObject[] }> | undefined {
  if (related.size === 0) return undefined;
  const out: Record<string, { data: ResourceObject[] }> = {};
  for (const [name, rel] of related) {
    out[name] = { data: rel.records.map((r) => toResource(rel.entity, r, rel.omit)) };
  }
  return out;
}

export function withRelationships(resource: ResourceObject, related: Map<string, RelatedRecords>): ResourceObject {
  const relationships = renderRelationships(related);
  return relationships ? { ...resource, relationships } : resource;
}

// ============================================================
// Oversized call arguments
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function payloadBytes(value: string): Uint8Array {
  try {
    return hexToBytes(value);
  } catch {
    // not hex: hash the text itself
    return new TextEncoder().encode(value);
  }
}

/** "{identifier}/{blake2b-256 hex}" reference to an oversized payload */
export function contentReference(identifier: string, value: string): string {
  return `${identifier}/${bytesToHex(blake2b(payloadBytes(value), { dkLen: 32 }))}`;
}

/**
 * Walk a `{type, value}` list and swap every string value longer than
 * OVERSIZED_PARAM_LENGTH for a content reference. Nested lists and the
 * `call_args` of `Box<Call>` arguments are walked too. Returns a copy.
 */
export function replaceOversizedParams(params: unknown, identifier: string): unknown {
  if (!Array.isArray(params)) return params;
  return params.map((param: unknown) => {
    if (!isRecord(param) || !("value" in param) || typeof param.type !== "string") return param;
    const out: Record<string, unknown> = { ...param };
    const value = param.value;

    if (Array.isArray(value)) {
      out.value = replaceOversizedParams(value, identifier);
    } else if (param.type === "Box<Call>" && isRecord(value)) {
      out.value = { ...value, call_args: replaceOversizedParams(value.call_args, identifier) };
    } else if (typeof value === "string" && value.length > OVERSIZED_PARAM_LENGTH) {
      const replaced: TypedValue = {
        type: "DownloadableBytesHash",
        value: contentReference(identifier, value),
        valueRaw: "",
      };
      Object.assign(out, replaced);
    }
    return out;
  });
}
