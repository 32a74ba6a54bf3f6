import { InvalidFilterValueError } from "./errors.js";

/** filter[<name>] values; repeated parameters keep every value */
export type FilterParams = ReadonlyMap<string, string[]>;

export interface PageRequest {
  number: number;
  size: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStrings(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (typeof value === "number") return [String(value)];
  if (Array.isArray(value)) return value.flatMap(toStrings);
  return [];
}

/**
 * Collect `filter[...]` parameters from an Express query object. The
 * extended query parser nests them under `filter`; flat keys such as
 * "filter[address]" are accepted too.
 */
export function parseFilters(query: unknown): FilterParams {
  const out = new Map<string, string[]>();
  if (!isRecord(query)) return out;

  const add = (name: string, value: unknown): void => {
    const values = toStrings(value);
    if (values.length === 0) return;
    out.set(name, [...(out.get(name) ?? []), ...values]);
  };

  const nested = query.filter;
  if (isRecord(nested)) {
    for (const [name, value] of Object.entries(nested)) add(name, value);
  }
  for (const [key, value] of Object.entries(query)) {
    const m = /^filter\[([^\]]+)\]$/.exec(key);
    if (m?.[1]) add(m[1], value);
  }
  return out;
}

/** First non-empty value of a filter, if any */
export function firstFilter(filters: FilterParams, name: string): string | undefined {
  return filters.get(name)?.find((v) => v.length > 0);
}

function readPageParam(query: Record<string, unknown>, name: "number" | "size"): string | undefined {
  const page = query.page;
  const raw = isRecord(page) ? page[name] : query[`page[${name}]`];
  return toStrings(raw)[0];
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\d+$/.test(raw)) return fallback;
  const value = parseInt(raw, 10);
  return value >= 1 ? value : fallback;
}

/**
 * page[number] (1-based) and page[size], clamped to the configured maximum.
 * A page whose row offset is not a safe integer is rejected.
 */
export function parsePage(query: unknown, limits: { defaultSize: number; maxSize: number }): PageRequest {
  if (!isRecord(query)) return { number: 1, size: limits.defaultSize };
  const page = {
    number: positiveInt(readPageParam(query, "number"), 1),
    size: Math.min(positiveInt(readPageParam(query, "size"), limits.defaultSize), limits.maxSize),
  };
  if (!Number.isSafeInteger((page.number - 1) * page.size)) {
    throw new InvalidFilterValueError("number", "page offset is out of range", "page[number]");
  }
  return page;
}

/** `include=a,b` relationship names */
export function parseInclude(query: unknown): string[] {
  if (!isRecord(query)) return [];
  return toStrings(query.include)
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter(Boolean);
}
