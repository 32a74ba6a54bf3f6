import type { Predicate } from "@didscan/db";
import type { KeyParser } from "./types.js";

export type SegmentType = "int" | "text";

const INT = /^\d+$/;

function segmentPredicate(column: string, type: SegmentType, raw: string): Predicate | null {
  if (type === "int") {
    return INT.test(raw) ? { op: "eq", column, value: parseInt(raw, 10) } : null;
  }
  return raw.length > 0 ? { op: "eq", column, value: raw } : null;
}

/** Dash-joined composite key, e.g. "1000-2" → block_id = 1000 AND extrinsic_idx = 2 */
export function compositeKey(...columns: [string, SegmentType][]): KeyParser {
  return (id) => {
    const parts = id.split("-");
    if (parts.length !== columns.length) return null;
    const where: Predicate[] = [];
    for (let i = 0; i < columns.length; i++) {
      const col = columns[i];
      const raw = parts[i];
      if (col === undefined || raw === undefined) return null;
      const p = segmentPredicate(col[0], col[1], raw);
      if (!p) return null;
      where.push(p);
    }
    return [where];
  };
}

export function singleKey(column: string, type: SegmentType): KeyParser {
  return (id) => {
    const p = segmentPredicate(column, type, id);
    return p ? [[p]] : null;
  };
}

/** Numeric ids hit `numericColumn`, anything else `textColumn` */
export function numericOrText(numericColumn: string, textColumn: string): KeyParser {
  return (id) =>
    INT.test(id)
      ? [[{ op: "eq", column: numericColumn, value: parseInt(id, 10) }]]
      : id.length > 0
        ? [[{ op: "eq", column: textColumn, value: id }]]
        : null;
}

/** "0x…" ids match the hash column (stored without prefix), others fall back */
export function hashOr(hashColumn: string, fallback: KeyParser): KeyParser {
  return (id) => {
    if (id.startsWith("0x")) {
      return id.length > 2 ? [[{ op: "eq", column: hashColumn, value: id.slice(2) }]] : null;
    }
    return fallback(id);
  };
}

/** Try each parser in turn; the first match wins */
export function anyOf(...parsers: KeyParser[]): KeyParser {
  return (id) => {
    const alternatives = parsers.flatMap((p) => p(id) ?? []);
    return alternatives.length > 0 ? alternatives : null;
  };
}
