import type { Store } from "@didscan/db";

/** Which index column identifies the primary record: extrinsics or events */
export type SearchIndexTarget = "extrinsic_idx" | "event_idx";

export interface SearchIndexKey {
  block_id: number;
  idx: number;
}

/**
 * Expands "account + categories" into the ordered keys of the primary
 * records, most recent first: sorting_value desc with unranked entries
 * last, then block_id desc, then the entity index desc. Entries without an entity index for `target` are
 * skipped; duplicates keep their first (highest ranked) position.
 */
export class SearchIndexResolver {
  constructor(private readonly store: Store) {}

  async expand(
    categories: readonly number[],
    accountId: string | null,
    target: SearchIndexTarget,
  ): Promise<SearchIndexKey[]> {
    if (categories.length === 0 || !accountId) return [];

    const entries = await this.store.findMany("searchindex", {
      where: [
        { op: "in", column: "index_type_id", values: [...categories] },
        { op: "eq", column: "account_id", value: accountId },
      ],
      orderBy: [
        { column: "sorting_value", direction: "desc", nulls: "last" },
        { column: "block_id", direction: "desc" },
        { column: target, direction: "desc" },
      ],
    });

    const seen = new Set<string>();
    const keys: SearchIndexKey[] = [];
    for (const entry of entries) {
      const idx = entry[target];
      if (idx === null) continue;
      const id = `${entry.block_id}-${idx}`;
      if (seen.has(id)) continue;
      seen.add(id);
      keys.push({ block_id: entry.block_id, idx });
    }
    return keys;
  }
}
