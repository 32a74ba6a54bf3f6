import { decodeDid, InvalidHexError, type ApiConfig } from "@didscan/shared";
import type { EntityKind, EntityRecord, Predicate, Store } from "@didscan/db";
import { InvalidFilterValueError, NotFoundError } from "./errors.js";
import { firstFilter, type FilterParams, type PageRequest } from "./params.js";
import { SearchIndexResolver, type SearchIndexKey } from "./search-index.js";
import type { DetailResource, FilterSpec, ListResource, SearchIndexSpec } from "./resources/types.js";

export interface ResolvedPage<K extends EntityKind> {
  records: EntityRecord<K>[];
  total: number;
  /** True when the page came through the search index */
  viaSearchIndex: boolean;
}

export interface RelatedRecords {
  entity: EntityKind;
  records: EntityRecord<EntityKind>[];
  omit: string[];
}

const INT = /^\d+$/;

/** Decode a hex DID from a filter value; malformed input is a client error */
export function decodeDidFilter(param: string, value: string): string {
  try {
    return decodeDid(value);
  } catch (err) {
    if (err instanceof InvalidHexError) throw new InvalidFilterValueError(param, err.message);
    throw err;
  }
}

function offsetOf(page: PageRequest): number {
  return (page.number - 1) * page.size;
}

/**
 * Turns a resource definition plus request filters into store queries.
 * One instance serves one request, bound to that request's store session.
 */
export class QueryResolver {
  private readonly searchIndex: SearchIndexResolver;

  constructor(
    private readonly store: Store,
    private readonly config: ApiConfig,
  ) {
    this.searchIndex = new SearchIndexResolver(store);
  }

  async resolve<K extends EntityKind>(
    resource: ListResource<K>,
    filters: FilterParams,
    page: PageRequest,
  ): Promise<ResolvedPage<K>> {
    const categories = this.searchCategories(resource.searchIndex, filters);
    if (resource.searchIndex && categories !== null) {
      return this.resolveViaSearchIndex(resource, resource.searchIndex, categories, filters, page);
    }

    const where: Predicate[] = [...(resource.baseWhere ?? [])];
    for (const filter of resource.filters ?? []) {
      const predicates = await this.filterPredicates(filter, filters);
      // A "latest" filter over an empty table can match nothing
      if (predicates === null) return { records: [], total: 0, viaSearchIndex: false };
      where.push(...predicates);
    }

    const [records, total] = await Promise.all([
      this.store.findMany(resource.entity, {
        where,
        orderBy: resource.orderBy,
        limit: page.size,
        offset: offsetOf(page),
      }),
      this.store.count(resource.entity, where),
    ]);
    return { records, total, viaSearchIndex: false };
  }

  async getItem<K extends EntityKind>(resource: DetailResource<K>, id: string): Promise<EntityRecord<K>> {
    const alternatives = resource.keys(id);
    if (alternatives) {
      for (const where of alternatives) {
        const record = await this.store.findOne(resource.entity, where);
        if (record) return record;
      }
    }
    throw new NotFoundError(`${resource.entity} "${id}" not found`);
  }

  /** Expand `include=` names the resource knows; unknown names are ignored */
  async include<K extends EntityKind>(
    resource: DetailResource<K>,
    record: EntityRecord<K>,
    names: string[],
  ): Promise<Map<string, RelatedRecords>> {
    const out = new Map<string, RelatedRecords>();
    for (const name of names) {
      const related = resource.includes?.[name];
      if (!related || out.has(name)) continue;
      const records = await this.store.findMany(related.entity, {
        where: related.where(record),
        orderBy: related.orderBy,
        limit: related.limit,
      });
      out.set(name, { entity: related.entity, records, omit: related.omit ?? [] });
    }
    return out;
  }

  /** Account records by id, for embedding next to the records that reference them */
  async accountsById(ids: (string | null)[]): Promise<Map<string, EntityRecord<"account">>> {
    const unique = [...new Set(ids.filter((id): id is string => !!id))];
    if (unique.length === 0) return new Map();
    const accounts = await this.store.findMany("account", {
      where: [{ op: "in", column: "id", values: unique }],
    });
    return new Map(accounts.map((a) => [a.id, a]));
  }

  // ---- search index path ----

  /** Category ids when the search-index path applies, otherwise null */
  private searchCategories(index: SearchIndexSpec | undefined, filters: FilterParams): number[] | null {
    if (!index) return null;
    if (index.trigger === "address") {
      return firstFilter(filters, "address") ? index.categories(this.config.searchIndex) : null;
    }
    const raw = filters.get("search_index");
    if (!raw || raw.every((v) => v.length === 0)) return null;
    const ids = raw.flatMap((v) => v.split(",")).map((v) => v.trim()).filter(Boolean);
    for (const id of ids) {
      if (!INT.test(id)) throw new InvalidFilterValueError("search_index", `"${id}" is not an integer`);
    }
    return ids.map((id) => parseInt(id, 10));
  }

  private async resolveViaSearchIndex<K extends EntityKind>(
    resource: ListResource<K>,
    index: SearchIndexSpec,
    categories: number[],
    filters: FilterParams,
    page: PageRequest,
  ): Promise<ResolvedPage<K>> {
    const address = firstFilter(filters, "address");
    const accountId = address === undefined ? null : decodeDidFilter("address", address);

    const keys = await this.searchIndex.expand(categories, accountId, index.target);
    const offset = offsetOf(page);
    const pageKeys = keys.slice(offset, offset + page.size);
    if (pageKeys.length === 0) return { records: [], total: keys.length, viaSearchIndex: true };

    const records = await this.store.findMany(resource.entity, {
      where: [
        {
          op: "tupleIn",
          columns: ["block_id", index.target],
          values: pageKeys.map((k) => [k.block_id, k.idx]),
        },
      ],
    });
    return { records: orderByKeys(records, pageKeys, index.target), total: keys.length, viaSearchIndex: true };
  }

  // ---- regular filters ----

  /** Predicates for one declared filter; null means "matches nothing" */
  private async filterPredicates(filter: FilterSpec, filters: FilterParams): Promise<Predicate[] | null> {
    const value = firstFilter(filters, filter.param);

    switch (filter.kind) {
      case "eq": {
        if (value === undefined) return filter.fallback ?? [];
        if (filter.type === "int") {
          if (!INT.test(value)) throw new InvalidFilterValueError(filter.param, `"${value}" is not an integer`);
          return [{ op: "eq", column: filter.column, value: parseInt(value, 10) }];
        }
        return [{ op: "eq", column: filter.column, value }];
      }
      case "flag":
        return value === undefined ? [] : filter.predicates;
      case "did":
        return value === undefined
          ? []
          : [{ op: "eq", column: filter.column, value: decodeDidFilter(filter.param, value) }];
      case "latest": {
        if (value === undefined) return [];
        const latest = await this.latestId(filter.source);
        return latest === null ? null : [{ op: "eq", column: filter.column, value: latest }];
      }
    }
  }

  private async latestId(source: "runtime" | "session"): Promise<number | null> {
    if (source === "runtime") {
      const runtime = await this.store.findOne("runtime", [], [{ column: "spec_version", direction: "desc" }]);
      return runtime ? runtime.spec_version : null;
    }
    const session = await this.store.findOne("session", [], [{ column: "id", direction: "desc" }]);
    return session ? session.id : null;
  }
}

/** Re-order fetched records to match the search-index key order */
function orderByKeys<K extends EntityKind>(
  records: EntityRecord<K>[],
  keys: SearchIndexKey[],
  target: "extrinsic_idx" | "event_idx",
): EntityRecord<K>[] {
  const byKey = new Map<string, EntityRecord<K>>();
  for (const record of records) {
    const values: Readonly<Record<string, unknown>> = record;
    byKey.set(`${String(values.block_id)}-${String(values[target])}`, record);
  }
  const ordered: EntityRecord<K>[] = [];
  for (const key of keys) {
    const record = byKey.get(`${key.block_id}-${key.idx}`);
    if (record) ordered.push(record);
  }
  return ordered;
}
