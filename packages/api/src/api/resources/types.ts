import type { EntityKind, EntityRecord, OrderBy, Predicate } from "@didscan/db";
import type { SearchIndexCategories } from "@didscan/shared";
import type { SearchIndexTarget } from "../search-index.js";

// ============================================================
// Declarative resource definitions consumed by QueryResolver
// ============================================================

export type FilterSpec =
  /** Column equality; `fallback` applies when the filter is absent */
  | { kind: "eq"; param: string; column: string; type?: "int" | "text"; fallback?: Predicate[] }
  /** Any non-empty value adds the fixed predicates */
  | { kind: "flag"; param: string; predicates: Predicate[] }
  /** Value is a hex-encoded DID, compared as decoded text */
  | { kind: "did"; param: string; column: string }
  /** Restrict to the newest runtime or session */
  | { kind: "latest"; param: string; source: "runtime" | "session"; column: string };

export type SearchIndexSpec =
  /** filter[search_index] ids, account from filter[address] */
  | { trigger: "search_index"; target: SearchIndexTarget }
  /** filter[address] alone selects the given categories */
  | {
      trigger: "address";
      target: SearchIndexTarget;
      categories: (c: SearchIndexCategories) => number[];
    };

export interface ListResource<K extends EntityKind> {
  entity: K;
  orderBy: OrderBy[];
  /** Applied on the regular path only; the search-index path replaces it */
  baseWhere?: Predicate[];
  filters?: FilterSpec[];
  searchIndex?: SearchIndexSpec;
}

/** Alternative predicate sets tried in order, or null when the id cannot match */
export type KeyParser = (id: string) => Predicate[][] | null;

export interface IncludeSpec<K extends EntityKind> {
  entity: EntityKind;
  where: (record: EntityRecord<K>) => Predicate[];
  orderBy: OrderBy[];
  limit?: number;
  /** Attributes left out of the related resource objects */
  omit?: string[];
}

export interface DetailResource<K extends EntityKind> {
  entity: K;
  keys: KeyParser;
  includes?: Record<string, IncludeSpec<K>>;
}
