import type express from "express";
import type { EntityKind, EntityRecord } from "@didscan/db";
import type { ResourceObject } from "@didscan/shared";
import { handle, requireParam, type RequestScope, type RouteOptions } from "./handler.js";
import type { ResolvedPage } from "./query-resolver.js";
import type { DetailResource, ListResource } from "./resources/types.js";
import { renderItem, renderList, toResource, withRelationships } from "./serializer.js";
import type { ApiContext } from "./types.js";

export interface ListRouteOptions<K extends EntityKind> extends RouteOptions {
  /** Attributes dropped from every item */
  omit?: (page: ResolvedPage<K>) => string[];
  /** Post-process the rendered items (embed accounts, normalize, mask) */
  decorate?: (scope: RequestScope, items: ResourceObject[], records: EntityRecord<K>[]) => Promise<ResourceObject[]>;
}

export interface DetailRouteOptions<K extends EntityKind> extends RouteOptions {
  /** Path parameter holding the id */
  param?: string;
  decorate?: (scope: RequestScope, item: ResourceObject, record: EntityRecord<K>) => Promise<ResourceObject>;
}

/** GET handler for a paginated, filterable resource list */
export function listHandler<K extends EntityKind>(
  ctx: ApiContext,
  resource: ListResource<K>,
  options: ListRouteOptions<K> = {},
): express.RequestHandler {
  return handle(ctx, options, async (scope) => {
    const page = await scope.resolver.resolve(resource, scope.filters, scope.page);
    const omit = options.omit?.(page) ?? [];
    const items = page.records.map((r) => toResource(resource.entity, r, omit));
    const data = options.decorate ? await options.decorate(scope, items, page.records) : items;
    return renderList(data, scope.page, page.total);
  });
}

/** GET handler for one resource plus its `include=` relationships */
export function detailHandler<K extends EntityKind>(
  ctx: ApiContext,
  resource: DetailResource<K>,
  options: DetailRouteOptions<K> = {},
): express.RequestHandler {
  return handle(ctx, options, async (scope) => {
    const record = await scope.resolver.getItem(resource, requireParam(scope, options.param ?? "id"));
    const related = await scope.resolver.include(resource, record, scope.include);
    const item = withRelationships(toResource(resource.entity, record), related);
    return renderItem(options.decorate ? await options.decorate(scope, item, record) : item);
  });
}

/** Embed the account each record points at as attribute `attribute` */
export async function embedAccounts<K extends EntityKind>(
  scope: RequestScope,
  items: ResourceObject[],
  records: EntityRecord<K>[],
  accountOf: (record: EntityRecord<K>) => string | null,
  attribute: string,
): Promise<ResourceObject[]> {
  const accounts = await scope.resolver.accountsById(records.map(accountOf));
  return items.map((item, i) => {
    const record = records[i];
    const id = record === undefined ? null : accountOf(record);
    const account = id === null ? undefined : accounts.get(id);
    if (!account) return item;
    return { ...item, attributes: { ...item.attributes, [attribute]: toResource("account", account) } };
  });
}
