import type express from "express";
import type { Store } from "@didscan/db";
import type { ApiConfig, Identity } from "@didscan/shared";
import { CACHE_TTL } from "@didscan/shared";
import { toErrorResponse, ParameterRequiredError } from "./errors.js";
import { parseFilters, parseInclude, parsePage, type FilterParams, type PageRequest } from "./params.js";
import { QueryResolver } from "./query-resolver.js";
import { cacheKey } from "./response-cache.js";
import type { ApiContext } from "./types.js";

/** Everything a route body needs for one request */
export interface RequestScope {
  store: Store;
  resolver: QueryResolver;
  config: ApiConfig;
  identity: Identity;
  filters: FilterParams;
  page: PageRequest;
  include: string[];
  params: Readonly<Record<string, string | undefined>>;
}

export interface RouteOptions {
  /** Seconds a rendered response stays cached */
  ttl?: number;
  /** Output depends on the caller's identity (masked DIDs) */
  identityDependent?: boolean;
}

/** Path parameter that must be present and non-empty */
export function requireParam(scope: RequestScope, name: string): string {
  const value = scope.params[name];
  if (value === undefined || value.trim() === "") throw new ParameterRequiredError(name);
  return value;
}

/**
 * Wrap a route body with identity resolution, a scoped store session,
 * response caching and error mapping.
 *
 * Anonymous responses are cached under "{METHOD}-{full url}". When the
 * output depends on identity, authenticated callers skip the cache so one
 * caller's revealed DIDs never reach another.
 */
export function handle(
  ctx: ApiContext,
  options: RouteOptions,
  body: (scope: RequestScope) => Promise<unknown>,
): express.RequestHandler {
  const ttl = options.ttl ?? CACHE_TTL.default;

  return async (req, res) => {
    try {
      const identity = ctx.identityGate.identify(req.get("authorization"));
      const compute = () =>
        ctx.stores.withStore((store) =>
          body({
            store,
            resolver: new QueryResolver(store, ctx.config),
            config: ctx.config,
            identity,
            filters: parseFilters(req.query),
            page: parsePage(req.query, ctx.config.pagination),
            include: parseInclude(req.query),
            params: req.params,
          }),
        );

      const bypass = options.identityDependent === true && identity.kind === "authenticated";
      if (ttl <= 0 || bypass) {
        const value = await compute();
        res.setHeader("X-Cache", "MISS");
        res.json(value);
        return;
      }

      const key = cacheKey(req.method, `${req.protocol}://${req.get("host") ?? ""}${req.originalUrl}`);
      const { value, status } = await ctx.cache.getOrCompute(key, ttl, compute);
      res.setHeader("X-Cache", status);
      res.json(value);
    } catch (err) {
      const { status, body: errorBody } = toErrorResponse(err);
      if (status >= 500) console.error(`[API] ${req.method} ${req.originalUrl} failed:`, err);
      res.status(status).json(errorBody);
    }
  };
}
