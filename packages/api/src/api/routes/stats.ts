import type { Express } from "express";
import type { StatsRecord } from "@didscan/db";
import { CACHE_TTL } from "@didscan/shared";
import type { ApiContext } from "../types.js";
import { handle, type RequestScope } from "../handler.js";
import { renderItem } from "../serializer.js";

const NOT_AVAILABLE = "N/A";
const NOT_FOUND_MESSAGE = "Requested data not found";

type StatsView = "currency" | "network";

async function findStats(scope: RequestScope, currencyId: string): Promise<StatsRecord | null> {
  return scope.store.findOne("stats", [{ op: "eq", column: "id", value: currencyId }]);
}

/**
 * `currency_stats` resource. Both views keep the same attribute names when
 * no stats row exists, with every value set to "N/A".
 */
export function currencyStatsResource(view: StatsView, currencyId: string, stats: StatsRecord | null) {
  const naming =
    view === "currency"
      ? { token_name: stats ? stats.token_name : NOT_AVAILABLE }
      : {
          currency_name: stats ? stats.token_name : NOT_AVAILABLE,
          currency_symbol: stats ? stats.symbol : NOT_AVAILABLE,
        };

  return {
    type: "currency_stats",
    id: currencyId,
    attributes: {
      currency_id: stats ? stats.id : NOT_AVAILABLE,
      ...naming,
      official_site: stats ? stats.site : NOT_AVAILABLE,
      currency_decimals: stats ? stats.decimals : NOT_AVAILABLE,
      current_circulation: stats ? stats.current_circulation : NOT_AVAILABLE,
      total_supply: stats ? stats.total_supply : NOT_AVAILABLE,
    },
  };
}

export function register(app: Express, ctx: ApiContext): void {
  const statsHandler = (view: StatsView, ttl: number) =>
    handle(ctx, { ttl }, async (scope) => {
      const currencyId = scope.params.currencyId ?? scope.config.chain.defaultCurrencyId;
      return renderItem(currencyStatsResource(view, currencyId, await findStats(scope, currencyId)));
    });

  /**
   * @openapi
   * /api/v1/stats/currency/{currencyId}:
   *   get:
   *     tags: [Stats]
   *     summary: Currency statistics
   *     description: |
   *       Token name, site, decimals, circulation and supply of a currency.
   *       Unknown currencies return the same shape with "N/A" values.
   *       Without a currency id the configured default currency is used.
   *     parameters:
   *       - in: path
   *         name: currencyId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: currency_stats resource
   */
  const currency = statsHandler("currency", CACHE_TTL.currencyStats);
  app.get("/api/v1/stats/currency", currency);
  app.get("/api/v1/stats/currency/:currencyId", currency);

  /**
   * @openapi
   * /api/v1/stats/network/{currencyId}:
   *   get:
   *     tags: [Stats]
   *     summary: Network statistics
   *     description: Like currency statistics, naming the currency by name and symbol.
   *     parameters:
   *       - in: path
   *         name: currencyId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: currency_stats resource
   */
  const network = statsHandler("network", CACHE_TTL.default);
  app.get("/api/v1/stats/network", network);
  app.get("/api/v1/stats/network/:currencyId", network);

  /**
   * @openapi
   * /api/v1/stats/supply/{field}:
   *   get:
   *     tags: [Stats]
   *     summary: A single supply figure of the default currency
   *     description: Plain JSON value, for supply trackers.
   *     parameters:
   *       - in: path
   *         name: field
   *         required: true
   *         schema:
   *           type: string
   *           enum: [total_supply, current_circulation]
   *     responses:
   *       200:
   *         description: The figure, or "Requested data not found"
   */
  app.get(
    "/api/v1/stats/supply/:field",
    handle(ctx, {}, async (scope) => {
      const stats = await findStats(scope, scope.config.chain.defaultCurrencyId);
      if (!stats) return NOT_FOUND_MESSAGE;
      switch (scope.params.field) {
        case "total_supply":
          return stats.total_supply;
        case "current_circulation":
          return stats.current_circulation;
        default:
          return NOT_FOUND_MESSAGE;
      }
    }),
  );
}
