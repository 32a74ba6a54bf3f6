import type { Express } from "express";
import type { AccountRecord } from "@didscan/db";
import {
  bytesToHex,
  CACHE_TTL,
  decodeDidOrRaw,
  encodeDid,
  formatBalance,
  percentageOf,
  toTokenFloat,
} from "@didscan/shared";
import type { ApiContext } from "../types.js";
import { handle, type RequestScope } from "../handler.js";
import { UpstreamUnavailableError } from "../errors.js";
import { detailHandler, embedAccounts, listHandler } from "../resource-handlers.js";
import { accountDetail, accountIndexDetail, accountIndexList, accountList } from "../resources/accounts.js";
import { renderItem } from "../serializer.js";
import { getLiveDidBalance } from "../../chain-state.js";

const BALANCE_HISTORY_LENGTH = 1000;
const TOP_HOLDERS_LIMIT = 100;

const RAW_DID = /^(0x)?[0-9a-fA-F]{64}$/;

/** "Total balance" line series of the account's last snapshots, oldest first */
async function balanceHistory(scope: RequestScope, account: AccountRecord) {
  const snapshots = await scope.store.findMany("accountinfosnapshot", {
    where: [{ op: "eq", column: "account_id", value: account.id }],
    orderBy: [{ column: "block_id", direction: "desc" }],
    limit: BALANCE_HISTORY_LENGTH,
  });
  return [
    {
      name: "Total balance",
      type: "line",
      data: snapshots
        .reverse()
        .map((s) => [s.block_id, toTokenFloat(s.balance_total, scope.config.chain.tokenDecimals)]),
    },
  ];
}

/** Live Did.Account balances; null when disabled, absent or the node cannot be reached */
async function liveBalances(ctx: ApiContext, scope: RequestScope, account: AccountRecord) {
  if (!ctx.rpcPool || !scope.config.chain.useNodeBalances) return null;

  const storage = await scope.store.findOne(
    "runtimestorage",
    [
      { op: "eq", column: "module_id", value: "did" },
      { op: "eq", column: "name", value: "Account" },
    ],
    [{ column: "spec_version", direction: "desc" }],
  );
  const accountHex = RAW_DID.test(account.id) ? account.id : encodeDid(account.id);

  try {
    const balance = await getLiveDidBalance(ctx.rpcPool, storage, accountHex);
    if (!balance) return null;
    return {
      balance_free: balance.free,
      balance_reserved: balance.reserved,
      misc_frozen_balance: balance.misc_frozen,
      fee_frozen_balance: balance.fee_frozen,
      nonce: null,
    };
  } catch (err) {
    if (!(err instanceof UpstreamUnavailableError)) throw err;
    console.warn(`[ChainState] Live balance of ${account.id} unavailable: ${err.message}`);
    return null;
  }
}

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/account:
   *   get:
   *     tags: [Accounts]
   *     summary: List accounts
   *     description: |
   *       Returns a paginated list of accounts sorted by total balance
   *       (descending). Any non-empty value enables a role filter.
   *     parameters:
   *       - in: query
   *         name: filter[is_validator]
   *         schema:
   *           type: string
   *       - in: query
   *         name: filter[was_validator]
   *         schema:
   *           type: string
   *       - in: query
   *         name: filter[has_identity]
   *         schema:
   *           type: string
   *         description: Accounts with an identity and no bad judgement
   *       - in: query
   *         name: filter[identity_judgement_good]
   *         schema:
   *           type: string
   *       - in: query
   *         name: filter[blacklist]
   *         schema:
   *           type: string
   *         description: Accounts with at least one bad judgement
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated account list
   */
  app.get("/api/v1/account", listHandler(ctx, accountList));

  /**
   * @openapi
   * /api/v1/account/top-holders:
   *   get:
   *     tags: [Accounts]
   *     summary: Richest DID accounts
   *     description: |
   *       Latest balance snapshot of each DID account, top 100 by total balance.
   *       Balances are in whole tokens; percentage is of the total issuance.
   *     responses:
   *       200:
   *         description: Top holders
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 data:
   *                   type: array
   *                   items:
   *                     type: object
   *                     properties:
   *                       block_id:
   *                         type: integer
   *                       did:
   *                         type: string
   *                       balance_total:
   *                         type: string
   *                       balance_free:
   *                         type: string
   *                       balance_reserved:
   *                         type: string
   *                       percentage:
   *                         type: string
   */
  app.get(
    "/api/v1/account/top-holders",
    handle(ctx, {}, async ({ store, config }) => {
      const { tokenDecimals, totalIssuance, didMethodPrefix } = config.chain;
      const rows = await store.topHolders({
        accountPrefixHex: bytesToHex(new TextEncoder().encode(didMethodPrefix)),
        limit: TOP_HOLDERS_LIMIT,
      });
      return renderItem(
        rows.map((row) => ({
          block_id: row.block_id,
          did: decodeDidOrRaw(row.account_id),
          balance_total: formatBalance(row.balance_total, tokenDecimals),
          balance_free: formatBalance(row.balance_free, tokenDecimals),
          balance_reserved: formatBalance(row.balance_reserved, tokenDecimals),
          percentage: percentageOf(row.balance_total, tokenDecimals, totalIssuance),
        })),
      );
    }),
  );

  /**
   * @openapi
   * /api/v1/account/{id}:
   *   get:
   *     tags: [Accounts]
   *     summary: Get account by address or index address
   *     description: |
   *       Adds a balance_history series. When live balances are enabled, the
   *       balances are read from the node's Did.Account storage; they are left
   *       as indexed when the node is unavailable.
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of recent_extrinsics, indices
   *     responses:
   *       200:
   *         description: Account detail
   *       404:
   *         description: Account not found
   */
  app.get(
    "/api/v1/account/:id",
    detailHandler(ctx, accountDetail, {
      ttl: CACHE_TTL.accountDetail,
      decorate: async (scope, item, account) => {
        const [history, live] = await Promise.all([
          balanceHistory(scope, account),
          liveBalances(ctx, scope, account),
        ]);
        return { ...item, attributes: { ...item.attributes, balance_history: history, ...live } };
      },
    }),
  );

  /**
   * @openapi
   * /api/v1/indices/account:
   *   get:
   *     tags: [Accounts]
   *     summary: List account indices
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated account indices, most recently updated first
   */
  app.get("/api/v1/indices/account", listHandler(ctx, accountIndexList));

  /**
   * @openapi
   * /api/v1/indices/account/{id}:
   *   get:
   *     tags: [Accounts]
   *     summary: Get account index by short address
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *           enum: [recent_extrinsics]
   *     responses:
   *       200:
   *         description: Account index with its account embedded
   *       404:
   *         description: Index not found
   */
  app.get(
    "/api/v1/indices/account/:id",
    detailHandler(ctx, accountIndexDetail, {
      decorate: async (scope, item, index) => {
        const [embedded = item] = await embedAccounts<"accountindex">(scope, [item], [index], (i) => i.account_id, "account");
        return embedded;
      },
    }),
  );
}
