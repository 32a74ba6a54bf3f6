import type { Express } from "express";
import type { EventRecord } from "@didscan/db";
import { toRawDid, type ResourceObject } from "@didscan/shared";
import type { ApiContext } from "../types.js";
import { handle, requireParam, type RequestScope } from "../handler.js";
import { firstFilter } from "../params.js";
import { detailHandler, listHandler } from "../resource-handlers.js";
import { transferDetail, transferList } from "../resources/events.js";
import { renderList } from "../serializer.js";
import { normalizeTransfer, transferId } from "../transfer-normalizer.js";

function transferResource(scope: RequestScope, event: EventRecord, extra: Record<string, unknown> = {}): ResourceObject {
  const transfer = normalizeTransfer(event, { identity: scope.identity, mask: scope.config.mask });
  return { type: "balancetransfer", id: transferId(transfer), attributes: { ...transfer, ...extra } };
}

/** balances.Transfer events naming `did` (raw 0x form or DID text), newest first */
async function transferHistory(scope: RequestScope, did: string) {
  const { rows, total } = await scope.store.transferEventsByParticipant({
    accountHex: toRawDid(did),
    limit: scope.page.size,
    offset: (scope.page.number - 1) * scope.page.size,
  });
  const data = rows.map(({ datetime, ...event }) => transferResource(scope, event, { datetime }));
  return renderList(data, scope.page, total);
}

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/balances/transfer:
   *   get:
   *     tags: [Transfers]
   *     summary: List balance transfers
   *     description: |
   *       Without a filter, lists balances.Transfer events. With filter[address]
   *       the list comes from the search index and also includes claims,
   *       deposits and staking rewards of that account. Party DIDs are masked
   *       unless the bearer is the sender or the receiver.
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/AddressFilter'
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated normalized transfers
   *       400:
   *         description: Malformed address filter
   */
  app.get(
    "/api/v1/balances/transfer",
    listHandler(ctx, transferList, {
      identityDependent: true,
      decorate: async (scope, _items, records) => records.map((event) => transferResource(scope, event)),
    }),
  );

  /**
   * @openapi
   * /api/v1/balances/transfer-history:
   *   get:
   *     tags: [Transfers]
   *     summary: Transfer history of a DID
   *     description: |
   *       filter[address] takes either the raw 0x-prefixed DID or the DID text.
   *       Without it, behaves like /api/v1/balances/transfer.
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: filter[address]
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated transfers with the block datetime of each
   */
  app.get(
    "/api/v1/balances/transfer-history",
    handle(ctx, { identityDependent: true }, async (scope) => {
      const address = firstFilter(scope.filters, "address");
      if (address !== undefined) return transferHistory(scope, address);

      const page = await scope.resolver.resolve(transferList, scope.filters, scope.page);
      return renderList(
        page.records.map((event) => transferResource(scope, event)),
        scope.page,
        page.total,
      );
    }),
  );

  /**
   * @openapi
   * /api/v1/balances/transfer-history/{did}:
   *   get:
   *     tags: [Transfers]
   *     summary: Transfer history of a DID given in the path
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: did
   *         required: true
   *         schema:
   *           type: string
   *         description: Raw 0x-prefixed DID or DID text
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated transfers with the block datetime of each
   *       400:
   *         description: DID missing
   */
  app.get(
    "/api/v1/balances/transfer-history/:did",
    handle(ctx, { identityDependent: true }, (scope) => transferHistory(scope, requireParam(scope, "did"))),
  );

  /**
   * @openapi
   * /api/v1/balances/transfer/{id}:
   *   get:
   *     tags: [Transfers]
   *     summary: Get a transfer by "{block_id}-{event_idx}"
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Normalized transfer
   *       404:
   *         description: Transfer not found
   */
  app.get(
    "/api/v1/balances/transfer/:id",
    detailHandler(ctx, transferDetail, {
      identityDependent: true,
      decorate: async (scope, _item, event) => transferResource(scope, event),
    }),
  );
}
