import type { Express } from "express";
import type { ApiContext } from "../types.js";
import { handle, requireParam } from "../handler.js";
import { detailHandler, embedAccounts, listHandler } from "../resource-handlers.js";
import {
  blockDetail,
  blockList,
  blockTotalDetail,
  blockTotalList,
  logDetail,
  logList,
} from "../resources/chain.js";
import { renderItem, toResource } from "../serializer.js";

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/block:
   *   get:
   *     tags: [Blocks]
   *     summary: List blocks
   *     description: Returns a paginated list of blocks, most recent first.
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated block list
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ListEnvelope'
   */
  app.get("/api/v1/block", listHandler(ctx, blockList));

  /**
   * @openapi
   * /api/v1/block/{id}:
   *   get:
   *     tags: [Blocks]
   *     summary: Get block by number or hash
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *         description: Block number or block hash
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of extrinsics, transactions, inherents, events, logs
   *     responses:
   *       200:
   *         description: Block detail
   *       404:
   *         description: Block not found
   */
  app.get("/api/v1/block/:id", detailHandler(ctx, blockDetail));

  /**
   * @openapi
   * /api/v1/block-total:
   *   get:
   *     tags: [Blocks]
   *     summary: List cumulative block totals
   *     parameters:
   *       - in: query
   *         name: filter[author]
   *         schema:
   *           type: string
   *         description: Hex-encoded DID of the block author
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated block totals with the author account embedded
   *       400:
   *         description: Malformed author filter
   */
  app.get(
    "/api/v1/block-total",
    listHandler(ctx, blockTotalList, {
      decorate: (scope, items, records) => embedAccounts<"blocktotal">(scope, items, records, (r) => r.author, "author_account"),
    }),
  );

  /**
   * @openapi
   * /api/v1/block-total/{id}:
   *   get:
   *     tags: [Blocks]
   *     summary: Get block totals by block number or hash
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Block totals
   *       404:
   *         description: Block not found
   */
  app.get(
    "/api/v1/block-total/:id",
    handle(ctx, {}, async (scope) => {
      const id = requireParam(scope, "id");
      // Hashes resolve through the block first
      const blockId = /^\d+$/.test(id) ? id : String((await scope.resolver.getItem(blockDetail, id)).id);
      const record = await scope.resolver.getItem(blockTotalDetail, blockId);
      const resource = toResource("blocktotal", record);
      const [item = resource] = await embedAccounts<"blocktotal">(
        scope,
        [resource],
        [record],
        (r) => r.author,
        "author_account",
      );
      return renderItem(item);
    }),
  );

  /**
   * @openapi
   * /api/v1/log:
   *   get:
   *     tags: [Blocks]
   *     summary: List digest logs
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated digest logs, most recent first
   */
  app.get("/api/v1/log", listHandler(ctx, logList));

  /**
   * @openapi
   * /api/v1/log/{id}:
   *   get:
   *     tags: [Blocks]
   *     summary: Get a digest log by "{block_id}-{log_idx}"
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Digest log
   *       404:
   *         description: Log not found
   */
  app.get("/api/v1/log/:id", detailHandler(ctx, logDetail));
}
