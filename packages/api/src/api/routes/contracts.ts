import type { Express } from "express";
import type { ApiContext } from "../types.js";
import { detailHandler, listHandler } from "../resource-handlers.js";
import { contractDetail, contractList } from "../resources/chain.js";

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/contract/contract:
   *   get:
   *     tags: [Contracts]
   *     summary: List contracts
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated contracts, newest first
   */
  app.get("/api/v1/contract/contract", listHandler(ctx, contractList));

  /**
   * @openapi
   * /api/v1/contract/contract/{id}:
   *   get:
   *     tags: [Contracts]
   *     summary: Get contract by code hash
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Contract
   *       404:
   *         description: Contract not found
   */
  app.get("/api/v1/contract/contract/:id", detailHandler(ctx, contractDetail));
}
