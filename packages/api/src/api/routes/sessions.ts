import type { Express } from "express";
import type { ApiContext } from "../types.js";
import { detailHandler, embedAccounts, listHandler } from "../resource-handlers.js";
import {
  sessionDetail,
  sessionList,
  sessionNominatorList,
  sessionValidatorDetail,
  sessionValidatorList,
} from "../resources/sessions.js";

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/session/session:
   *   get:
   *     tags: [Sessions]
   *     summary: List sessions
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated sessions, most recent first
   */
  app.get("/api/v1/session/session", listHandler(ctx, sessionList));

  /**
   * @openapi
   * /api/v1/session/session/{id}:
   *   get:
   *     tags: [Sessions]
   *     summary: Get session by id
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of blocks, validators
   *     responses:
   *       200:
   *         description: Session detail
   *       404:
   *         description: Session not found
   */
  app.get("/api/v1/session/session/:id", detailHandler(ctx, sessionDetail));

  /**
   * @openapi
   * /api/v1/session/validator:
   *   get:
   *     tags: [Sessions]
   *     summary: List session validators
   *     parameters:
   *       - in: query
   *         name: filter[latestSession]
   *         schema:
   *           type: string
   *         description: Any non-empty value restricts to the newest session
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated validators by session and rank
   */
  app.get("/api/v1/session/validator", listHandler(ctx, sessionValidatorList));

  /**
   * @openapi
   * /api/v1/session/validator/{id}:
   *   get:
   *     tags: [Sessions]
   *     summary: Get a session validator by "{session_id}-{rank_validator}"
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
   *           enum: [nominators]
   *     responses:
   *       200:
   *         description: Validator with its stash and controller accounts
   *       404:
   *         description: Validator not found
   */
  app.get(
    "/api/v1/session/validator/:id",
    detailHandler(ctx, sessionValidatorDetail, {
      decorate: async (scope, item, validator) => {
        const [withStash = item] = await embedAccounts<"sessionvalidator">(
          scope,
          [item],
          [validator],
          (v) => v.validator_stash,
          "validator_stash_account",
        );
        const [withController = withStash] = await embedAccounts<"sessionvalidator">(
          scope,
          [withStash],
          [validator],
          (v) => v.validator_controller,
          "validator_controller_account",
        );
        return withController;
      },
    }),
  );

  /**
   * @openapi
   * /api/v1/session/nominator:
   *   get:
   *     tags: [Sessions]
   *     summary: List session nominators
   *     parameters:
   *       - in: query
   *         name: filter[latestSession]
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated nominators by session, validator rank and nominator rank
   */
  app.get("/api/v1/session/nominator", listHandler(ctx, sessionNominatorList));
}
