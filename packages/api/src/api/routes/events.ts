import type { Express } from "express";
import { decodeDidOrRaw } from "@didscan/shared";
import type { ApiContext } from "../types.js";
import { detailHandler, listHandler } from "../resource-handlers.js";
import { eventDetail, eventList } from "../resources/events.js";
import { maskByRole } from "../privacy-mask.js";
import { readTypedValues } from "../transfer-normalizer.js";

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/event:
   *   get:
   *     tags: [Events]
   *     summary: List events
   *     description: |
   *       Returns a paginated list of events, most recent first. Without
   *       filter[event_id], ExtrinsicSuccess and ExtrinsicFailed are left out.
   *     parameters:
   *       - in: query
   *         name: filter[module_id]
   *         schema:
   *           type: string
   *       - in: query
   *         name: filter[event_id]
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/AddressFilter'
   *       - $ref: '#/components/parameters/SearchIndexFilter'
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated event list
   *       400:
   *         description: Malformed filter value
   */
  app.get("/api/v1/event", listHandler(ctx, eventList));

  /**
   * @openapi
   * /api/v1/event/{id}:
   *   get:
   *     tags: [Events]
   *     summary: Get event by "{block_id}-{event_idx}"
   *     description: |
   *       `Did` attributes are decoded to text. They are all masked unless the
   *       bearer's DID is one of them.
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
   *         description: Event detail with runtime documentation
   *       404:
   *         description: Event not found
   */
  app.get(
    "/api/v1/event/:id",
    detailHandler(ctx, eventDetail, {
      identityDependent: true,
      decorate: async (scope, item, event) => {
        const runtimeEvent = await scope.store.findOne("runtimeevent", [
          { op: "eq", column: "module_id", value: event.module_id },
          { op: "eq", column: "event_id", value: event.event_id },
          { op: "eq", column: "spec_version", value: event.spec_version_id },
        ]);

        const attrs = readTypedValues(event.attributes);
        const dids = attrs.flatMap((attr, index) =>
          attr.type === "Did"
            ? [{ role: String(index), value: decodeDidOrRaw(attr.value), participant: true }]
            : [],
        );
        const shown = maskByRole(dids, scope.identity, scope.config.mask);

        return {
          ...item,
          attributes: {
            ...item.attributes,
            attributes: attrs.map((attr, index) => {
              const did = shown.get(String(index));
              return did === undefined ? attr : { ...attr, value: did };
            }),
            documentation: runtimeEvent?.documentation ?? null,
          },
        };
      },
    }),
  );
}
