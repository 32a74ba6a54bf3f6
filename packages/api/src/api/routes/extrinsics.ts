import type { Express } from "express";
import type { ExtrinsicRecord, Store } from "@didscan/db";
import { recordId } from "@didscan/db";
import type { ApiContext } from "../types.js";
import { detailHandler, embedAccounts, listHandler } from "../resource-handlers.js";
import { extrinsicDetail, extrinsicList } from "../resources/extrinsics.js";
import { replaceOversizedParams, toResource } from "../serializer.js";
import { formatTransferEventParams, readTypedValues } from "../transfer-normalizer.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asIndex(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return parseInt(value, 10);
  return null;
}

/**
 * Human-readable reason for a failed extrinsic, taken from the DispatchError
 * of its ExtrinsicFailed event. Module errors are looked up in the runtime
 * error table of the extrinsic's spec version.
 */
export async function dispatchErrorMessage(store: Store, extrinsic: ExtrinsicRecord): Promise<string | null> {
  const failed = await store.findOne(
    "event",
    [
      { op: "eq", column: "block_id", value: extrinsic.block_id },
      { op: "eq", column: "extrinsic_idx", value: extrinsic.extrinsic_idx },
      { op: "eq", column: "event_id", value: "ExtrinsicFailed" },
    ],
    [{ column: "event_idx", direction: "asc" }],
  );
  if (!failed) return null;

  const dispatchError = readTypedValues(failed.attributes)[0]?.value;

  if (isRecord(dispatchError) && isRecord(dispatchError.Module)) {
    const moduleIndex = asIndex(dispatchError.Module.index);
    const errorIndex = asIndex(dispatchError.Module.error);
    if (moduleIndex === null || errorIndex === null) return null;
    const error = await store.findOne("runtimeerrormessage", [
      { op: "eq", column: "module_index", value: moduleIndex },
      { op: "eq", column: "index", value: errorIndex },
      { op: "eq", column: "spec_version", value: extrinsic.spec_version_id },
    ]);
    return error?.documentation ?? null;
  }

  const mentions = (variant: string) =>
    (isRecord(dispatchError) && variant in dispatchError) ||
    (typeof dispatchError === "string" && dispatchError.includes(variant));
  if (mentions("BadOrigin")) return "Bad origin";
  if (mentions("CannotLookup")) return "Cannot lookup";
  return null;
}

function isTransferCall(extrinsic: ExtrinsicRecord, paramCount: number): boolean {
  if (extrinsic.module_id !== "balances") return false;
  return extrinsic.call_id === "transfer" || (extrinsic.call_id === "transfer_with_memo" && paramCount >= 2);
}

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/extrinsic:
   *   get:
   *     tags: [Extrinsics]
   *     summary: List extrinsics
   *     description: |
   *       Returns a paginated list of extrinsics, most recent first. Call params
   *       are left out unless the list is resolved through filter[search_index],
   *       which also suppresses every other filter.
   *     parameters:
   *       - in: query
   *         name: filter[signed]
   *         schema:
   *           type: integer
   *           enum: [0, 1]
   *       - in: query
   *         name: filter[module_id]
   *         schema:
   *           type: string
   *       - in: query
   *         name: filter[call_id]
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/AddressFilter'
   *       - $ref: '#/components/parameters/SearchIndexFilter'
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated extrinsic list
   *       400:
   *         description: Malformed filter value
   */
  app.get(
    "/api/v1/extrinsic",
    listHandler(ctx, extrinsicList, {
      omit: (page) => (page.viaSearchIndex ? [] : ["params"]),
      decorate: async (scope, items, records) => {
        const withAccounts = await embedAccounts<"extrinsic">(scope, items, records, (r) => r.address, "account");
        return withAccounts.map((item) =>
          "params" in item.attributes
            ? { ...item, attributes: { ...item.attributes, params: replaceOversizedParams(item.attributes.params, item.id) } }
            : item,
        );
      },
    }),
  );

  /**
   * @openapi
   * /api/v1/extrinsic/{id}:
   *   get:
   *     tags: [Extrinsics]
   *     summary: Get extrinsic by hash or "{block_id}-{extrinsic_idx}"
   *     description: |
   *       Adds the call documentation, block datetime, signer account and, for
   *       failed extrinsics, the dispatch error message. Balance transfers carry
   *       `event_params` whose DIDs are masked unless the bearer is a party.
   *     security:
   *       - bearerAuth: []
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
   *           enum: [events]
   *     responses:
   *       200:
   *         description: Extrinsic detail
   *       404:
   *         description: Extrinsic not found
   */
  app.get(
    "/api/v1/extrinsic/:id",
    detailHandler(ctx, extrinsicDetail, {
      identityDependent: true,
      decorate: async (scope, item, extrinsic) => {
        const { store } = scope;
        const attributes: Record<string, unknown> = { ...item.attributes };

        const [call, block, account] = await Promise.all([
          store.findOne("runtimecall", [
            { op: "eq", column: "module_id", value: extrinsic.module_id },
            { op: "eq", column: "call_id", value: extrinsic.call_id },
            { op: "eq", column: "spec_version", value: extrinsic.spec_version_id },
          ]),
          store.findOne("block", [{ op: "eq", column: "id", value: extrinsic.block_id }]),
          extrinsic.address === null
            ? Promise.resolve(null)
            : store.findOne("account", [{ op: "eq", column: "id", value: extrinsic.address }]),
        ]);
        attributes.documentation = call?.documentation ?? null;
        attributes.datetime = block?.datetime ?? null;
        if (account) attributes.account = toResource("account", account);

        const params = readTypedValues(extrinsic.params);
        if (extrinsic.params !== null) {
          attributes.params = replaceOversizedParams(extrinsic.params, recordId("extrinsic", extrinsic));
        }

        if (isTransferCall(extrinsic, params.length)) {
          const transfer = await store.findOne("event", [
            { op: "eq", column: "block_id", value: extrinsic.block_id },
            { op: "eq", column: "extrinsic_idx", value: extrinsic.extrinsic_idx },
            { op: "eq", column: "event_id", value: "Transfer" },
          ]);
          if (transfer) {
            const memo = extrinsic.call_id === "transfer_with_memo" ? params[2] : undefined;
            attributes.event_params = formatTransferEventParams(
              transfer.attributes,
              { identity: scope.identity, mask: scope.config.mask },
              memo,
            );
          }
        }

        if (extrinsic.error) {
          const message = await dispatchErrorMessage(store, extrinsic);
          if (message !== null) attributes.error_message = message;
        }

        return { ...item, attributes };
      },
    }),
  );
}
