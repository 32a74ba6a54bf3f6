import { decodeDidOrRaw } from "@didscan/shared";
import type {
  AccountDescriptor,
  CanonicalTransfer,
  Identity,
  MaskConfig,
  PartyDescriptor,
  TransferEventParams,
  TransferKind,
  TypedValue,
} from "@didscan/shared";
import type { EventRecord } from "@didscan/db";
import { maskByRole, type DidField } from "./privacy-mask.js";

// ============================================================
// Typed value lists (event attributes, call params)
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a persisted `{type, value}` list, dropping entries that are not shaped like one */
export function readTypedValues(raw: unknown): TypedValue[] {
  if (!Array.isArray(raw)) return [];
  const out: TypedValue[] = [];
  for (const item of raw) {
    if (!isRecord(item) || typeof item.type !== "string") continue;
    const entry: TypedValue = { type: item.type, value: item.value };
    if (typeof item.valueRaw === "string") entry.valueRaw = item.valueRaw;
    if (typeof item.name === "string") entry.name = item.name;
    out.push(entry);
  }
  return out;
}

function strip0x(value: string): string {
  return value.startsWith("0x") ? value.slice(2) : value;
}

// ============================================================
// Classification
// ============================================================

const KINDS: Record<string, TransferKind> = {
  "balances.Transfer": "Transfer",
  "claims.Claimed": "Claimed",
  "balances.Deposit": "Deposit",
  "staking.Reward": "Reward",
};

export function classifyTransfer(moduleId: string, eventId: string): TransferKind {
  return KINDS[`${moduleId.toLowerCase()}.${eventId}`] ?? "Unknown";
}

// ============================================================
// Normalizers, one per kind
// ============================================================

export interface NormalizeContext {
  identity: Identity;
  mask: MaskConfig;
}

type Normalized = Pick<CanonicalTransfer, "sender" | "destination" | "value" | "fee">;

function attrValue(attrs: TypedValue[], index: number): unknown {
  return attrs[index]?.value ?? null;
}

function accountDescriptor(raw: unknown, address: string): AccountDescriptor {
  const id = typeof raw === "string" ? strip0x(raw) : "";
  return { type: "account", id, attributes: { id, address } };
}

function normalizeBalanceTransfer(attrs: TypedValue[], ctx: NormalizeContext): Normalized {
  const rawSender = attrValue(attrs, 0);
  const rawDestination = attrValue(attrs, 1);
  const fields: DidField[] = [
    { role: "sender", value: decodeDidOrRaw(rawSender), participant: true },
    { role: "destination", value: decodeDidOrRaw(rawDestination), participant: true },
  ];
  const shown = maskByRole(fields, ctx.identity, ctx.mask);

  return {
    sender: accountDescriptor(rawSender, shown.get("sender") ?? ""),
    destination: accountDescriptor(rawDestination, shown.get("destination") ?? ""),
    value: attrValue(attrs, 2),
    // Chains without transaction fees emit 3 attributes
    fee: attrs.length === 4 ? attrValue(attrs, 3) : 0,
  };
}

function normalizeClaimed(attrs: TypedValue[]): Normalized {
  return {
    sender: { name: "Claim", eth_address: attrValue(attrs, 1) },
    destination: {},
    value: attrValue(attrs, 2),
    fee: 0,
  };
}

function normalizeDeposit(attrs: TypedValue[]): Normalized {
  return { sender: { name: "Deposit" }, destination: {}, value: attrValue(attrs, 1), fee: 0 };
}

function normalizeReward(attrs: TypedValue[]): Normalized {
  return { sender: { name: "Staking reward" }, destination: {}, value: attrValue(attrs, 1), fee: 0 };
}

const EMPTY: PartyDescriptor = {};

function normalizeUnknown(): Normalized {
  return { sender: EMPTY, destination: EMPTY, value: null, fee: 0 };
}

function normalizeByKind(kind: TransferKind, attrs: TypedValue[], ctx: NormalizeContext): Normalized {
  switch (kind) {
    case "Transfer":
      return normalizeBalanceTransfer(attrs, ctx);
    case "Claimed":
      return normalizeClaimed(attrs);
    case "Deposit":
      return normalizeDeposit(attrs);
    case "Reward":
      return normalizeReward(attrs);
    case "Unknown":
      return normalizeUnknown();
  }
}

/** Collapse a balance-related event into the canonical transfer shape */
export function normalizeTransfer(event: EventRecord, ctx: NormalizeContext): CanonicalTransfer {
  const attrs = readTypedValues(event.attributes);
  const normalized = normalizeByKind(classifyTransfer(event.module_id, event.event_id), attrs, ctx);

  return {
    block_id: event.block_id,
    event_idx: event.event_idx,
    extrinsic_idx: event.extrinsic_idx,
    event_id: event.event_id,
    ...normalized,
  };
}

export function transferId(transfer: Pick<CanonicalTransfer, "block_id" | "event_idx">): string {
  return `${transfer.block_id}-${transfer.event_idx}`;
}

/**
 * `event_params` of a transfer extrinsic: sender and receiver are the `Did`
 * attributes at positions 0 and 1, amount is the `Balance` attribute. A memo
 * is masked together with the parties but does not grant visibility.
 */
export function formatTransferEventParams(
  eventAttributes: unknown,
  ctx: NormalizeContext,
  memo?: TypedValue,
): TransferEventParams {
  const attrs = readTypedValues(eventAttributes);
  let sender = "";
  let receiver = "";
  let amount: unknown = "";

  attrs.forEach((attr, index) => {
    if (attr.type === "Did" && index === 0) sender = decodeDidOrRaw(attr.value);
    else if (attr.type === "Did" && index === 1) receiver = decodeDidOrRaw(attr.value);
    else if (attr.type === "Balance") amount = attr.value;
  });

  const fields: DidField[] = [
    { role: "sender", value: sender, participant: true },
    { role: "receiver", value: receiver, participant: true },
  ];
  const memoValue = memo?.value;
  if (typeof memoValue === "string") {
    fields.push({ role: "memo", value: memoValue, participant: false });
  }
  const shown = maskByRole(fields, ctx.identity, ctx.mask);

  return {
    sender: shown.get("sender") ?? "",
    receiver: shown.get("receiver") ?? "",
    amount,
    memo: typeof memoValue === "string" ? (shown.get("memo") ?? "") : (memoValue ?? ""),
  };
}
