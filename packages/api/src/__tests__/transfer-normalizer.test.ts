import { describe, it, expect } from "vitest";
import { ANONYMOUS, encodeDid, type Identity } from "@didscan/shared";
import {
  classifyTransfer,
  formatTransferEventParams,
  normalizeTransfer,
  readTypedValues,
  transferId,
  type NormalizeContext,
} from "../api/transfer-normalizer.js";
import { ALICE, BOB, CAROL, MASKED, event, testConfig, transferEvent } from "./helpers/fixtures.js";

const ctx = (identity: Identity = ANONYMOUS): NormalizeContext => ({ identity, mask: testConfig.mask });
const as = (did: string): Identity => ({ kind: "authenticated", did });

const aliceId = encodeDid(ALICE).slice(2);
const bobId = encodeDid(BOB).slice(2);

describe("readTypedValues", () => {
  it("should keep {type, value} entries and their optional fields", () => {
    expect(
      readTypedValues([
        { type: "Did", value: "0x01", valueRaw: "01", name: "who" },
        { value: "no type" },
        "junk",
      ]),
    ).toEqual([{ type: "Did", value: "0x01", valueRaw: "01", name: "who" }]);
  });

  it("should return an empty list for non-arrays", () => {
    expect(readTypedValues(null)).toEqual([]);
    expect(readTypedValues({ type: "Did" })).toEqual([]);
  });
});

describe("classifyTransfer", () => {
  it("should classify by module and event", () => {
    expect(classifyTransfer("balances", "Transfer")).toBe("Transfer");
    expect(classifyTransfer("Balances", "Transfer")).toBe("Transfer");
    expect(classifyTransfer("claims", "Claimed")).toBe("Claimed");
    expect(classifyTransfer("balances", "Deposit")).toBe("Deposit");
    expect(classifyTransfer("staking", "Reward")).toBe("Reward");
    expect(classifyTransfer("system", "Remarked")).toBe("Unknown");
  });
});

describe("normalizeTransfer", () => {
  const transfer = transferEvent(ALICE, BOB, 100, { block_id: 7, event_idx: 3, extrinsic_idx: 2 }, 5);

  it("should mask both parties for anonymous callers", () => {
    expect(normalizeTransfer(transfer, ctx())).toEqual({
      block_id: 7,
      event_idx: 3,
      extrinsic_idx: 2,
      event_id: "Transfer",
      sender: { type: "account", id: aliceId, attributes: { id: aliceId, address: MASKED } },
      destination: { type: "account", id: bobId, attributes: { id: bobId, address: MASKED } },
      value: 100,
      fee: 5,
    });
  });

  it("should reveal both parties to the receiver", () => {
    const out = normalizeTransfer(transfer, ctx(as(BOB)));
    expect(out.sender).toEqual({ type: "account", id: aliceId, attributes: { id: aliceId, address: ALICE } });
    expect(out.destination).toEqual({ type: "account", id: bobId, attributes: { id: bobId, address: BOB } });
  });

  it("should keep masking for other authenticated callers", () => {
    const out = normalizeTransfer(transfer, ctx(as(CAROL)));
    expect(out.sender).toEqual({ type: "account", id: aliceId, attributes: { id: aliceId, address: MASKED } });
  });

  it("should report a zero fee when the event has no fee attribute", () => {
    expect(normalizeTransfer(transferEvent(ALICE, BOB, 100), ctx()).fee).toBe(0);
  });

  it("should describe claims by their Ethereum address", () => {
    const claimed = event({
      module_id: "claims",
      event_id: "Claimed",
      attributes: [
        { type: "Did", value: encodeDid(ALICE) },
        { type: "EthereumAddress", value: "0xeth" },
        { type: "Balance", value: 50 },
      ],
    });
    const out = normalizeTransfer(claimed, ctx());
    expect(out.sender).toEqual({ name: "Claim", eth_address: "0xeth" });
    expect(out.destination).toEqual({});
    expect(out.value).toBe(50);
    expect(out.fee).toBe(0);
  });

  it("should describe deposits and staking rewards by name", () => {
    const attributes = [
      { type: "Did", value: encodeDid(ALICE) },
      { type: "Balance", value: 9 },
    ];
    const deposit = normalizeTransfer(event({ event_id: "Deposit", attributes }), ctx());
    const reward = normalizeTransfer(event({ module_id: "staking", event_id: "Reward", attributes }), ctx());
    expect(deposit.sender).toEqual({ name: "Deposit" });
    expect(deposit.value).toBe(9);
    expect(reward.sender).toEqual({ name: "Staking reward" });
    expect(reward.value).toBe(9);
  });

  it("should leave unknown events empty", () => {
    const out = normalizeTransfer(event({ module_id: "system", event_id: "Remarked" }), ctx());
    expect(out).toMatchObject({ sender: {}, destination: {}, value: null, fee: 0 });
  });
});

describe("transferId", () => {
  it("should join block and event index", () => {
    expect(transferId({ block_id: 12, event_idx: 4 })).toBe("12-4");
  });
});

describe("formatTransferEventParams", () => {
  const { attributes } = transferEvent(ALICE, BOB, 100);

  it("should mask sender and receiver for anonymous callers", () => {
    expect(formatTransferEventParams(attributes, ctx())).toEqual({
      sender: MASKED,
      receiver: MASKED,
      amount: 100,
      memo: "",
    });
  });

  it("should reveal the memo together with the parties", () => {
    const memo = { type: "Bytes", value: "rent" };
    expect(formatTransferEventParams(attributes, ctx(as(ALICE)), memo)).toEqual({
      sender: ALICE,
      receiver: BOB,
      amount: 100,
      memo: "rent",
    });
  });

  it("should mask the memo for other callers", () => {
    const memo = { type: "Bytes", value: "rent" };
    expect(formatTransferEventParams(attributes, ctx(), memo).memo).toBe("rent" + "*".repeat(28));
  });

  it("should not reveal to a caller whose DID is only the memo", () => {
    const memo = { type: "Bytes", value: CAROL };
    const out = formatTransferEventParams(attributes, ctx(as(CAROL)), memo);
    expect(out.sender).toBe(MASKED);
    expect(out.memo).toBe(MASKED);
  });
});
