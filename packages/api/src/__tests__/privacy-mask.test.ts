import { describe, it, expect } from "vitest";
import { ANONYMOUS, type Identity } from "@didscan/shared";
import { canReveal, maskByRole, maskFields, type DidField } from "../api/privacy-mask.js";
import { ALICE, BOB, CAROL, MASKED, testConfig } from "./helpers/fixtures.js";

const fields: DidField[] = [
  { role: "sender", value: ALICE, participant: true },
  { role: "receiver", value: BOB, participant: true },
  { role: "memo", value: CAROL, participant: false },
];

const as = (did: string): Identity => ({ kind: "authenticated", did });

describe("canReveal", () => {
  it("should reveal to either participant", () => {
    expect(canReveal(fields, as(ALICE))).toBe(true);
    expect(canReveal(fields, as(BOB))).toBe(true);
  });

  it("should not reveal to anonymous callers", () => {
    expect(canReveal(fields, ANONYMOUS)).toBe(false);
  });

  it("should not let a non-participant field grant visibility", () => {
    expect(canReveal(fields, as(CAROL))).toBe(false);
  });

  it("should compare DIDs exactly", () => {
    expect(canReveal(fields, as("did:ssid:alic"))).toBe(false);
  });
});

describe("maskFields", () => {
  it("should reveal every field to a participant", () => {
    expect(maskFields(fields, as(BOB), testConfig.mask).map((f) => f.value)).toEqual([ALICE, BOB, CAROL]);
  });

  it("should mask every field otherwise", () => {
    expect(maskFields(fields, as(CAROL), testConfig.mask).map((f) => f.value)).toEqual([MASKED, MASKED, MASKED]);
  });

  it("should leave the input untouched", () => {
    maskFields(fields, ANONYMOUS, testConfig.mask);
    expect(fields[0]?.value).toBe(ALICE);
  });
});

describe("maskByRole", () => {
  it("should key the shown values by role", () => {
    const shown = maskByRole(fields, ANONYMOUS, testConfig.mask);
    expect(shown.get("sender")).toBe(MASKED);
    expect(shown.get("memo")).toBe(MASKED);
    expect(shown.size).toBe(3);
  });
});
