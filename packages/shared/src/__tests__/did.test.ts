import { describe, it, expect } from "vitest";
import {
  decodeDid,
  decodeDidOrRaw,
  encodeDid,
  hexToBytes,
  InvalidHexError,
  maskDid,
  toRawDid,
} from "../did.js";

const ALICE_HEX = "0x6469643a737369643a616c696365" + "0".repeat(36);
const MASK = { prefixLength: 4, displayWidth: 32, maskChar: "*" };

describe("encodeDid", () => {
  it("should hex-encode the UTF-8 bytes and right-pad to 32 bytes", () => {
    expect(encodeDid("did:ssid:alice")).toBe(ALICE_HEX);
    expect(encodeDid("did:ssid:alice")).toHaveLength(66);
  });

  it("should cut DIDs longer than 32 bytes", () => {
    expect(encodeDid("a".repeat(40))).toBe("0x" + "61".repeat(32));
  });
});

describe("decodeDid", () => {
  it("should decode a padded DID back to its text", () => {
    expect(decodeDid(ALICE_HEX)).toBe("did:ssid:alice");
  });

  it("should accept hex without the 0x prefix", () => {
    expect(decodeDid(ALICE_HEX.slice(2))).toBe("did:ssid:alice");
  });

  it("should strip trailing whitespace and NUL padding", () => {
    // "did" + "\n" + " " + "\0"
    expect(decodeDid("0x6469640a2000")).toBe("did");
  });

  it("should reject odd-length hex", () => {
    expect(() => decodeDid("0xabc")).toThrow(InvalidHexError);
  });

  it("should reject non-hex characters", () => {
    expect(() => decodeDid("0xzz")).toThrow(InvalidHexError);
  });

  it("should reject bytes that are not valid UTF-8", () => {
    expect(() => decodeDid("0xff")).toThrow(InvalidHexError);
  });
});

describe("decodeDidOrRaw", () => {
  it("should decode hex DIDs", () => {
    expect(decodeDidOrRaw(ALICE_HEX)).toBe("did:ssid:alice");
  });

  it("should hand back values that are not hex unchanged", () => {
    expect(decodeDidOrRaw("did:ssid:bob")).toBe("did:ssid:bob");
  });

  it("should render non-string values as text", () => {
    expect(decodeDidOrRaw(null)).toBe("");
    expect(decodeDidOrRaw(undefined)).toBe("");
    expect(decodeDidOrRaw(42)).toBe("42");
  });
});

describe("toRawDid", () => {
  it("should keep 0x-prefixed input as is", () => {
    expect(toRawDid("0x1234")).toBe("0x1234");
  });

  it("should encode DID text", () => {
    expect(toRawDid("did:ssid:alice")).toBe(ALICE_HEX);
  });
});

describe("maskDid", () => {
  it("should keep the prefix and pad to the display width", () => {
    expect(maskDid("did:ssid:alice", MASK)).toBe("did:" + "*".repeat(28));
  });

  it("should pad DIDs shorter than the prefix", () => {
    expect(maskDid("ab", MASK)).toBe("ab" + "*".repeat(30));
  });

  it("should use the configured mask character and width", () => {
    expect(maskDid("did:ssid:alice", { prefixLength: 3, displayWidth: 6, maskChar: "#" })).toBe("did###");
  });

  const narrow = { prefixLength: 4, displayWidth: 8, maskChar: "*" };
  it.each(["", "did", "did:ssid", "did:ssid:" + "x".repeat(31)])(
    "should be idempotent and exactly display width wide for %j",
    (did) => {
      const masked = maskDid(did, narrow);
      expect(masked).toHaveLength(narrow.displayWidth);
      expect(maskDid(masked, narrow)).toBe(masked);
    },
  );
});

describe("hexToBytes", () => {
  it("should parse upper and lower case digits", () => {
    expect([...hexToBytes("0x0aFF")]).toEqual([10, 255]);
  });
});
