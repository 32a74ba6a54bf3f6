import { describe, it, expect } from "vitest";
import { ConfigError, DEFAULT_SEARCH_INDEX, loadApiConfig } from "../config.js";

describe("loadApiConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadApiConfig({});
    expect(config.port).toBe(3001);
    expect(config.databaseUrl).toBeNull();
    expect(config.corsOrigin).toBe("*");
    expect(config.mask).toEqual({ prefixLength: 4, displayWidth: 32, maskChar: "*" });
    expect(config.auth).toEqual({ validatorKeys: [], trustedIssuers: [] });
    expect(config.chain.didMethodPrefix).toBe("did:ssid:");
    expect(config.chain.defaultCurrencyId).toBe("native");
    expect(config.chain.useNodeBalances).toBe(false);
    expect(config.searchIndex).toEqual(DEFAULT_SEARCH_INDEX);
    expect(config.pagination).toEqual({ defaultSize: 25, maxSize: 100 });
  });

  it("should split comma lists and drop blanks", () => {
    const config = loadApiConfig({ JWT_VALIDATOR_KEYS: " key-a, key-b ,,", JWT_VALIDATOR_ISSUERS: "issuer" });
    expect(config.auth.validatorKeys).toEqual(["key-a", "key-b"]);
    expect(config.auth.trustedIssuers).toEqual(["issuer"]);
  });

  it("should read search index category ids", () => {
    const config = loadApiConfig({ SEARCH_INDEX_BALANCETRANSFER: "11", SEARCH_INDEX_STAKING_REWARD: "14" });
    expect(config.searchIndex).toEqual({
      balanceTransfer: 11,
      claimsClaimed: 2,
      balancesDeposit: 3,
      stakingReward: 14,
    });
  });

  it("should enable node balances only with an archive node", () => {
    const config = loadApiConfig({ USE_NODE_RETRIEVE_BALANCES: "TRUE", ARCHIVE_NODE_URL: "ws://localhost:9944" });
    expect(config.chain.useNodeBalances).toBe(true);
    expect(config.chain.rpcUrls).toEqual(["ws://localhost:9944"]);
    expect(() => loadApiConfig({ USE_NODE_RETRIEVE_BALANCES: "true" })).toThrow(ConfigError);
  });

  it("should reject a display width below the mask prefix", () => {
    expect(() => loadApiConfig({ DID_MASK_PREFIX_LENGTH: "8", DID_DISPLAY_WIDTH: "6" })).toThrow(ConfigError);
  });

  it("should reject a mask character that is not one character", () => {
    expect(() => loadApiConfig({ DID_MASK_CHAR: "**" })).toThrow(ConfigError);
  });

  it("should reject malformed integers", () => {
    expect(() => loadApiConfig({ API_PORT: "http" })).toThrow("API_PORT must be a non-negative integer");
    expect(() => loadApiConfig({ TOTAL_ISSUANCE: "0" })).toThrow(ConfigError);
  });

  it("should freeze the result", () => {
    const config = loadApiConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.mask)).toBe(true);
  });
});
