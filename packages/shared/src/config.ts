import type { ApiConfig, SearchIndexCategories } from "./types.js";

type Env = Record<string, string | undefined>;

/** Search index category ids as assigned by the indexer */
export const DEFAULT_SEARCH_INDEX: SearchIndexCategories = {
  balanceTransfer: 1,
  claimsClaimed: 2,
  balancesDeposit: 3,
  stakingReward: 4,
};

/** TTLs (seconds) for the cached resources */
export const CACHE_TTL = {
  currencyStats: 6,
  accountDetail: 12,
  default: 60,
  runtimeMetadata: 3600,
} as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function intVar(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) throw new ConfigError(`${name} must be >= ${min}, got ${value}`);
  return value;
}

function listVar(env: Env, name: string): string[] {
  return (env[name] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Build the process-wide configuration from environment variables.
 * Called once at startup; the frozen result is handed to every component.
 */
export function loadApiConfig(env: Env = process.env): ApiConfig {
  const prefixLength = intVar(env, "DID_MASK_PREFIX_LENGTH", 4);
  const displayWidth = intVar(env, "DID_DISPLAY_WIDTH", 32, 1);
  if (displayWidth < prefixLength) {
    throw new ConfigError(
      `DID_DISPLAY_WIDTH (${displayWidth}) must be >= DID_MASK_PREFIX_LENGTH (${prefixLength})`,
    );
  }
  const maskChar = env.DID_MASK_CHAR ?? "*";
  if (maskChar.length !== 1) throw new ConfigError("DID_MASK_CHAR must be a single character");

  const totalIssuance = env.TOTAL_ISSUANCE ?? "1000000000";
  if (!/^\d+$/.test(totalIssuance) || BigInt(totalIssuance) === 0n) {
    throw new ConfigError(`TOTAL_ISSUANCE must be a positive integer, got "${totalIssuance}"`);
  }

  const config: ApiConfig = {
    port: intVar(env, "API_PORT", 3001, 1),
    databaseUrl: env.DATABASE_URL ?? null,
    corsOrigin: env.CORS_ORIGIN ?? "*",
    mask: { prefixLength, displayWidth, maskChar },
    auth: {
      validatorKeys: listVar(env, "JWT_VALIDATOR_KEYS"),
      trustedIssuers: listVar(env, "JWT_VALIDATOR_ISSUERS"),
    },
    chain: {
      tokenDecimals: intVar(env, "TOKEN_DECIMALS", 6),
      totalIssuance,
      didMethodPrefix: env.DID_METHOD_PREFIX ?? "did:ssid:",
      defaultCurrencyId: env.DEFAULT_CURRENCY_ID ?? "native",
      rpcUrls: listVar(env, "ARCHIVE_NODE_URL"),
      useNodeBalances: (env.USE_NODE_RETRIEVE_BALANCES ?? "false").toLowerCase() === "true",
    },
    searchIndex: {
      balanceTransfer: intVar(env, "SEARCH_INDEX_BALANCETRANSFER", DEFAULT_SEARCH_INDEX.balanceTransfer),
      claimsClaimed: intVar(env, "SEARCH_INDEX_CLAIMS_CLAIMED", DEFAULT_SEARCH_INDEX.claimsClaimed),
      balancesDeposit: intVar(env, "SEARCH_INDEX_BALANCES_DEPOSIT", DEFAULT_SEARCH_INDEX.balancesDeposit),
      stakingReward: intVar(env, "SEARCH_INDEX_STAKING_REWARD", DEFAULT_SEARCH_INDEX.stakingReward),
    },
    cache: {
      maxEntries: intVar(env, "CACHE_MAX_ENTRIES", 5000, 1),
    },
    pagination: {
      defaultSize: 25,
      maxSize: 100,
    },
  };

  if (config.chain.useNodeBalances && config.chain.rpcUrls.length === 0) {
    throw new ConfigError("USE_NODE_RETRIEVE_BALANCES=true requires ARCHIVE_NODE_URL");
  }

  return deepFreeze(config);
}

function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === "object") deepFreeze(value);
  }
  Object.freeze(obj);
  return obj;
}
