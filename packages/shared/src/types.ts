// ============================================================
// Core Domain Types for the DID Explorer API
// ============================================================

/** Caller identity derived from the bearer token of a single request */
export type Identity = { kind: "anonymous" } | { kind: "authenticated"; did: string };

export const ANONYMOUS: Identity = Object.freeze({ kind: "anonymous" });

/** One decoded call argument or event attribute, as persisted by the indexer */
export interface TypedValue {
  type: string;
  value: unknown;
  valueRaw?: string;
  name?: string;
}

// ============================================================
// Transfers
// ============================================================

export type TransferKind = "Transfer" | "Claimed" | "Deposit" | "Reward" | "Unknown";

/** A chain account taking part in a transfer */
export interface AccountDescriptor {
  type: "account";
  id: string;
  attributes: {
    id: string;
    address: string;
  };
}

/** Origin of funds that is not an account (claims, mints, staking rewards) */
export interface NamedDescriptor {
  name: string;
  [key: string]: unknown;
}

export type PartyDescriptor = AccountDescriptor | NamedDescriptor | Record<string, never>;

export interface CanonicalTransfer {
  block_id: number;
  event_idx: number;
  extrinsic_idx: number | null;
  event_id: string;
  sender: PartyDescriptor;
  destination: PartyDescriptor;
  value: unknown;
  fee: unknown;
}

/** `event_params` block attached to transfer extrinsic details */
export interface TransferEventParams {
  sender: string;
  receiver: string;
  amount: unknown;
  memo: unknown;
}

// ============================================================
// Envelope Types
// ============================================================

export interface ResourceObject {
  type: string;
  id: string;
  attributes: Record<string, unknown>;
  relationships?: Record<string, { data: ResourceObject[] }>;
}

export interface PaginationMeta {
  total: number;
  page: number;
  pageSize: number;
  hasMore: boolean;
}

export interface Envelope<T = ResourceObject | ResourceObject[] | unknown> {
  data: T;
  meta?: Record<string, unknown>;
  links?: Record<string, string>;
}

// ============================================================
// Configuration Types
// ============================================================

export interface MaskConfig {
  /** Characters kept verbatim at the start of a masked DID */
  prefixLength: number;
  /** Exact width of a masked DID */
  displayWidth: number;
  maskChar: string;
}

export interface AuthConfig {
  /** HS256 secrets; a token is accepted if any of them verifies it */
  validatorKeys: string[];
  trustedIssuers: string[];
}

export interface SearchIndexCategories {
  balanceTransfer: number;
  claimsClaimed: number;
  balancesDeposit: number;
  stakingReward: number;
}

export interface ChainConfig {
  tokenDecimals: number;
  /** Total issuance in whole tokens, used for holder percentages */
  totalIssuance: string;
  /** Method prefix shared by all DIDs of the chain, e.g. "did:ssid:" */
  didMethodPrefix: string;
  defaultCurrencyId: string;
  rpcUrls: string[];
  useNodeBalances: boolean;
}

export interface ApiConfig {
  port: number;
  databaseUrl: string | null;
  corsOrigin: string;
  mask: MaskConfig;
  auth: AuthConfig;
  chain: ChainConfig;
  searchIndex: SearchIndexCategories;
  cache: {
    maxEntries: number;
  };
  pagination: {
    defaultSize: number;
    maxSize: number;
  };
}
