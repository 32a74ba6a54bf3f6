import { encodeDid, loadApiConfig } from "@didscan/shared";
import type {
  AccountInfoSnapshotRecord,
  AccountRecord,
  BlockRecord,
  EntityRecord,
  EventRecord,
  ExtrinsicRecord,
  SearchIndexRecord,
  StatsRecord,
} from "@didscan/db";

export const ALICE = "did:ssid:alice";
export const BOB = "did:ssid:bob";
export const CAROL = "did:ssid:carol";

export const SECRET = "test-secret";
export const ISSUER = "test-issuer";

/** Default test configuration: 4-char prefix, 32-char masked width, "*" */
export const TEST_ENV = {
  JWT_VALIDATOR_KEYS: SECRET,
  JWT_VALIDATOR_ISSUERS: ISSUER,
  TOKEN_DECIMALS: "6",
  TOTAL_ISSUANCE: "1000",
};

export const testConfig = loadApiConfig(TEST_ENV);

export const MASKED = "did:" + "*".repeat(28);

export function block(overrides: Partial<BlockRecord> = {}): BlockRecord {
  const id = overrides.id ?? 100;
  return {
    id,
    parent_id: id - 1,
    hash: `hash${id}`,
    parent_hash: `hash${id - 1}`,
    state_root: "root",
    extrinsics_root: "xroot",
    count_extrinsics: 0,
    count_extrinsics_signed: 0,
    count_extrinsics_unsigned: 0,
    count_extrinsics_error: 0,
    count_extrinsics_success: 0,
    count_events: 0,
    count_events_module: 0,
    count_events_system: 0,
    count_accounts_new: 0,
    count_log: 0,
    datetime: "2024-01-01T00:00:00.000Z",
    session_id: 1,
    spec_version_id: 1,
    ...overrides,
  };
}

export function extrinsic(overrides: Partial<ExtrinsicRecord> = {}): ExtrinsicRecord {
  return {
    block_id: 100,
    extrinsic_idx: 1,
    extrinsic_hash: "ab01",
    extrinsic_length: "120",
    extrinsic_version: "84",
    signed: 1,
    unsigned: 0,
    signedby_address: 1,
    address: null,
    account_index: null,
    signature: null,
    nonce: 0,
    era: null,
    call: "0500",
    module_id: "balances",
    call_id: "transfer",
    params: [],
    success: 1,
    error: 0,
    spec_version_id: 1,
    codec_error: false,
    ...overrides,
  };
}

export function event(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    block_id: 100,
    event_idx: 0,
    extrinsic_idx: 1,
    type: "00",
    spec_version_id: 1,
    module_id: "balances",
    event_id: "Transfer",
    system: 0,
    module: 1,
    phase: 0,
    attributes: [],
    codec_error: false,
    ...overrides,
  };
}

/** balances.Transfer with Did sender/receiver, Balance value and optional fee */
export function transferEvent(
  from: string,
  to: string,
  value: number,
  overrides: Partial<EventRecord> = {},
  fee?: number,
): EventRecord {
  const attributes: unknown[] = [
    { type: "Did", value: encodeDid(from) },
    { type: "Did", value: encodeDid(to) },
    { type: "Balance", value },
  ];
  if (fee !== undefined) attributes.push({ type: "Balance", value: fee });
  return event({ ...overrides, attributes });
}

export function account(overrides: Partial<AccountRecord> = {}): AccountRecord {
  return {
    id: ALICE,
    address: ALICE,
    index_address: null,
    is_reaped: false,
    is_validator: false,
    was_validator: false,
    is_nominator: false,
    was_nominator: false,
    is_council_member: false,
    was_council_member: false,
    is_tech_comm_member: false,
    was_tech_comm_member: false,
    is_registrar: false,
    was_registrar: false,
    is_sudo: false,
    was_sudo: false,
    is_treasury: false,
    is_contract: false,
    count_reaped: 0,
    balance_total: "0",
    balance_free: "0",
    balance_reserved: "0",
    nonce: 0,
    has_identity: false,
    has_subidentity: false,
    identity_display: null,
    identity_judgement_good: 0,
    identity_judgement_bad: 0,
    created_at_block: 1,
    updated_at_block: 1,
    ...overrides,
  };
}

export function searchEntry(overrides: Partial<SearchIndexRecord> = {}): SearchIndexRecord {
  return {
    id: 1,
    block_id: 100,
    extrinsic_idx: null,
    event_idx: null,
    account_id: ALICE,
    index_type_id: 1,
    sorting_value: null,
    ...overrides,
  };
}

export function snapshot(overrides: Partial<AccountInfoSnapshotRecord> = {}): AccountInfoSnapshotRecord {
  return {
    block_id: 100,
    account_id: encodeDid(ALICE).slice(2),
    balance_total: "0",
    balance_free: "0",
    balance_reserved: "0",
    nonce: 0,
    ...overrides,
  };
}

export function stats(overrides: Partial<StatsRecord> = {}): StatsRecord {
  return {
    id: "native",
    token_name: "Test Token",
    symbol: "TST",
    site: "https://example.org",
    decimals: 6,
    current_circulation: "500",
    total_supply: "1000",
    ...overrides,
  };
}

export function runtimeErrorMessage(
  overrides: Partial<EntityRecord<"runtimeerrormessage">> = {},
): EntityRecord<"runtimeerrormessage"> {
  return {
    id: 1,
    spec_version: 1,
    module_id: "balances",
    module_index: 5,
    index: 2,
    name: "InsufficientBalance",
    documentation: "Balance too low to send value",
    ...overrides,
  };
}

export function runtimeStorage(
  overrides: Partial<EntityRecord<"runtimestorage">> = {},
): EntityRecord<"runtimestorage"> {
  return {
    id: 1,
    spec_version: 1,
    module_id: "did",
    index: 0,
    name: "Account",
    lookup: "0000",
    default: null,
    modifier: "Default",
    type_hasher: "Blake2_128Concat",
    storage_key: null,
    type_key1: "Did",
    type_key2: null,
    type_value: "AccountData",
    type_is_linked: false,
    type_key2hasher: null,
    documentation: null,
    ...overrides,
  };
}
