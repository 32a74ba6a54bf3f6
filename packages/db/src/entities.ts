// ============================================================
// Entity schema: one column map per table, record types derived from it
// ============================================================

interface BaseColumnValues {
  int: number;
  text: string;
  bool: boolean;
  json: unknown;
  /** NUMERIC columns (balances) travel as decimal strings */
  decimal: string;
  /** TIMESTAMP columns are rendered as ISO-8601 UTC strings */
  timestamp: string;
}

type BaseKind = keyof BaseColumnValues;

export type ColumnKind = BaseKind | `${BaseKind}?`;

export type ColumnValue<C extends ColumnKind> = C extends `${infer B extends BaseKind}?`
  ? BaseColumnValues[B] | null
  : C extends BaseKind
    ? BaseColumnValues[C]
    : never;

export type ColumnMap = Readonly<Record<string, ColumnKind>>;

export type RecordOf<C extends ColumnMap> = { [P in keyof C]: ColumnValue<C[P]> };

export interface EntityDefinition<C extends ColumnMap = ColumnMap> {
  table: string;
  /** Envelope `type` */
  type: string;
  columns: C;
  /** Columns joined with "-" to form the serialized id */
  primaryKey: readonly (keyof C & string)[];
}

function entity<const C extends ColumnMap>(
  table: string,
  type: string,
  columns: C,
  primaryKey: readonly (keyof C & string)[],
): EntityDefinition<C> {
  return { table, type, columns, primaryKey };
}

export const ENTITIES = {
  block: entity(
    "data_block",
    "block",
    {
      id: "int",
      parent_id: "int?",
      hash: "text",
      parent_hash: "text",
      state_root: "text",
      extrinsics_root: "text",
      count_extrinsics: "int",
      count_extrinsics_signed: "int",
      count_extrinsics_unsigned: "int",
      count_extrinsics_error: "int",
      count_extrinsics_success: "int",
      count_events: "int",
      count_events_module: "int",
      count_events_system: "int",
      count_accounts_new: "int",
      count_log: "int",
      datetime: "timestamp?",
      session_id: "int?",
      spec_version_id: "int",
    },
    ["id"],
  ),
  blocktotal: entity(
    "data_block_total",
    "blocktotal",
    {
      id: "int",
      session_id: "int?",
      parent_datetime: "timestamp?",
      blocktime: "int?",
      author: "text?",
      total_extrinsics: "int",
      total_extrinsics_success: "int",
      total_extrinsics_error: "int",
      total_extrinsics_signed: "int",
      total_extrinsics_unsigned: "int",
      total_events: "int",
      total_accounts: "int",
      total_accounts_new: "int",
      total_log: "int",
    },
    ["id"],
  ),
  extrinsic: entity(
    "data_extrinsic",
    "extrinsic",
    {
      block_id: "int",
      extrinsic_idx: "int",
      extrinsic_hash: "text?",
      extrinsic_length: "text?",
      extrinsic_version: "text?",
      signed: "int",
      unsigned: "int",
      signedby_address: "int",
      address: "text?",
      account_index: "text?",
      signature: "text?",
      nonce: "int?",
      era: "text?",
      call: "text?",
      module_id: "text",
      call_id: "text",
      params: "json?",
      success: "int",
      error: "int",
      spec_version_id: "int",
      codec_error: "bool",
    },
    ["block_id", "extrinsic_idx"],
  ),
  event: entity(
    "data_event",
    "event",
    {
      block_id: "int",
      event_idx: "int",
      extrinsic_idx: "int?",
      type: "text?",
      spec_version_id: "int",
      module_id: "text",
      event_id: "text",
      system: "int",
      module: "int",
      phase: "int?",
      attributes: "json?",
      codec_error: "bool",
    },
    ["block_id", "event_idx"],
  ),
  log: entity(
    "data_log",
    "log",
    {
      block_id: "int",
      log_idx: "int",
      type_id: "int",
      type: "text",
      data: "json?",
    },
    ["block_id", "log_idx"],
  ),
  account: entity(
    "data_account",
    "account",
    {
      id: "text",
      address: "text",
      index_address: "text?",
      is_reaped: "bool",
      is_validator: "bool",
      was_validator: "bool",
      is_nominator: "bool",
      was_nominator: "bool",
      is_council_member: "bool",
      was_council_member: "bool",
      is_tech_comm_member: "bool",
      was_tech_comm_member: "bool",
      is_registrar: "bool",
      was_registrar: "bool",
      is_sudo: "bool",
      was_sudo: "bool",
      is_treasury: "bool",
      is_contract: "bool",
      count_reaped: "int",
      balance_total: "decimal?",
      balance_free: "decimal?",
      balance_reserved: "decimal?",
      nonce: "int?",
      has_identity: "bool",
      has_subidentity: "bool",
      identity_display: "text?",
      identity_judgement_good: "int",
      identity_judgement_bad: "int",
      created_at_block: "int",
      updated_at_block: "int",
    },
    ["id"],
  ),
  accountindex: entity(
    "data_account_index",
    "accountindex",
    {
      id: "int",
      short_address: "text",
      account_id: "text?",
      is_reclaimable: "bool",
      is_reclaimed: "bool",
      created_at_block: "int",
      updated_at_block: "int",
    },
    ["short_address"],
  ),
  session: entity(
    "data_session",
    "session",
    {
      id: "int",
      start_at_block: "int",
      era: "int?",
      era_idx: "int?",
      created_at_block: "int",
      created_at_extrinsic: "int?",
      created_at_event: "int?",
      count_validators: "int?",
      count_nominators: "int?",
    },
    ["id"],
  ),
  sessionvalidator: entity(
    "data_session_validator",
    "sessionvalidator",
    {
      session_id: "int",
      rank_validator: "int",
      validator_stash: "text",
      validator_controller: "text?",
      validator_session: "text?",
      bonded_total: "decimal?",
      bonded_active: "decimal?",
      bonded_nominators: "decimal?",
      bonded_own: "decimal?",
      unlocking: "json?",
      count_nominators: "int?",
      unstake_threshold: "int?",
      commission: "decimal?",
    },
    ["session_id", "rank_validator"],
  ),
  sessionnominator: entity(
    "data_session_nominator",
    "sessionnominator",
    {
      session_id: "int",
      rank_validator: "int",
      rank_nominator: "int",
      nominator_stash: "text",
      nominator_controller: "text?",
      bonded: "decimal?",
    },
    ["session_id", "rank_validator", "rank_nominator"],
  ),
  contract: entity(
    "data_contract",
    "contract",
    {
      code_hash: "text",
      bytecode: "text?",
      source: "text?",
      abi: "json?",
      compiler: "text?",
      created_at_block: "int",
      created_at_extrinsic: "int?",
      created_at_event: "int?",
    },
    ["code_hash"],
  ),
  runtime: entity(
    "runtime",
    "runtime",
    {
      id: "int",
      impl_name: "text",
      impl_version: "int",
      spec_version: "int",
      spec_name: "text",
      authoring_version: "int",
      apis: "json?",
      count_modules: "int",
      count_call_functions: "int",
      count_storage_functions: "int",
      count_events: "int",
      count_constants: "int",
      count_errors_messages: "int",
    },
    ["id"],
  ),
  runtimemodule: entity(
    "runtime_module",
    "runtimemodule",
    {
      id: "int",
      spec_version: "int",
      module_id: "text",
      prefix: "text",
      name: "text",
      lookup: "text?",
      count_call_functions: "int",
      count_storage_functions: "int",
      count_events: "int",
      count_constants: "int",
      count_errors: "int",
    },
    ["spec_version", "module_id"],
  ),
  runtimecall: entity(
    "runtime_call",
    "runtimecall",
    {
      id: "int",
      spec_version: "int",
      module_id: "text",
      call_id: "text",
      index: "int",
      prefix: "text",
      code: "text?",
      name: "text",
      lookup: "text",
      documentation: "text?",
      count_params: "int",
    },
    ["spec_version", "module_id", "call_id"],
  ),
  runtimecallparam: entity(
    "runtime_call_param",
    "runtimecallparam",
    {
      id: "int",
      runtime_call_id: "int",
      name: "text",
      type: "text",
    },
    ["id"],
  ),
  runtimeevent: entity(
    "runtime_event",
    "runtimeevent",
    {
      id: "int",
      spec_version: "int",
      module_id: "text",
      event_id: "text",
      index: "int",
      prefix: "text",
      code: "text?",
      name: "text",
      lookup: "text",
      documentation: "text?",
      count_attributes: "int",
    },
    ["spec_version", "module_id", "event_id"],
  ),
  runtimeeventattribute: entity(
    "runtime_event_attribute",
    "runtimeeventattribute",
    {
      id: "int",
      runtime_event_id: "int",
      index: "int",
      type: "text",
    },
    ["id"],
  ),
  runtimetype: entity(
    "runtime_type",
    "runtimetype",
    {
      id: "int",
      spec_version: "int",
      type_string: "text",
      decoder_class: "text?",
      is_primitive_runtime: "bool",
      is_primitive_core: "bool",
    },
    ["id"],
  ),
  runtimestorage: entity(
    "runtime_storage",
    "runtimestorage",
    {
      id: "int",
      spec_version: "int",
      module_id: "text",
      index: "int",
      name: "text",
      lookup: "text",
      default: "text?",
      modifier: "text?",
      type_hasher: "text?",
      storage_key: "text?",
      type_key1: "text?",
      type_key2: "text?",
      type_value: "text?",
      type_is_linked: "bool?",
      type_key2hasher: "text?",
      documentation: "text?",
    },
    ["spec_version", "module_id", "name"],
  ),
  runtimeconstant: entity(
    "runtime_constant",
    "runtimeconstant",
    {
      id: "int",
      spec_version: "int",
      module_id: "text",
      index: "int",
      name: "text",
      type: "text?",
      value: "text?",
      documentation: "text?",
    },
    ["spec_version", "module_id", "name"],
  ),
  runtimeerrormessage: entity(
    "runtime_error",
    "runtimeerrormessage",
    {
      id: "int",
      spec_version: "int",
      module_id: "text",
      module_index: "int",
      index: "int",
      name: "text",
      documentation: "text?",
    },
    ["id"],
  ),
  searchindex: entity(
    "analytics_search_index",
    "searchindex",
    {
      id: "int",
      block_id: "int",
      extrinsic_idx: "int?",
      event_idx: "int?",
      account_id: "text?",
      index_type_id: "int",
      sorting_value: "int?",
    },
    ["id"],
  ),
  accountinfosnapshot: entity(
    "data_account_info_snapshot",
    "accountinfosnapshot",
    {
      block_id: "int",
      account_id: "text",
      balance_total: "decimal?",
      balance_free: "decimal?",
      balance_reserved: "decimal?",
      nonce: "int?",
    },
    ["block_id", "account_id"],
  ),
  stats: entity(
    "data_stats",
    "currency_stats",
    {
      id: "text",
      token_name: "text",
      symbol: "text?",
      site: "text?",
      decimals: "int",
      current_circulation: "decimal?",
      total_supply: "decimal?",
    },
    ["id"],
  ),
} as const;

export type Entities = typeof ENTITIES;
export type EntityKind = keyof Entities;
export type EntityRecord<K extends EntityKind> = RecordOf<Entities[K]["columns"]>;

export type BlockRecord = EntityRecord<"block">;
export type ExtrinsicRecord = EntityRecord<"extrinsic">;
export type EventRecord = EntityRecord<"event">;
export type AccountRecord = EntityRecord<"account">;
export type SearchIndexRecord = EntityRecord<"searchindex">;
export type AccountInfoSnapshotRecord = EntityRecord<"accountinfosnapshot">;
export type StatsRecord = EntityRecord<"stats">;
export type RuntimeStorageRecord = EntityRecord<"runtimestorage">;

export function columnKind(kind: EntityKind, column: string): ColumnKind | undefined {
  const columns: ColumnMap = ENTITIES[kind].columns;
  return Object.prototype.hasOwnProperty.call(columns, column) ? columns[column] : undefined;
}

/** Serialized id: primary key values joined with "-" */
export function recordId<K extends EntityKind>(kind: K, record: EntityRecord<K>): string {
  const values: Readonly<Record<string, unknown>> = record;
  return ENTITIES[kind].primaryKey.map((col) => String(values[col])).join("-");
}
