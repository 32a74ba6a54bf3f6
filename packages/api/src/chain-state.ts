/**
 * Chain state queries: fetch live DID account balances via RPC.
 *
 * Uses `state_getStorage` with a manually constructed `Did.Account`
 * storage key and lightweight SCALE decoding of the AccountData value.
 */

import {
  Blake2128,
  Blake2128Concat,
  Blake2256,
  Identity,
  Twox128,
  Twox256,
  Twox64Concat,
} from "@polkadot-api/substrate-bindings";
import { bytesToHex, hexToBytes } from "@didscan/shared";
import type { RuntimeStorageRecord } from "@didscan/db";
import type { RpcPool } from "./rpc-pool.js";
import { UpstreamUnavailableError } from "./api/errors.js";

type Hasher = (input: Uint8Array) => Uint8Array;

/** Storage map hashers by their metadata name */
const HASHERS: Record<string, Hasher> = {
  Blake2_128: Blake2128,
  Blake2_256: Blake2256,
  Blake2_128Concat: Blake2128Concat,
  Twox128: Twox128,
  Twox256: Twox256,
  Twox64Concat: Twox64Concat,
  Identity: Identity,
};

const DEFAULT_HASHER = "Blake2_128Concat";

// Pre-computed storage key prefix for Did.Account:
//   twox128("Did") + twox128("Account")
const DID_ACCOUNT_PREFIX =
  bytesToHex(Twox128(new TextEncoder().encode("Did"))) +
  bytesToHex(Twox128(new TextEncoder().encode("Account")));

/**
 * Full storage key for Did.Account(accountId), hashing the raw DID bytes
 * with the hasher recorded for the storage function.
 */
export function didAccountKey(accountIdHex: string, hasherName: string | null): string {
  const name = hasherName ?? DEFAULT_HASHER;
  const hasher = HASHERS[name];
  if (!hasher) throw new UpstreamUnavailableError(`Unsupported storage hasher "${name}"`);
  return "0x" + DID_ACCOUNT_PREFIX + bytesToHex(hasher(hexToBytes(accountIdHex)));
}

/**
 * Read a little-endian u128 from a Uint8Array at the given offset.
 * Returns a bigint string (decimal) for JSON serialization.
 */
function readU128(bytes: Uint8Array, offset: number): string {
  let value = 0n;
  for (let i = 0; i < 16; i++) {
    value |= BigInt(bytes[offset + i] ?? 0) << BigInt(i * 8);
  }
  return value.toString();
}

export interface LiveDidBalance {
  free: string;
  reserved: string;
  misc_frozen: string;
  fee_frozen: string;
}

/**
 * SCALE layout of the DID AccountData value:
 *   free:        u128 (16 bytes)
 *   reserved:    u128 (16 bytes)
 *   misc_frozen: u128 (16 bytes)
 *   fee_frozen:  u128 (16 bytes)
 *   Total: 64 bytes
 */
export function decodeDidAccountData(storageHex: string): LiveDidBalance | null {
  const bytes = hexToBytes(storageHex);
  if (bytes.length < 64) return null;
  return {
    free: readU128(bytes, 0),
    reserved: readU128(bytes, 16),
    misc_frozen: readU128(bytes, 32),
    fee_frozen: readU128(bytes, 48),
  };
}

/**
 * Fetch the live balance of a DID account. Returns null when the node has
 * no entry; any RPC or decoding failure becomes UpstreamUnavailableError.
 */
export async function getLiveDidBalance(
  rpcPool: RpcPool,
  storage: RuntimeStorageRecord | null,
  accountIdHex: string,
): Promise<LiveDidBalance | null> {
  if (!storage) {
    throw new UpstreamUnavailableError("Did.Account storage function is not in the runtime metadata");
  }

  let storageHex: unknown;
  try {
    storageHex = await rpcPool.call("state_getStorage", [didAccountKey(accountIdHex, storage.type_hasher)]);
  } catch (err) {
    if (err instanceof UpstreamUnavailableError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new UpstreamUnavailableError(`[ChainState] Did.Account lookup failed: ${message}`, { cause: err });
  }

  if (storageHex === null) return null;
  if (typeof storageHex !== "string") {
    throw new UpstreamUnavailableError("[ChainState] Unexpected state_getStorage result");
  }
  try {
    return decodeDidAccountData(storageHex);
  } catch (err) {
    throw new UpstreamUnavailableError("[ChainState] Could not decode Did.Account value", { cause: err });
  }
}
