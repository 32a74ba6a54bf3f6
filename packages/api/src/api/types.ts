import type { ApiConfig } from "@didscan/shared";
import type { StoreProvider } from "@didscan/db";
import type { RpcPool } from "../rpc-pool.js";
import type { IdentityGate } from "./identity-gate.js";
import type { ResponseCache } from "./response-cache.js";

/** Shared collaborators handed to every route module */
export interface ApiContext {
  config: ApiConfig;
  stores: StoreProvider;
  cache: ResponseCache;
  identityGate: IdentityGate;
  /** Present only when live balances are read from the node */
  rpcPool?: RpcPool;
}
