import { createPool, closePool, pgStoreProvider } from "@didscan/db";
import { loadApiConfig } from "@didscan/shared";
import { RpcPool } from "./rpc-pool.js";
import { createApiServer } from "./api/server.js";
import { IdentityGate } from "./api/identity-gate.js";
import { ResponseCache } from "./api/response-cache.js";

async function main(): Promise<void> {
  console.log("====================================");
  console.log("  DIDScan API Starting...");
  console.log("====================================");

  // 1. Configuration is read once; nothing below touches process.env
  const config = loadApiConfig(process.env);

  // 2. Initialize database connection
  if (!config.databaseUrl) {
    console.error("DATABASE_URL environment variable is required.");
    process.exit(1);
  }
  createPool(config.databaseUrl);
  console.log("[Main] Database pool initialized.");

  // 3. RPC pool, only needed for live DID balances
  let rpcPool: RpcPool | undefined;
  if (config.chain.useNodeBalances) {
    rpcPool = new RpcPool(config.chain.rpcUrls);
    console.log(`[Main] Live balances from ${rpcPool.size} RPC endpoint(s)`);
  }

  if (config.auth.validatorKeys.length === 0) {
    console.warn("[Main] JWT_VALIDATOR_KEYS is empty, every caller is anonymous");
  }

  // 4. Start the API server
  const app = createApiServer({
    config,
    stores: pgStoreProvider,
    cache: new ResponseCache(config.cache.maxEntries),
    identityGate: new IdentityGate(config.auth),
    rpcPool,
  });
  const server = app.listen(config.port, () => {
    console.log(`[Main] API server listening on port ${config.port}`);
  });

  // 5. Graceful shutdown
  const shutdown = async () => {
    console.log("[Main] Shutting down...");
    server.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[Main] Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[Main] Fatal error:", err);
  process.exit(1);
});
