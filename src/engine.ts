import Bottleneck from "bottleneck";
import { AppConfig } from "./config";
import { HttpLookupClient, LookupClient } from "./lookup/client";
import { TradeRegistry, createTradeRegistry } from "./lookup";
import { SQLiteProviderStore } from "./store/sqlite";
import { createLimiter } from "./utils/rateLimit";
import { BatchRunner } from "./verification/batch";
import { CredentialChecker } from "./verification/credentials";
import { VerificationOrchestrator } from "./verification/orchestrator";

export interface Engine {
  store: SQLiteProviderStore;
  registry: TradeRegistry;
  limiter: Bottleneck;
  client: LookupClient;
  orchestrator: VerificationOrchestrator;
  credentials: CredentialChecker;
  runner: BatchRunner;
}

export function createEngine(config: AppConfig): Engine {
  const store = new SQLiteProviderStore(config.databasePath);
  const registry = createTradeRegistry({ dporBaseUrl: config.lookup.dporBaseUrl });
  const limiter = createLimiter(config.lookup.minIntervalMs);
  const client = new HttpLookupClient({
    registry,
    limiter,
    timeoutMs: config.lookup.timeoutMs
  });
  const orchestrator = new VerificationOrchestrator({
    client,
    registry,
    store,
    backoff: config.retry,
    nameThreshold: config.matching.nameThreshold
  });
  const credentials = new CredentialChecker({ store });
  const runner = new BatchRunner(orchestrator, store, credentials);
  return { store, registry, limiter, client, orchestrator, credentials, runner };
}
