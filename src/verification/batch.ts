import { describeError } from "../errors";
import { ProviderStore } from "../store/ProviderStore";
import { Provider } from "../types";
import { log } from "../utils/logger";
import { CredentialChecker } from "./credentials";
import { VerificationOrchestrator } from "./orchestrator";

export interface BatchSummary {
  processed: number;
  verified: number;
  expired: number;
  mismatched: number;
  notFound: number;
  errors: number;
  credentialsExpired: number;
  credentialsMissing: number;
  stopped: boolean;
  startedAt: string;
  finishedAt: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Serial pass over providers in ascending id order. Politeness spacing comes
 * from the limiter shared with the lookup client, so retries are spaced too.
 * A stop request is honoured between providers, never mid-attempt. After the
 * license, each provider's insurance and bond records are checked for expiry.
 */
export class BatchRunner {
  constructor(
    private readonly orchestrator: Pick<VerificationOrchestrator, "verify">,
    private readonly store: ProviderStore,
    private readonly credentials: Pick<CredentialChecker, "checkAll">
  ) {}

  async runAll(providers: Iterable<Provider>, options: RunOptions = {}): Promise<BatchSummary> {
    const ordered = [...providers].sort((a, b) => a.id - b.id);
    const summary: BatchSummary = {
      processed: 0,
      verified: 0,
      expired: 0,
      mismatched: 0,
      notFound: 0,
      errors: 0,
      credentialsExpired: 0,
      credentialsMissing: 0,
      stopped: false,
      startedAt: new Date().toISOString(),
      finishedAt: ""
    };

    log({ stage: "batch_start", providers: ordered.length });

    for (const provider of ordered) {
      if (options.signal?.aborted) {
        summary.stopped = true;
        log({ stage: "batch_stopped", level: "warn", remaining: ordered.length - summary.processed });
        break;
      }

      summary.processed++;
      try {
        const result = await this.orchestrator.verify(provider);
        switch (result.outcome) {
          case "verified":
            summary.verified++;
            break;
          case "expired":
            summary.expired++;
            break;
          case "mismatch":
            summary.mismatched++;
            break;
          case "not-found":
            summary.notFound++;
            break;
          case "lookup-error":
            summary.errors++;
            break;
        }

        for (const check of await this.credentials.checkAll(provider)) {
          if (check.outcome === "expired") summary.credentialsExpired++;
          if (check.outcome === "not-found") summary.credentialsMissing++;
        }
      } catch (err) {
        summary.errors++;
        log({
          stage: "batch_provider_failed",
          level: "error",
          provider_id: provider.id,
          error: describeError(err)
        });
      }
    }

    summary.finishedAt = new Date().toISOString();
    log({ stage: "batch_complete", ...summary });
    return summary;
  }

  /** The cron entry: every active provider in the store. */
  async runScheduled(options: RunOptions = {}): Promise<BatchSummary> {
    const providers = await this.store.listActiveProviders();
    return this.runAll(providers, options);
  }
}
