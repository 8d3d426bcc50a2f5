import { LookupFailure, ParseError, UpstreamError, describeError, isTransient } from "../errors";
import { LookupClient } from "../lookup/client";
import { RawResponse, TradeDefinition, TradeRegistry } from "../lookup";
import { ProviderStore } from "../store/ProviderStore";
import {
  LicenseRecord,
  LookupErrorKind,
  NewVerificationAttempt,
  Provider,
  ProviderIdentity,
  QueryFields,
  TerminalOutcome,
  VerificationAttempt,
  VerificationState
} from "../types";
import { Sleep, sleep as defaultSleep } from "../utils/delay";
import { log } from "../utils/logger";
import { BackoffPolicy, DEFAULT_BACKOFF, recordFailure, startBackoff } from "../utils/retry";
import { classify } from "./classifier";
import { match } from "./matcher";

const RAW_SNAPSHOT_LENGTH = 5000;

export interface VerificationOrchestratorOptions {
  client: LookupClient;
  registry: TradeRegistry;
  store: ProviderStore;
  backoff?: BackoffPolicy;
  nameThreshold?: number;
  now?: () => Date;
  sleep?: Sleep;
}

export interface VerificationResult {
  providerId: number;
  outcome: TerminalOutcome;
  attempt: VerificationAttempt;
  states: VerificationState[];
}

interface Terminal {
  outcome: TerminalOutcome;
  errorKind: LookupErrorKind | null;
  errorDetail: string | null;
  raw: RawResponse | null;
  rawSnippet?: string | null;
  licenseRecord: LicenseRecord | null;
  operatorAttention: boolean;
}

type QueryStep =
  | { kind: "response"; raw: RawResponse }
  | { kind: "failed"; transient: boolean; failure: LookupFailure };

type Phase<T> = { kind: "ok"; value: T } | { kind: "terminal"; terminal: Terminal };

interface Run {
  provider: Provider;
  definition: TradeDefinition;
  states: VerificationState[];
  enter: (state: VerificationState) => void;
  retries: number;
}

/**
 * Drives one provider through lookup, parse, match and classify, retrying
 * transient lookup failures with backoff. A name search only yields summary
 * rows, so a search match is confirmed by a second lookup of its detail page
 * before it is classified. Each call ends in exactly one log row; the
 * provider's status only moves on a non-error terminal.
 */
export class VerificationOrchestrator {
  private readonly client: LookupClient;
  private readonly registry: TradeRegistry;
  private readonly store: ProviderStore;
  private readonly backoff: BackoffPolicy;
  private readonly nameThreshold: number | undefined;
  private readonly now: () => Date;
  private readonly sleep: Sleep;

  constructor(options: VerificationOrchestratorOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.store = options.store;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.nameThreshold = options.nameThreshold;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async verify(provider: Provider): Promise<VerificationResult> {
    const states: VerificationState[] = [];
    const enter = (state: VerificationState) => {
      states.push(state);
      log({ stage: "verify_state", provider_id: provider.id, state });
    };

    enter("pending");
    const definition = this.registry.get(provider.trade);
    if (!definition) {
      return this.finish(provider, states, enter, 0, {
        outcome: "lookup-error",
        errorKind: "unknown-trade",
        errorDetail: `No lookup registered for trade: ${provider.trade}`,
        raw: null,
        licenseRecord: null,
        operatorAttention: false
      });
    }

    const run: Run = { provider, definition, states, enter, retries: 0 };
    const specialties =
      provider.tradeSpecialties.length > 0 ? provider.tradeSpecialties : definition.specialties;

    const first = await this.lookup(run, {
      licenseNumber: provider.claimedLicenseNumber,
      holderName: provider.claimedName
    });
    if (first.kind === "terminal") return this.end(run, first.terminal);

    let raw = first.value;
    const picked = this.parseAndMatch(run, raw, {
      licenseNumber: provider.claimedLicenseNumber,
      name: provider.claimedName,
      specialties
    });
    if (picked.kind === "terminal") return this.end(run, picked.terminal);

    let matched = picked.value;
    if (matched && raw.variant === "search") {
      log({
        stage: "verify_confirm_detail",
        provider_id: provider.id,
        license_number: matched.licenseNumber,
        holder_name: matched.holderName
      });
      const detail = await this.lookup(run, { licenseNumber: matched.licenseNumber });
      if (detail.kind === "terminal") return this.end(run, detail.terminal);

      raw = detail.value;
      const confirmed = this.parseAndMatch(run, raw, {
        licenseNumber: matched.licenseNumber,
        name: provider.claimedName,
        specialties
      });
      if (confirmed.kind === "terminal") return this.end(run, confirmed.terminal);
      matched = confirmed.value;
    }

    enter("classifying");
    const outcome = classify(matched, this.now());
    if (outcome === "transient-failure") {
      throw new Error("Classifier produced a transient outcome");
    }
    return this.end(run, {
      outcome,
      errorKind: null,
      errorDetail: null,
      raw,
      licenseRecord: matched,
      operatorAttention: false
    });
  }

  // One logical lookup: queries until a response, a permanent failure, or
  // the backoff policy is exhausted.
  private async lookup(run: Run, query: QueryFields): Promise<Phase<RawResponse>> {
    let backoff = startBackoff();

    while (true) {
      run.enter("querying");
      const step = await this.query(run.provider, query);
      if (step.kind === "response") return { kind: "ok", value: step.raw };

      const { failure } = step;
      const rawSnippet = failure instanceof UpstreamError ? failure.bodySnippet : null;
      if (!step.transient) {
        return {
          kind: "terminal",
          terminal: {
            outcome: "lookup-error",
            errorKind: failure.kind,
            errorDetail: describeError(failure),
            raw: null,
            rawSnippet,
            licenseRecord: null,
            operatorAttention: false
          }
        };
      }

      backoff = recordFailure(backoff, this.backoff);
      if (backoff.status === "exhausted") {
        return {
          kind: "terminal",
          terminal: {
            outcome: "lookup-error",
            errorKind: "retry-exhausted",
            errorDetail: `${describeError(failure)} (after ${backoff.attempts} attempts)`,
            raw: null,
            rawSnippet,
            licenseRecord: null,
            operatorAttention: false
          }
        };
      }

      log({
        stage: "verify_backoff",
        provider_id: run.provider.id,
        attempt: backoff.attempts,
        delay_ms: backoff.delayMs,
        error: describeError(failure)
      });
      await this.sleep(backoff.delayMs);
      run.retries++;
    }
  }

  private parseAndMatch(
    run: Run,
    raw: RawResponse,
    claimed: ProviderIdentity
  ): Phase<LicenseRecord | null> {
    try {
      run.enter("parsing");
      const candidates = run.definition.parse(raw);
      run.enter("matching");
      const matched = match(candidates, claimed, { threshold: this.nameThreshold });
      return { kind: "ok", value: matched };
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      log({
        stage: "verify_parse_error",
        level: "error",
        provider_id: run.provider.id,
        trade: run.provider.trade,
        variant: raw.variant,
        error: err.message
      });
      return {
        kind: "terminal",
        terminal: {
          outcome: "lookup-error",
          errorKind: "parse",
          errorDetail: describeError(err),
          raw,
          licenseRecord: null,
          operatorAttention: true
        }
      };
    }
  }

  private async query(provider: Provider, query: QueryFields): Promise<QueryStep> {
    try {
      const raw = await this.client.lookup(provider.trade, query);
      return { kind: "response", raw };
    } catch (err) {
      if (!(err instanceof LookupFailure)) throw err;
      return { kind: "failed", transient: isTransient(err), failure: err };
    }
  }

  private end(run: Run, terminal: Terminal): Promise<VerificationResult> {
    return this.finish(run.provider, run.states, run.enter, run.retries, terminal);
  }

  private async finish(
    provider: Provider,
    states: VerificationState[],
    enter: (state: VerificationState) => void,
    retries: number,
    terminal: Terminal
  ): Promise<VerificationResult> {
    enter("terminal");
    const createdAt = this.now().toISOString();
    const record: NewVerificationAttempt = {
      providerId: provider.id,
      trade: provider.trade,
      createdAt,
      outcome: terminal.outcome,
      errorKind: terminal.errorKind,
      errorDetail: terminal.errorDetail,
      credentialType: "license",
      retryCount: retries,
      rawResponse: terminal.raw
        ? terminal.raw.body.slice(0, RAW_SNAPSHOT_LENGTH)
        : terminal.rawSnippet ?? null,
      licenseRecord: terminal.licenseRecord,
      operatorAttention: terminal.operatorAttention
    };

    const attempt =
      terminal.outcome === "lookup-error"
        ? await this.store.recordAttempt(record)
        : await this.store.recordAttempt(record, { status: terminal.outcome, lastVerifiedAt: createdAt });

    log({
      stage: "verify_complete",
      level: terminal.outcome === "lookup-error" ? "warn" : "info",
      provider_id: provider.id,
      outcome: terminal.outcome,
      retry_count: record.retryCount,
      error_kind: terminal.errorKind,
      operator_attention: terminal.operatorAttention
    });

    return { providerId: provider.id, outcome: terminal.outcome, attempt, states };
  }
}
