import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SQLiteProviderStore } from "../store/sqlite";
import { Provider, TerminalOutcome } from "../types";
import { BatchRunner } from "../verification/batch";
import { CredentialChecker } from "../verification/credentials";
import { VerificationResult } from "../verification/orchestrator";

type Script = Record<number, TerminalOutcome | Error>;

/** Records the order it was asked to verify in and answers from a script. */
class ScriptedOrchestrator {
  readonly seen: number[] = [];

  constructor(
    private readonly script: Script,
    private readonly onVerify: (provider: Provider) => void = () => undefined
  ) {}

  async verify(provider: Provider): Promise<VerificationResult> {
    this.seen.push(provider.id);
    this.onVerify(provider);
    const step = this.script[provider.id] ?? "verified";
    if (step instanceof Error) throw step;
    return {
      providerId: provider.id,
      outcome: step,
      states: ["pending", "terminal"],
      attempt: {
        id: provider.id,
        providerId: provider.id,
        trade: provider.trade,
        credentialType: "license",
        createdAt: "2024-01-01T00:00:00.000Z",
        outcome: step,
        errorKind: null,
        errorDetail: null,
        retryCount: 0,
        rawResponse: null,
        licenseRecord: null,
        operatorAttention: false
      }
    };
  }
}

describe("BatchRunner", () => {
  let store: SQLiteProviderStore;
  let providers: Provider[];
  let credentials: CredentialChecker;

  beforeEach(async () => {
    store = new SQLiteProviderStore(":memory:");
    credentials = new CredentialChecker({ store, now: () => new Date("2024-01-01T00:00:00.000Z") });
    providers = [];
    for (const name of ["Alpha Painting", "Bravo Roofing", "Charlie Painting", "Delta Roofing"]) {
      providers.push(
        await store.insertProvider({ trade: name.endsWith("Roofing") ? "roofer" : "painter", claimedName: name })
      );
    }
  });

  afterEach(() => {
    store.close();
  });

  it("visits providers in ascending id order and tallies outcomes", async () => {
    const [a, b, c, d] = providers;
    const orchestrator = new ScriptedOrchestrator({
      [a.id]: "verified",
      [b.id]: "expired",
      [c.id]: "not-found",
      [d.id]: "lookup-error"
    });

    const summary = await new BatchRunner(orchestrator, store, credentials).runAll([d, b, a, c]);

    expect(orchestrator.seen).toEqual([a.id, b.id, c.id, d.id]);
    expect(summary).toMatchObject({
      processed: 4,
      verified: 1,
      expired: 1,
      mismatched: 0,
      notFound: 1,
      errors: 1,
      stopped: false
    });
  });

  it("keeps going after a provider throws", async () => {
    const [a, b, c, d] = providers;
    const orchestrator = new ScriptedOrchestrator({
      [b.id]: new Error("database is locked"),
      [c.id]: "mismatch"
    });

    const summary = await new BatchRunner(orchestrator, store, credentials).runAll(providers);

    expect(orchestrator.seen).toEqual([a.id, b.id, c.id, d.id]);
    expect(summary).toMatchObject({ processed: 4, verified: 2, mismatched: 1, errors: 1 });
  });

  it("stops between providers once aborted", async () => {
    const controller = new AbortController();
    const [a, b] = providers;
    const orchestrator = new ScriptedOrchestrator({}, (provider) => {
      if (provider.id === b.id) controller.abort();
    });

    const summary = await new BatchRunner(orchestrator, store, credentials).runAll(providers, { signal: controller.signal });

    expect(orchestrator.seen).toEqual([a.id, b.id]);
    expect(summary).toMatchObject({ processed: 2, verified: 2, stopped: true });
  });

  it("runs only active providers on a scheduled pass", async () => {
    const inactive = await store.insertProvider({ trade: "painter", claimedName: "Echo Painting", active: false });
    const orchestrator = new ScriptedOrchestrator({});

    const summary = await new BatchRunner(orchestrator, store, credentials).runScheduled();

    expect(orchestrator.seen).toEqual(providers.map((p) => p.id));
    expect(orchestrator.seen).not.toContain(inactive.id);
    expect(summary.processed).toBe(4);
  });

  it("checks insurance and bond after each license", async () => {
    const [a, b] = providers;
    await store.insertCredential({ providerId: a.id, credentialType: "insurance", expirationDate: "2023-06-30" });
    await store.insertCredential({ providerId: a.id, credentialType: "bond", expirationDate: "2030-06-30" });
    await store.insertCredential({ providerId: b.id, credentialType: "insurance", expirationDate: null });

    const summary = await new BatchRunner(new ScriptedOrchestrator({}), store, credentials).runAll(providers);

    expect(summary).toMatchObject({ processed: 4, credentialsExpired: 1, credentialsMissing: 5 });
    const logged = await store.listAttempts(a.id);
    expect(logged.map((attempt) => [attempt.credentialType, attempt.outcome])).toEqual([
      ["insurance", "expired"],
      ["bond", "verified"]
    ]);
  });
});
