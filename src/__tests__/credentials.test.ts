import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SQLiteProviderStore } from "../store/sqlite";
import { Provider } from "../types";
import { CredentialChecker } from "../verification/credentials";

describe("CredentialChecker", () => {
  let store: SQLiteProviderStore;
  let provider: Provider;
  let checker: CredentialChecker;

  beforeEach(async () => {
    store = new SQLiteProviderStore(":memory:");
    provider = await store.insertProvider({ trade: "roofer", claimedName: "Jones Roofing" });
    checker = new CredentialChecker({ store, now: () => new Date("2024-01-01T15:30:00.000Z") });
  });

  afterEach(() => {
    store.close();
  });

  it("marks insurance that lapsed before today as expired", async () => {
    await store.insertCredential({ providerId: provider.id, credentialType: "insurance", expirationDate: "2023-12-31" });

    const check = await checker.check(provider, "insurance");

    expect(check).toMatchObject({ credentialType: "insurance", outcome: "expired", expirationDate: "2023-12-31" });
    expect(check.attempt).toMatchObject({
      providerId: provider.id,
      trade: "roofer",
      credentialType: "insurance",
      outcome: "expired",
      createdAt: "2024-01-01T15:30:00.000Z"
    });
  });

  it("accepts a bond expiring today, as license expiry does", async () => {
    await store.insertCredential({ providerId: provider.id, credentialType: "bond", expirationDate: "2024-01-01" });
    expect((await checker.check(provider, "bond")).outcome).toBe("verified");
  });

  it("treats a record without an expiration date as valid", async () => {
    await store.insertCredential({ providerId: provider.id, credentialType: "bond", expirationDate: null });
    expect((await checker.check(provider, "bond")).outcome).toBe("verified");
  });

  it("logs not-found when nothing is on file", async () => {
    const check = await checker.check(provider, "insurance");

    expect(check.outcome).toBe("not-found");
    expect(await store.listAttempts(provider.id)).toEqual([check.attempt]);
  });

  it("checks insurance then bond and leaves the license status alone", async () => {
    await store.insertCredential({ providerId: provider.id, credentialType: "insurance", expirationDate: "2020-01-01" });

    const checks = await checker.checkAll(provider);

    expect(checks.map((c) => [c.credentialType, c.outcome])).toEqual([
      ["insurance", "expired"],
      ["bond", "not-found"]
    ]);
    expect(await store.findProvider(provider.id)).toMatchObject({ status: "unverified", lastVerifiedAt: null });
  });
});
