import express, { Response } from "express";
import { InvalidQueryError, LookupFailure, UnknownTradeError, describeError } from "./errors";
import { LookupClient } from "./lookup/client";
import { TradeRegistry } from "./lookup";
import { ProviderStore } from "./store/ProviderStore";
import { toPublicStatus } from "./types";
import { log } from "./utils/logger";
import { BatchRunner } from "./verification/batch";
import { CredentialChecker } from "./verification/credentials";
import { VerificationOrchestrator } from "./verification/orchestrator";

export interface AppDependencies {
  store: ProviderStore;
  registry: TradeRegistry;
  client: LookupClient;
  orchestrator: Pick<VerificationOrchestrator, "verify">;
  credentials: Pick<CredentialChecker, "checkAll">;
  runner: Pick<BatchRunner, "runScheduled">;
}

function parseProviderId(value: string): number | null {
  const id = Number(value);
  return Number.isInteger(id) && id > 0 ? id : null;
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function sendFailure(res: Response, stage: string, err: unknown) {
  log({ stage, level: "error", error: describeError(err) });
  return res.status(500).json({ success: false, error: describeError(err) });
}

export function createApp(deps: AppDependencies) {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", uptime: process.uptime() });
  });

  // Admin: verify one provider now (license, then insurance and bond)
  app.post("/verify/:providerId", async (req, res) => {
    const providerId = parseProviderId(req.params.providerId);
    if (providerId === null) {
      return res.status(400).json({ error: `Invalid provider id: ${req.params.providerId}` });
    }

    try {
      const provider = await deps.store.findProvider(providerId);
      if (!provider) {
        return res.status(404).json({ error: `Provider ${providerId} not found` });
      }
      const result = await deps.orchestrator.verify(provider);
      const checks = await deps.credentials.checkAll(provider);
      return res.json({
        success: true,
        outcome: result.outcome,
        attempt: result.attempt,
        credentials: checks.map(({ credentialType, outcome, expirationDate }) => ({
          credentialType,
          outcome,
          expirationDate
        }))
      });
    } catch (err) {
      return sendFailure(res, "verify_endpoint_error", err);
    }
  });

  app.post("/verify-all", async (_req, res) => {
    try {
      const summary = await deps.runner.runScheduled();
      return res.json({ success: true, summary });
    } catch (err) {
      return sendFailure(res, "verify_all_endpoint_error", err);
    }
  });

  // Admin audit view, oldest first
  app.get("/providers/:providerId/verification-log", async (req, res) => {
    const providerId = parseProviderId(req.params.providerId);
    if (providerId === null) {
      return res.status(400).json({ error: `Invalid provider id: ${req.params.providerId}` });
    }

    try {
      const attempts = await deps.store.listAttempts(providerId);
      return res.json({ providerId, attempts });
    } catch (err) {
      return sendFailure(res, "log_endpoint_error", err);
    }
  });

  // Consumer view: coarse status only
  app.get("/providers/:providerId/status", async (req, res) => {
    const providerId = parseProviderId(req.params.providerId);
    if (providerId === null) {
      return res.status(400).json({ error: `Invalid provider id: ${req.params.providerId}` });
    }

    try {
      const provider = await deps.store.findProvider(providerId);
      if (!provider) {
        return res.status(404).json({ error: `Provider ${providerId} not found` });
      }
      return res.json({
        providerId,
        status: toPublicStatus(provider.status),
        lastVerifiedAt: provider.lastVerifiedAt
      });
    } catch (err) {
      return sendFailure(res, "status_endpoint_error", err);
    }
  });

  app.get("/lookup/:trade", async (req, res) => {
    const { trade } = req.params;
    try {
      const raw = await deps.client.lookup(trade, {
        licenseNumber: queryString(req.query.licenseNumber),
        holderName: queryString(req.query.name)
      });
      const definition = deps.registry.get(raw.trade);
      if (!definition) {
        throw new UnknownTradeError(raw.trade);
      }
      const candidates = [...definition.parse(raw)];
      return res.json({ trade: raw.trade, variant: raw.variant, candidates });
    } catch (err) {
      if (err instanceof InvalidQueryError || err instanceof UnknownTradeError) {
        return res.status(400).json({ error: err.message, kind: err.kind });
      }
      if (err instanceof LookupFailure) {
        log({ stage: "lookup_endpoint_failed", level: "warn", trade, kind: err.kind, error: err.message });
        return res.status(502).json({ error: err.message, kind: err.kind });
      }
      return sendFailure(res, "lookup_endpoint_error", err);
    }
  });

  return app;
}
