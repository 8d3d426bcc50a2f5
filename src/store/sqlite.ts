import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { ProviderStore } from './ProviderStore';
import {
  CredentialRecord,
  CredentialType,
  LicenseRecord,
  LicenseStatus,
  LookupErrorKind,
  NewVerificationAttempt,
  Provider,
  ProviderStatus,
  ProviderStatusUpdate,
  TerminalOutcome,
  VerificationAttempt
} from '../types';

// Only the tables the engine reads and writes. The directory service owns the
// rest of the provider schema.
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS providers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    trade TEXT NOT NULL,
    claimed_name TEXT NOT NULL,
    claimed_license_number TEXT,
    trade_specialties TEXT NOT NULL DEFAULT '',
    active INTEGER NOT NULL DEFAULT 1,
    verification_status TEXT NOT NULL DEFAULT 'unverified',
    last_verified_at TEXT
  );

  CREATE TABLE IF NOT EXISTS credential_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    provider_id INTEGER NOT NULL REFERENCES providers(id),
    credential_type TEXT NOT NULL CHECK (credential_type IN ('insurance', 'bond')),
    reference TEXT NOT NULL DEFAULT '',
    expiration_date TEXT
  );

  CREATE TABLE IF NOT EXISTS verification_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    provider_id INTEGER NOT NULL REFERENCES providers(id),
    trade TEXT NOT NULL,
    credential_type TEXT NOT NULL DEFAULT 'license',
    outcome TEXT NOT NULL,
    error_kind TEXT,
    error_detail TEXT,
    retry_count INTEGER NOT NULL DEFAULT 0,
    raw_response TEXT,
    license_record TEXT,
    operator_attention INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS credential_records_provider
    ON credential_records (provider_id, credential_type, id);

  CREATE INDEX IF NOT EXISTS verification_log_provider
    ON verification_log (provider_id, id);

  CREATE TRIGGER IF NOT EXISTS verification_log_no_update
    BEFORE UPDATE ON verification_log
    BEGIN SELECT RAISE(ABORT, 'verification_log is append-only'); END;

  CREATE TRIGGER IF NOT EXISTS verification_log_no_delete
    BEFORE DELETE ON verification_log
    BEGIN SELECT RAISE(ABORT, 'verification_log is append-only'); END;
`;

const PROVIDER_STATUSES: ProviderStatus[] = ['unverified', 'verified', 'expired', 'mismatch', 'not-found'];
const TERMINAL_OUTCOMES: TerminalOutcome[] = ['verified', 'expired', 'mismatch', 'not-found', 'lookup-error'];
const ERROR_KINDS: LookupErrorKind[] = [
  'network', 'timeout', 'upstream', 'parse', 'invalid-query', 'unknown-trade', 'retry-exhausted'
];
const LICENSE_STATUSES: LicenseStatus[] = ['active', 'expired', 'revoked', 'not-found', 'unknown'];
const CREDENTIAL_TYPES: CredentialType[] = ['license', 'insurance', 'bond'];

interface ProviderRow {
  id: number;
  trade: string;
  claimed_name: string;
  claimed_license_number: string | null;
  trade_specialties: string;
  active: number;
  verification_status: string;
  last_verified_at: string | null;
}

interface AttemptRow {
  id: number;
  provider_id: number;
  trade: string;
  credential_type: string;
  outcome: string;
  error_kind: string | null;
  error_detail: string | null;
  retry_count: number;
  raw_response: string | null;
  license_record: string | null;
  operator_attention: number;
  created_at: string;
}

interface AttemptParams {
  providerId: number;
  trade: string;
  credentialType: string;
  outcome: string;
  errorKind: string | null;
  errorDetail: string | null;
  retryCount: number;
  rawResponse: string | null;
  licenseRecord: string | null;
  operatorAttention: number;
  createdAt: string;
}

export interface NewProvider {
  trade: string;
  claimedName: string;
  claimedLicenseNumber?: string | null;
  tradeSpecialties?: string[];
  active?: boolean;
}

interface CredentialRow {
  provider_id: number;
  credential_type: 'insurance' | 'bond';
  reference: string;
  expiration_date: string | null;
}

export interface NewCredential {
  providerId: number;
  credentialType: CredentialRecord['credentialType'];
  reference?: string;
  expirationDate: string | null;
}

export class SQLiteProviderStore implements ProviderStore {
  private db: Database.Database;

  constructor(dbPath = path.join(process.cwd(), 'data/db/verification.db')) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
    this.addMissingColumns();
  }

  // Logs created before credential checks existed lack credential_type
  private addMissingColumns(): void {
    const columns = this.db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('verification_log')")
      .all();
    if (!columns.some((c) => c.name === 'credential_type')) {
      this.db.exec("ALTER TABLE verification_log ADD COLUMN credential_type TEXT NOT NULL DEFAULT 'license'");
    }
  }

  async listActiveProviders(): Promise<Provider[]> {
    const rows = this.db
      .prepare<[], ProviderRow>('SELECT * FROM providers WHERE active = 1 ORDER BY id ASC')
      .all();
    return rows.map(toProvider);
  }

  async findProvider(id: number): Promise<Provider | undefined> {
    const row = this.db
      .prepare<[number], ProviderRow>('SELECT * FROM providers WHERE id = ?')
      .get(id);
    return row ? toProvider(row) : undefined;
  }

  async insertProvider(provider: NewProvider): Promise<Provider> {
    const result = this.db
      .prepare(`
        INSERT INTO providers (trade, claimed_name, claimed_license_number, trade_specialties, active)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(
        provider.trade,
        provider.claimedName,
        provider.claimedLicenseNumber ?? null,
        (provider.tradeSpecialties ?? []).join(', '),
        provider.active === false ? 0 : 1
      );
    const created = await this.findProvider(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error(`Provider insert did not persist (rowid ${result.lastInsertRowid})`);
    }
    return created;
  }

  async findCredential(
    providerId: number,
    credentialType: CredentialRecord['credentialType']
  ): Promise<CredentialRecord | undefined> {
    // latest record on file wins
    const row = this.db
      .prepare<[number, string], CredentialRow>(`
        SELECT * FROM credential_records
        WHERE provider_id = ? AND credential_type = ?
        ORDER BY id DESC LIMIT 1
      `)
      .get(providerId, credentialType);
    return row
      ? {
          providerId: row.provider_id,
          credentialType: row.credential_type,
          reference: row.reference,
          expirationDate: row.expiration_date
        }
      : undefined;
  }

  async insertCredential(credential: NewCredential): Promise<void> {
    this.db
      .prepare(`
        INSERT INTO credential_records (provider_id, credential_type, reference, expiration_date)
        VALUES (?, ?, ?, ?)
      `)
      .run(
        credential.providerId,
        credential.credentialType,
        credential.reference ?? '',
        credential.expirationDate
      );
  }

  async recordAttempt(
    attempt: NewVerificationAttempt,
    statusUpdate?: ProviderStatusUpdate
  ): Promise<VerificationAttempt> {
    const insert = this.db.prepare<AttemptParams>(`
      INSERT INTO verification_log (
        provider_id, trade, credential_type, outcome, error_kind, error_detail, retry_count,
        raw_response, license_record, operator_attention, created_at
      ) VALUES (
        @providerId, @trade, @credentialType, @outcome, @errorKind, @errorDetail, @retryCount,
        @rawResponse, @licenseRecord, @operatorAttention, @createdAt
      )
    `);
    const update = this.db.prepare<[string, string, number]>(`
      UPDATE providers SET verification_status = ?, last_verified_at = ?
      WHERE id = ?
    `);

    const tx = this.db.transaction((params: AttemptParams, status?: ProviderStatusUpdate) => {
      const inserted = insert.run(params);
      if (status) {
        const changed = update.run(status.status, status.lastVerifiedAt, params.providerId);
        if (changed.changes === 0) {
          throw new Error(`Provider ${params.providerId} not found`);
        }
      }
      return Number(inserted.lastInsertRowid);
    });

    const id = tx(
      {
        providerId: attempt.providerId,
        trade: attempt.trade,
        credentialType: attempt.credentialType,
        outcome: attempt.outcome,
        errorKind: attempt.errorKind,
        errorDetail: attempt.errorDetail,
        retryCount: attempt.retryCount,
        rawResponse: attempt.rawResponse,
        licenseRecord: attempt.licenseRecord ? JSON.stringify(attempt.licenseRecord) : null,
        operatorAttention: attempt.operatorAttention ? 1 : 0,
        createdAt: attempt.createdAt
      },
      statusUpdate
    );
    return { ...attempt, id };
  }

  async listAttempts(providerId: number): Promise<VerificationAttempt[]> {
    const rows = this.db
      .prepare<[number], AttemptRow>('SELECT * FROM verification_log WHERE provider_id = ? ORDER BY id ASC')
      .all(providerId);
    return rows.map(toAttempt);
  }

  close(): void {
    this.db.close();
  }
}

function toProvider(row: ProviderRow): Provider {
  return {
    id: row.id,
    trade: row.trade,
    claimedName: row.claimed_name,
    claimedLicenseNumber: row.claimed_license_number,
    tradeSpecialties: row.trade_specialties
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
    status: PROVIDER_STATUSES.find((s) => s === row.verification_status) ?? 'unverified',
    lastVerifiedAt: row.last_verified_at,
    active: row.active === 1
  };
}

function toAttempt(row: AttemptRow): VerificationAttempt {
  const outcome = TERMINAL_OUTCOMES.find((o) => o === row.outcome);
  if (!outcome) {
    throw new Error(`verification_log row ${row.id} has unknown outcome "${row.outcome}"`);
  }
  return {
    id: row.id,
    providerId: row.provider_id,
    trade: row.trade,
    credentialType: CREDENTIAL_TYPES.find((t) => t === row.credential_type) ?? 'license',
    createdAt: row.created_at,
    outcome,
    errorKind: ERROR_KINDS.find((k) => k === row.error_kind) ?? null,
    errorDetail: row.error_detail,
    retryCount: row.retry_count,
    rawResponse: row.raw_response,
    licenseRecord: row.license_record ? parseLicenseRecord(row.license_record) : null,
    operatorAttention: row.operator_attention === 1
  };
}

function parseLicenseRecord(json: string): LicenseRecord | null {
  const value: unknown = JSON.parse(json);
  if (typeof value !== 'object' || value === null) return null;

  const text = (key: string): string => {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : '';
  };
  const expiration: unknown = Reflect.get(value, 'expirationDate');
  const specialties: unknown = Reflect.get(value, 'specialties');

  return {
    holderName: text('holderName'),
    licenseNumber: text('licenseNumber'),
    licenseClass: text('licenseClass'),
    status: LICENSE_STATUSES.find((s) => s === text('status')) ?? 'not-found',
    rawStatus: text('rawStatus'),
    expirationDate: typeof expiration === 'string' ? expiration : null,
    specialties: Array.isArray(specialties)
      ? specialties.filter((s): s is string => typeof s === 'string')
      : [],
    firmType: text('firmType'),
    address: text('address')
  };
}
