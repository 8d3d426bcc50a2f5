import { InvalidQueryError, ParseError } from "../errors";
import { LicenseRecord, LicenseStatus, QueryFields, Trade } from "../types";
import { loadDocument, readLabelledFields, safeText } from "./html";
import { LookupRequest, RawResponse, TradeDefinition } from "./types";

// Virginia DPOR license lookup.
//   Detail: POST {base}/LicenseDetail  form: license-number, phone-number (honeypot, always empty)
//   Search: POST {base}/Search         form: search-text, phone-number

export const DPOR_SOURCE = "va_dpor";

// Search rows are summaries: no status, expiration or specialties. Those
// only appear on the license's detail page.
export const SEARCH_HEADERS = ["License Number", "Name", "Address", "License Type", "Board"];

const NOT_FOUND_NOTICE = /no (matching )?(records?|results?|licen[sc]es?) (were |was )?found/i;

export function buildDporRequest(baseUrl: string, query: QueryFields): LookupRequest {
  const base = baseUrl.replace(/\/+$/, "");
  const licenseNumber = query.licenseNumber?.trim() ?? "";
  if (licenseNumber) {
    return {
      url: `${base}/LicenseDetail`,
      form: { "license-number": licenseNumber, "phone-number": "" },
      variant: "detail"
    };
  }

  const holderName = query.holderName?.trim() ?? "";
  if (holderName) {
    return {
      url: `${base}/Search`,
      form: { "search-text": holderName, "phone-number": "" },
      variant: "search"
    };
  }

  throw new InvalidQueryError("A license number or holder name is required");
}

/**
 * Checks the page structure up front and throws ParseError when it is not a
 * page we recognise. Rows are converted one at a time as the caller pulls
 * them, so a malformed row surfaces as a ParseError mid-iteration.
 */
export function parseDporResponse(raw: RawResponse): IterableIterator<LicenseRecord> {
  const doc = loadDocument(raw.body);
  return raw.variant === "detail"
    ? parseDetailPage(doc, raw.form["license-number"] ?? "")
    : parseSearchPage(doc);
}

function parseDetailPage(doc: Document, requestedNumber: string): IterableIterator<LicenseRecord> {
  const tab = doc.querySelector("#license-details-tab");
  if (!tab) {
    if (hasNotFoundNotice(doc)) return noResults();
    throw new ParseError("License detail page has no #license-details-tab and no not-found notice");
  }

  const fields = readLabelledFields(tab);
  const holderName = fields.get("Name") ?? "";
  if (!holderName) {
    throw new ParseError("License detail page is missing the Name field");
  }

  return (function* () {
    const rawStatus = fields.get("Status") ?? "";
    yield {
      holderName,
      licenseNumber: fields.get("License Number") || requestedNumber,
      licenseClass: fields.get("Rank") ?? "",
      status: parseLicenseStatus(rawStatus),
      rawStatus,
      expirationDate: parseLicenseDate(fields.get("Expiration Date")),
      specialties: splitSpecialties(fields.get("Specialties") ?? ""),
      firmType: fields.get("Firm Type") ?? "",
      address: fields.get("Address") ?? ""
    };
  })();
}

function parseSearchPage(doc: Document): IterableIterator<LicenseRecord> {
  const table = doc.querySelector("table#search-results");
  if (!table) {
    if (hasNotFoundNotice(doc)) return noResults();
    throw new ParseError("Search page has no #search-results table and no not-found notice");
  }

  const headers = Array.from(table.querySelectorAll("th")).map((th) => safeText(th));
  if (headers.join("|") !== SEARCH_HEADERS.join("|")) {
    throw new ParseError(`Unexpected search results header: [${headers.join(", ")}]`);
  }

  const rows = Array.from(table.querySelectorAll("tr")).filter(
    (row) => row.querySelector("td") !== null && !isNoticeRow(row)
  );

  return (function* () {
    for (let i = 0; i < rows.length; i++) {
      yield searchRowToRecord(rows[i], i);
    }
  })();
}

function searchRowToRecord(row: Element, index: number): LicenseRecord {
  const cells = Array.from(row.querySelectorAll("td"));
  if (cells.length < SEARCH_HEADERS.length) {
    throw new ParseError(
      `Search result row ${index + 1} has ${cells.length} cells, expected ${SEARCH_HEADERS.length}`
    );
  }

  const numberInput = cells[0].querySelector('input[name="license-number"]');
  const licenseNumber = (numberInput?.getAttribute("value") ?? safeText(cells[0])).trim();
  if (!licenseNumber) {
    throw new ParseError(`Search result row ${index + 1} has no license number`);
  }

  return {
    holderName: safeText(cells[1]),
    licenseNumber,
    licenseClass: safeText(cells[3]),
    status: "unknown",
    rawStatus: "",
    expirationDate: null,
    specialties: [],
    firmType: "",
    address: safeText(cells[2])
  };
}

export function parseLicenseStatus(text: string): LicenseStatus {
  const value = text.trim().toLowerCase();
  if (value === "" || /^(active|current|valid)\b/.test(value)) return "active";
  if (/^(expired|lapsed)\b/.test(value)) return "expired";
  if (/^(revoked|suspended|surrendered|terminated)\b/.test(value)) return "revoked";
  throw new ParseError(`Unrecognised license status: "${text}"`);
}

export function parseLicenseDate(text: string | undefined): string | null {
  const value = (text ?? "").trim();
  if (!value) return null;

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  const parts = iso
    ? { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) }
    : us
      ? { year: Number(us[3]), month: Number(us[1]), day: Number(us[2]) }
      : null;
  if (!parts) {
    throw new ParseError(`Unrecognised date: "${text}"`);
  }

  const { year, month, day } = parts;
  // setUTCFullYear keeps years below 100 as written; Date.UTC maps them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new ParseError(`Invalid calendar date: "${text}"`);
  }
  return date.toISOString().slice(0, 10);
}

function splitSpecialties(text: string): string[] {
  return text
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

function hasNotFoundNotice(doc: Document): boolean {
  return Array.from(doc.querySelectorAll(".alert, .no-results")).some((el) =>
    NOT_FOUND_NOTICE.test(safeText(el))
  );
}

function isNoticeRow(row: Element): boolean {
  const cells = row.querySelectorAll("td");
  return cells.length === 1 && NOT_FOUND_NOTICE.test(safeText(cells[0]));
}

function noResults(): IterableIterator<LicenseRecord> {
  const none: LicenseRecord[] = [];
  return none.values();
}

export function createDporTrade(
  trade: Trade,
  specialties: string[],
  baseUrl: string
): TradeDefinition {
  return {
    trade,
    source: DPOR_SOURCE,
    specialties,
    buildRequest: (query) => buildDporRequest(baseUrl, query),
    parse: parseDporResponse
  };
}
