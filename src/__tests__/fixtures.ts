import { LookupClient } from "../lookup/client";
import { RawResponse, ResponseVariant } from "../lookup";
import { QueryFields, Trade } from "../types";

export const BASE_URL = "https://lookup.test/LicenseLookup";

export function detailPage(fields: Record<string, string>): string {
  const rows = Object.entries(fields)
    .map(
      ([label, value]) =>
        `<div class="row"><div class="col-xs-6"><strong>${label}</strong></div><div class="col-xs-6">${value}</div></div>`
    )
    .join("\n");
  return `<html><body><div id="license-details-tab">${rows}</div></body></html>`;
}

export interface SearchRow {
  licenseNumber: string;
  name: string;
  address?: string;
  licenseType?: string;
  board?: string;
}

export function searchPage(rows: SearchRow[]): string {
  const body = rows
    .map(
      (row) => `<tr>
        <td><form><input type="hidden" name="license-number" value="${row.licenseNumber}"/><button>${row.licenseNumber}</button></form></td>
        <td>${row.name}</td>
        <td>${row.address ?? "1 Main St, Richmond, VA 23219"}</td>
        <td>${row.licenseType ?? "Contractor"}</td>
        <td>${row.board ?? "Board for Contractors"}</td>
      </tr>`
    )
    .join("\n");
  return `<html><body>
    <table id="search-results">
      <thead><tr><th>License Number</th><th>Name</th><th>Address</th><th>License Type</th><th>Board</th></tr></thead>
      <tbody>${body}</tbody>
    </table>
  </body></html>`;
}

export function notFoundPage(): string {
  return `<html><body><div class="alert alert-danger">No records found for the license number provided.</div></body></html>`;
}

export function malformedPage(): string {
  return `<html><body><h1>We have moved!</h1><p>Please use our new portal.</p></body></html>`;
}

export function rawResponse(
  variant: ResponseVariant,
  body: string,
  form: Record<string, string> = {},
  trade: Trade = "painter"
): RawResponse {
  return {
    trade,
    variant,
    url: `${BASE_URL}/${variant === "detail" ? "LicenseDetail" : "Search"}`,
    form,
    status: 200,
    body,
    receivedAt: "2024-01-01T00:00:00.000Z"
  };
}

type Step = RawResponse | Error;

/** Replays queued responses or errors, one per call; the last step repeats. */
export class StubLookupClient implements LookupClient {
  readonly calls: Array<{ trade: string; query: QueryFields }> = [];

  constructor(private readonly steps: Step[]) {}

  async lookup(trade: string, query: QueryFields): Promise<RawResponse> {
    this.calls.push({ trade, query });
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  }
}
