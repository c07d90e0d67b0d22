// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Vetting Bot — src/features/staffRating/sheets.ts
 * WHAT: Read-only Google Sheets cell reader (API key auth, values endpoint).
 * WHY: The staff roster lives in a spreadsheet; only single cells are ever needed.
 * DOCS:
 *  - spreadsheets.values.get: https://developers.google.com/sheets/api/reference/rest/v4/spreadsheets.values/get
 */

import { z } from "zod";
import { requestJson } from "../../lib/http.js";
import { logger } from "../../lib/logger.js";

export const EMPTY_CELL = "N/A";

const SHEETS_TIMEOUT_MS = 10_000;

const valueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).optional(),
});

export type CellReader = (sheet: string, cell: string) => Promise<string>;

/** "E14:F14" reads E14; merged ranges keep their value in the first cell. */
export function firstCell(cell: string): string {
  return cell.split(":")[0]?.trim() ?? cell;
}

/** A1 range with the sheet name quoted, so names with spaces work. */
export function a1Range(sheet: string, cell: string): string {
  return `'${sheet.replace(/'/g, "''")}'!${firstCell(cell)}`;
}

export class SheetsClient {
  constructor(
    private readonly spreadsheetId: string,
    private readonly apiKey: string | undefined
  ) {}

  get configured(): boolean {
    return Boolean(this.spreadsheetId && this.apiKey);
  }

  /**
   * Trimmed cell text, or "N/A" when the cell is empty or cannot be read.
   */
  async readCell(sheet: string, cell: string): Promise<string> {
    if (!this.configured) {
      logger.error({ evt: "sheets_not_configured" }, "[staffRating] spreadsheet id or GOOGLE_SHEETS_API_KEY missing");
      return EMPTY_CELL;
    }

    const range = a1Range(sheet, cell);
    // API key rides in the query string; log the range, not the URL.
    const url =
      `https://sheets.googleapis.com/v4/spreadsheets/${encodeURIComponent(this.spreadsheetId)}` +
      `/values/${encodeURIComponent(range)}?key=${encodeURIComponent(this.apiKey ?? "")}`;

    const result = await requestJson(url, valueRangeSchema, { timeoutMs: SHEETS_TIMEOUT_MS });
    if (!result.ok) {
      logger.error(
        { evt: "sheets_read_fail", range, kind: result.failure.kind },
        `[staffRating] Error fetching ${cell} from ${sheet}: ${result.failure.message}`
      );
      return EMPTY_CELL;
    }

    const raw = result.data.values?.[0]?.[0];
    const text = raw === undefined ? "" : String(raw).trim();
    return text || EMPTY_CELL;
  }
}
