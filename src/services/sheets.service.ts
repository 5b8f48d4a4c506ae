import { google } from "googleapis";
import { ApplicationSink, JobApplication } from "../types";
import { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";
import { createOAuthClient } from "./gmail.service";

export const SHEET_HEADERS = ["Position", "Company", "Date Applied"];

/**
 * The slice of `spreadsheets.values` the sink uses.
 */
export interface SheetValuesClient {
  get(params: {
    spreadsheetId: string;
    range: string;
  }): Promise<{ data: { values?: unknown[][] | null } }>;
  update(params: {
    spreadsheetId: string;
    range: string;
    valueInputOption: "RAW";
    requestBody: { values: string[][] };
  }): Promise<unknown>;
  append(params: {
    spreadsheetId: string;
    range: string;
    valueInputOption: "RAW";
    insertDataOption: "INSERT_ROWS";
    requestBody: { values: string[][] };
  }): Promise<unknown>;
}

export function toRow(app: JobApplication): string[] {
  return [app.position, app.company, app.dateApplied];
}

export class SheetsApplicationSink implements ApplicationSink {
  constructor(
    private readonly values: SheetValuesClient,
    private readonly spreadsheetId: string,
    private readonly sheetName: string
  ) {}

  static fromConfig(
    gmail: AppConfig["gmail"],
    sink: { spreadsheetId: string; sheetName: string }
  ): SheetsApplicationSink {
    const { values } = google.sheets({
      version: "v4",
      auth: createOAuthClient(gmail),
    }).spreadsheets;

    return new SheetsApplicationSink(
      {
        get: (params) => values.get(params),
        update: (params) => values.update(params),
        append: (params) => values.append(params),
      },
      sink.spreadsheetId,
      sink.sheetName
    );
  }

  private async ensureHeaders(): Promise<void> {
    const range = `${this.sheetName}!A1:C1`;
    const result = await this.values.get({
      spreadsheetId: this.spreadsheetId,
      range,
    });

    const existing = result.data.values?.[0] ?? [];
    const matches =
      existing.length === SHEET_HEADERS.length &&
      SHEET_HEADERS.every((header, i) => existing[i] === header);
    if (matches) return;

    await this.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: "RAW",
      requestBody: { values: [SHEET_HEADERS] },
    });
    logger.info("Added headers to spreadsheet");
  }

  async appendApplications(applications: JobApplication[]): Promise<number> {
    if (applications.length === 0) return 0;

    await this.ensureHeaders();

    const rows = applications.map(toRow);
    await this.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${this.sheetName}!A:C`,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: rows },
    });

    logger.info(`Appended ${rows.length} rows to spreadsheet`);
    return rows.length;
  }
}
