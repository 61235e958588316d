/**
 * Google Sheets API Client
 * 
 * Purpose:
 * Low-level read access to the catalog spreadsheet through the Sheets v4
 * values endpoint, authenticated with a service account.
 * 
 * Layer: Catalog (API client)
 */

import { GoogleAuth } from "google-auth-library";
import { z } from "zod";
import { CATALOG_CONSTANTS } from "../config/constants";
import { ExternalServiceError } from "../utils/errorHandler";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets.readonly"];

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const valueRangeSchema = z.object({
  range: z.string().optional(),
  values: z.array(z.array(cellSchema)).optional(),
});

export type SheetRows = string[][];

function getSheetsConfig() {
  const sheetId = process.env.SHEET_ID;
  const credentialsJson = process.env.GOOGLE_APPLICATION_CREDENTIALS_JSON;
  const range = process.env.SHEET_RANGE || CATALOG_CONSTANTS.DEFAULT_SHEET_RANGE;

  if (!sheetId) {
    throw new Error("[Sheets] SHEET_ID environment variable is not set");
  }
  if (!credentialsJson) {
    throw new Error("[Sheets] GOOGLE_APPLICATION_CREDENTIALS_JSON environment variable is not set");
  }

  return { sheetId, credentialsJson, range };
}

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

function getGoogleAuth(credentialsJson: string): GoogleAuth {
  let parsed: unknown;
  try {
    parsed = JSON.parse(credentialsJson);
  } catch {
    throw new Error("[Sheets] GOOGLE_APPLICATION_CREDENTIALS_JSON is not valid JSON");
  }

  return new GoogleAuth({
    credentials: serviceAccountSchema.parse(parsed),
    scopes: SCOPES,
  });
}

/**
 * Read every row of the configured range as display strings.
 * The first row is the header row.
 */
export async function fetchSheetRows(): Promise<SheetRows> {
  const { sheetId, credentialsJson, range } = getSheetsConfig();

  const auth = getGoogleAuth(credentialsJson);
  const client = await auth.getClient();
  const accessToken = await client.getAccessToken();
  if (!accessToken.token) {
    throw new ExternalServiceError("Google Sheets", "no access token returned for service account");
  }

  const url = `https://sheets.googleapis.com/v4/spreadsheets/${encodeURIComponent(sheetId)}/values/${encodeURIComponent(range)}`;
  const response = await fetch(url, {
    headers: {
      Authorization: `Bearer ${accessToken.token}`,
    },
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new ExternalServiceError("Google Sheets", `${response.status} ${errorText}`);
  }

  const data = valueRangeSchema.parse(await response.json());
  return (data.values ?? []).map(row => row.map(cell => (cell === null ? "" : String(cell))));
}
