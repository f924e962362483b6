// services/catalogService.ts
import fetch, { type RequestInit, type Response } from "node-fetch";
import { z } from "zod";
import { loadConfig, requireCatalogCredentials } from "../config.js";
import type { ComponentSpecRecord } from "../types.js";
import { CatalogError, errorMessage } from "./errors.js";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface CatalogOptions {
  fetch?: FetchFn;
  clientId?: string;
  clientSecret?: string;
  authUrl?: string;
  searchUrl?: string;
}

interface ResolvedCatalogOptions {
  fetch: FetchFn;
  clientId: string;
  clientSecret: string;
  authUrl: string;
  searchUrl: string;
}

/* -----------------------------
   Response shapes
----------------------------- */

const tokenSchema = z.object({
  access_token: z.string().min(1)
});

// Parameters are checked one entry at a time so a single odd entry
// is skipped without losing the rest of the product.
const parameterSchema = z.object({
  ParameterText: z.string().nullish(),
  ValueText: z.string().nullish()
});

const productSchema = z.object({
  Manufacturer: z.object({ Name: z.string().nullish() }).nullish(),
  ProductStatus: z.object({ Status: z.string().nullish() }).nullish(),
  Parameters: z.array(z.unknown()).nullish()
});

const searchSchema = z.object({
  Products: z.array(z.unknown()).nullish()
});

/* -----------------------------
   Public API
----------------------------- */

export function parsePartNumberList(text: string): string[] {
  return text
    .split(",")
    .map(p => p.trim())
    .filter(p => p !== "");
}

export async function fetchAccessToken(options: CatalogOptions = {}): Promise<string> {
  const opts = resolveOptions(options);
  return requestToken(opts);
}

export async function searchPart(
  accessToken: string,
  partNumber: string,
  options: CatalogOptions = {}
): Promise<ComponentSpecRecord> {
  return searchWithOptions(accessToken, partNumber, resolveOptions(options));
}

/**
 * One token exchange, then one keyword search per part number, in order.
 * Lookup failures come back as placeholder records carrying an "Error" attribute.
 */
export async function fetchCatalogRecords(
  partNumbers: string[],
  options: CatalogOptions = {}
): Promise<ComponentSpecRecord[]> {
  const opts = resolveOptions(options);
  const accessToken = await requestToken(opts);

  const records: ComponentSpecRecord[] = [];
  for (const partNumber of partNumbers) {
    records.push(await searchWithOptions(accessToken, partNumber, opts));
  }
  return records;
}

/* -----------------------------
   Internals
----------------------------- */

function resolveOptions(options: CatalogOptions): ResolvedCatalogOptions {
  const { catalog } = loadConfig();
  const credentials =
    options.clientId && options.clientSecret
      ? { clientId: options.clientId, clientSecret: options.clientSecret }
      : requireCatalogCredentials();

  return {
    fetch: options.fetch ?? fetch,
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    authUrl: options.authUrl ?? catalog.authUrl,
    searchUrl: options.searchUrl ?? catalog.searchUrl
  };
}

async function requestToken(opts: ResolvedCatalogOptions): Promise<string> {
  const basic = Buffer.from(`${opts.clientId}:${opts.clientSecret}`).toString("base64");

  const response = await opts.fetch(opts.authUrl, {
    method: "POST",
    headers: {
      "Authorization": `Basic ${basic}`,
      "Content-Type": "application/x-www-form-urlencoded"
    },
    body: new URLSearchParams({ grant_type: "client_credentials" })
  });

  if (response.status !== 200) {
    throw new CatalogError(`Token error: ${await response.text()}`, response.status);
  }

  const parsed = tokenSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new CatalogError("Token error: response carried no access_token", response.status);
  }

  console.log("Access token received.");
  return parsed.data.access_token;
}

async function searchWithOptions(
  accessToken: string,
  partNumber: string,
  opts: ResolvedCatalogOptions
): Promise<ComponentSpecRecord> {
  const label = partNumber.trim().toUpperCase();

  let response: Response;
  try {
    response = await opts.fetch(opts.searchUrl, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${accessToken}`,
        "X-DIGIKEY-Client-Id": opts.clientId,
        "Content-Type": "application/json",
        "Accept": "application/json"
      },
      body: JSON.stringify({ keywords: partNumber, recordCount: 1 })
    });
  } catch (err) {
    console.error("SEARCH ERROR:", label, err);
    return placeholder(label, `Search error: ${errorMessage(err)}`);
  }

  if (response.status !== 200) {
    const body = await response.text();
    console.error("SEARCH ERROR:", label, response.status);
    return placeholder(label, `Search error: ${body}`);
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch (err) {
    console.error("SEARCH ERROR:", label, err);
    return placeholder(label, "No product found");
  }

  const search = searchSchema.safeParse(json);
  const first = search.success ? search.data.Products?.[0] : undefined;
  const product = productSchema.safeParse(first);

  if (first === undefined || !product.success) {
    return placeholder(label, "No product found");
  }

  const specs: ComponentSpecRecord = {
    "Part Number": label,
    "Mfr": product.data.Manufacturer?.Name ?? "-",
    "Part Status": product.data.ProductStatus?.Status ?? "-"
  };

  for (const entry of product.data.Parameters ?? []) {
    const param = parameterSchema.safeParse(entry);
    if (!param.success) {
      console.warn("SKIPPED PARAMETER:", label, JSON.stringify(entry));
      continue;
    }
    if (!param.data.ParameterText) continue;
    specs[param.data.ParameterText] = param.data.ValueText ?? "-";
  }

  return specs;
}

function placeholder(partNumber: string, error: string): ComponentSpecRecord {
  return { "Part Number": partNumber, "Error": error };
}
