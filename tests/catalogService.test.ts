import { beforeEach, describe, expect, it, vi } from "vitest";
import { Response, type RequestInit } from "node-fetch";
import {
  fetchAccessToken,
  fetchCatalogRecords,
  parsePartNumberList,
  searchPart,
  type CatalogOptions,
  type FetchFn
} from "../services/catalogService.js";
import { CatalogError } from "../services/errors.js";

const AUTH_URL = "https://catalog.test/oauth2/token";
const SEARCH_URL = "https://catalog.test/search/keyword";

type SearchReply = { status: number; body: unknown };

function fakeCatalog(replies: Record<string, SearchReply>, tokenStatus = 200) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];

  const fetch: FetchFn = async (url, init) => {
    calls.push({ url, init });

    if (url === AUTH_URL) {
      return tokenStatus === 200
        ? new Response(JSON.stringify({ access_token: "test-token" }), { status: 200 })
        : new Response("invalid client", { status: tokenStatus });
    }

    const keywords = String(JSON.parse(String(init?.body)).keywords);
    const reply = replies[keywords] ?? { status: 200, body: { Products: [] } };
    const body = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(body, { status: reply.status });
  };

  const options: CatalogOptions = {
    fetch,
    clientId: "test-id",
    clientSecret: "test-secret",
    authUrl: AUTH_URL,
    searchUrl: SEARCH_URL
  };

  return { calls, options };
}

const MLX_PRODUCT = {
  Products: [
    {
      Manufacturer: { Name: "Melexis Technologies NV" },
      ProductStatus: { Status: "Active" },
      Parameters: [
        { ParameterText: "Interface", ValueText: "I2C, SPI" },
        { ParameterText: "Voltage - Supply", ValueText: "2.2V ~ 3.6V" }
      ]
    }
  ]
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("parsePartNumberList", () => {
  it("splits on commas and drops blanks", () => {
    expect(parsePartNumberList(" MLX90393, ,HMC5883L ,")).toEqual(["MLX90393", "HMC5883L"]);
  });
});

describe("fetchCatalogRecords", () => {
  it("exchanges a token once and builds one record per part", async () => {
    const { calls, options } = fakeCatalog({
      "MLX90393": { status: 200, body: MLX_PRODUCT }
    });

    const records = await fetchCatalogRecords(["MLX90393", "hmc5883l"], options);

    expect(records).toEqual([
      {
        "Part Number": "MLX90393",
        "Mfr": "Melexis Technologies NV",
        "Part Status": "Active",
        "Interface": "I2C, SPI",
        "Voltage - Supply": "2.2V ~ 3.6V"
      },
      { "Part Number": "HMC5883L", "Error": "No product found" }
    ]);

    expect(calls.map(c => c.url)).toEqual([AUTH_URL, SEARCH_URL, SEARCH_URL]);
  });

  it("sends basic auth for the token and bearer auth for searches", async () => {
    const { calls, options } = fakeCatalog({ "MLX90393": { status: 200, body: MLX_PRODUCT } });

    await fetchCatalogRecords(["MLX90393"], options);

    const basic = Buffer.from("test-id:test-secret").toString("base64");
    expect(calls[0].init?.headers).toMatchObject({ Authorization: `Basic ${basic}` });
    expect(String(calls[0].init?.body)).toBe("grant_type=client_credentials");

    expect(calls[1].init?.headers).toMatchObject({
      "Authorization": "Bearer test-token",
      "X-DIGIKEY-Client-Id": "test-id"
    });
    expect(JSON.parse(String(calls[1].init?.body))).toEqual({ keywords: "MLX90393", recordCount: 1 });
  });

  it("rejects when the token exchange fails", async () => {
    const { options } = fakeCatalog({}, 401);

    await expect(fetchCatalogRecords(["MLX90393"], options)).rejects.toThrow(CatalogError);
    await expect(fetchCatalogRecords(["MLX90393"], options)).rejects.toThrow("Token error: invalid client");
  });
});

describe("fetchAccessToken", () => {
  it("returns the access token", async () => {
    const { options } = fakeCatalog({});
    expect(await fetchAccessToken(options)).toBe("test-token");
  });
});

describe("searchPart", () => {
  it("records a search error inline for a non-success status", async () => {
    const { options } = fakeCatalog({ "bad1": { status: 500, body: "upstream down" } });

    const record = await searchPart("test-token", "bad1", options);
    expect(record).toEqual({ "Part Number": "BAD1", "Error": "Search error: upstream down" });
  });

  it("degrades a malformed Products field to a placeholder", async () => {
    const { options } = fakeCatalog({
      "ODD1": { status: 200, body: { Products: "not-a-list" } },
      "ODD2": { status: 200, body: { Items: [] } },
      "ODD3": { status: 200, body: { Products: [{ Parameters: "oops" }] } },
      "ODD4": { status: 200, body: "<html>" }
    });

    for (const pn of ["ODD1", "ODD2", "ODD3", "ODD4"]) {
      expect(await searchPart("test-token", pn, options)).toEqual({
        "Part Number": pn,
        "Error": "No product found"
      });
    }
  });

  it("fills missing manufacturer and status with '-'", async () => {
    const { options } = fakeCatalog({
      "BARE1": { status: 200, body: { Products: [{ Parameters: [{ ParameterText: "Package", ValueText: null }] }] } }
    });

    expect(await searchPart("test-token", "BARE1", options)).toEqual({
      "Part Number": "BARE1",
      "Mfr": "-",
      "Part Status": "-",
      "Package": "-"
    });
  });

  it("skips malformed parameter entries and keeps the rest of the product", async () => {
    const { options } = fakeCatalog({
      "MIX1": {
        status: 200,
        body: {
          Products: [
            {
              Manufacturer: { Name: "Texas Instruments" },
              ProductStatus: { Status: "Active" },
              Parameters: [
                { ParameterText: "Package", ValueText: "SOIC-8" },
                { ParameterText: "Channels", ValueText: 5 },
                "stray",
                { ParameterText: "Voltage - Supply", ValueText: "3V ~ 32V" }
              ]
            }
          ]
        }
      }
    });

    expect(await searchPart("test-token", "MIX1", options)).toEqual({
      "Part Number": "MIX1",
      "Mfr": "Texas Instruments",
      "Part Status": "Active",
      "Package": "SOIC-8",
      "Voltage - Supply": "3V ~ 32V"
    });
  });

  it("turns a network failure into a placeholder", async () => {
    const options: CatalogOptions = {
      fetch: async () => {
        throw new Error("socket hang up");
      },
      clientId: "test-id",
      clientSecret: "test-secret",
      searchUrl: SEARCH_URL
    };

    expect(await searchPart("test-token", "net1", options)).toEqual({
      "Part Number": "NET1",
      "Error": "Search error: socket hang up"
    });
  });
});
