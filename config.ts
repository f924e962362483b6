import "dotenv/config";

const DEFAULT_GENERATION_URL = "ws://127.0.0.1:8765";
const CATALOG_AUTH_URL = "https://api.digikey.com/v1/oauth2/token";
const CATALOG_SEARCH_URL = "https://api.digikey.com/products/v4/search/keyword";

export interface GenerationSettings {
  url: string;
  clientName: string;
  clientVersion: string;
  model: string;
  temperature: number;
  system: string;
  format: string;
}

export interface AppConfig {
  port: number;
  generation: GenerationSettings;
  catalog: {
    authUrl: string;
    searchUrl: string;
  };
  serviceServer: {
    host: string;
    port: number;
    name: string;
  };
  gemini: {
    apiKey: string | undefined;
    model: string;
  };
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  return {
    port: readNumber("PORT", 3000),
    generation: {
      url: process.env.GENERATION_SERVICE_URL || DEFAULT_GENERATION_URL,
      clientName: process.env.GENERATION_CLIENT_NAME || "component-compare",
      clientVersion: "0.1",
      model: process.env.GENERATION_MODEL || "gpt-4o-mini",
      temperature: readNumber("GENERATION_TEMPERATURE", 0.2),
      system: "Be concise. table format to state the parameters",
      format: "markdown"
    },
    catalog: {
      authUrl: process.env.CATALOG_AUTH_URL || CATALOG_AUTH_URL,
      searchUrl: process.env.CATALOG_SEARCH_URL || CATALOG_SEARCH_URL
    },
    serviceServer: {
      host: process.env.GENERATION_SERVICE_HOST || "127.0.0.1",
      port: readNumber("GENERATION_SERVICE_PORT", 8765),
      name: process.env.GENERATION_SERVICE_NAME || "component-generation-service"
    },
    gemini: {
      apiKey: process.env.GEMINI_API_KEY,
      model: process.env.GEMINI_MODEL || "models/gemini-2.5-flash"
    }
  };
}

export function requireCatalogCredentials(): { clientId: string; clientSecret: string } {
  const clientId = process.env.DIGIKEY_CLIENT_ID;
  const clientSecret = process.env.DIGIKEY_CLIENT_SECRET;

  if (!clientId || !clientSecret) {
    throw new Error("DIGIKEY_CLIENT_ID and DIGIKEY_CLIENT_SECRET must be set in environment");
  }
  return { clientId, clientSecret };
}
