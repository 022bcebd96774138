import * as fs from "fs";
import * as path from "path";
import { EnvSchema, toSettings, type Settings } from "./schema.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Config");

const ENV_KEYS = [
  "API_URL",
  "API_KEY",
  "QUOTE_ASSET",
  "REQUEST_TIMEOUT_MS",
  "REFRESH_SECONDS",
  "FRESH_WINDOW_S",
  "N_VISUAL_DEGRADATIONS",
  "SLIDER_MIN",
  "SLIDER_MAX",
  "SLIDER_STEP",
  "SLIDER_DEFAULT",
  "APP_TITLE",
  "LOGO_FILE",
  "UI_URL",
  "LOCAL_TZ",
  "DASHBOARD_HOST",
  "DASHBOARD_PORT",
  "ADVANCED_DETAILS",
  "LOG_LEVEL",
] as const;

/**
 * Merge `KEY=value` lines from `envPath` into `target` without overriding
 * variables that are already set.
 */
export function loadDotEnv(
  envPath: string = path.join(process.cwd(), ".env"),
  target: NodeJS.ProcessEnv = process.env
): void {
  if (!fs.existsSync(envPath)) return;
  const contents = fs.readFileSync(envPath, "utf-8");
  for (const line of contents.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = unquote(trimmed.slice(eqIdx + 1).trim());
    if (key && target[key] === undefined) {
      target[key] = value;
    }
  }
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

/** Validate the recognised variables of `source`. Empty strings count as unset. */
export function parseSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const picked: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = source[key];
    if (value !== undefined && value.trim() !== "") picked[key] = value.trim();
  }
  return toSettings(EnvSchema.parse(picked));
}

export function loadSettings(envPath?: string): Settings {
  loadDotEnv(envPath);
  const settings = parseSettings();
  logger.info(
    {
      apiUrl: settings.api.baseUrl,
      quoteAsset: settings.quoteAsset,
      refreshIntervalMs: settings.refreshIntervalMs,
    },
    "Settings loaded"
  );
  return settings;
}

/* ---------- Branding ---------- */

export interface Logo {
  fileName: string;
  contentType: string;
  bytes: Buffer;
}

export interface Branding {
  title: string;
  logo: Logo | null;
}

const LOGO_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
};

/**
 * Resolve the configured logo. A configured logo that is missing or
 * unreadable is a startup error.
 */
export function loadBranding(settings: Settings, baseDir: string = process.cwd()): Branding {
  const { title, logoFile } = settings.branding;
  if (logoFile === "") return { title, logo: null };

  const resolved = path.resolve(baseDir, logoFile);
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolved);
  } catch (err) {
    throw new Error(`Logo file not readable: ${resolved}`, { cause: err });
  }

  const ext = path.extname(resolved).toLowerCase();
  return {
    title,
    logo: {
      fileName: path.basename(resolved),
      contentType: LOGO_TYPES[ext] ?? "application/octet-stream",
      bytes,
    },
  };
}
