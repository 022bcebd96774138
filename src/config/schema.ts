import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";
import { isTimeZone } from "../utils/time.js";

/* ---------- Environment schema ---------- */

export const EnvSchema = z
  .object({
    /* ---- Exchange API ---- */
    API_URL: z.string().url().default("http://localhost:8000"),
    API_KEY: z.string().min(1, "API_KEY must not be empty").default("dev-key"),
    QUOTE_ASSET: z.string().min(1).default("USDT"),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),

    /* ---- Refresh ---- */
    // Timer delays above 2^31 - 1 ms overflow setInterval.
    REFRESH_SECONDS: z.coerce.number().min(0.001).max(2_147_483).default(60),

    /* ---- Order row fading ---- */
    FRESH_WINDOW_S: z.coerce.number().min(0.001).max(2_147_483).default(300),
    N_VISUAL_DEGRADATIONS: z.coerce
      .number()
      .int()
      .min(2, "N_VISUAL_DEGRADATIONS must be at least 2")
      .default(12),

    /* ---- Tail slider ---- */
    SLIDER_MIN: z.coerce.number().int().min(1).default(10),
    SLIDER_MAX: z.coerce.number().int().min(1).default(1000),
    SLIDER_STEP: z.coerce.number().int().positive().default(10),
    SLIDER_DEFAULT: z.coerce.number().int().min(1).default(100),

    /* ---- Branding & UI ---- */
    APP_TITLE: z.string().default(""),
    LOGO_FILE: z.string().default(""),
    UI_URL: z.string().url().default("http://localhost:8501"),
    LOCAL_TZ: z.string().refine(isTimeZone, "LOCAL_TZ is not a known IANA time zone").default("UTC"),
    DASHBOARD_HOST: z.string().min(1).default("127.0.0.1"),
    DASHBOARD_PORT: z.coerce.number().int().min(0).max(65_535).default(8501),
    ADVANCED_DETAILS: z
      .string()
      .transform((v) => v === "1" || v.toLowerCase() === "true")
      .default("1"),

    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  })
  .refine((e) => e.SLIDER_MIN <= e.SLIDER_MAX, {
    message: "SLIDER_MIN must not exceed SLIDER_MAX",
    path: ["SLIDER_MIN"],
  })
  .refine((e) => e.SLIDER_DEFAULT >= e.SLIDER_MIN && e.SLIDER_DEFAULT <= e.SLIDER_MAX, {
    message: "SLIDER_DEFAULT must lie within [SLIDER_MIN, SLIDER_MAX]",
    path: ["SLIDER_DEFAULT"],
  });

export type Env = z.infer<typeof EnvSchema>;

/* ---------- Settings handed to every component ---------- */

export interface SliderSettings {
  min: number;
  max: number;
  step: number;
  default: number;
}

export interface Settings {
  api: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
  };
  quoteAsset: string;
  refreshIntervalMs: number;
  staleness: {
    freshWindowMs: number;
    levels: number;
  };
  slider: SliderSettings;
  branding: {
    title: string;
    logoFile: string;
  };
  uiUrl: string;
  localTz: string;
  server: {
    host: string;
    port: number;
  };
  advancedDetails: boolean;
  logLevel: Env["LOG_LEVEL"];
}

export function toSettings(env: Env): Settings {
  return {
    api: {
      baseUrl: env.API_URL.replace(/\/+$/, ""),
      apiKey: env.API_KEY,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
    },
    quoteAsset: env.QUOTE_ASSET,
    refreshIntervalMs: Math.round(env.REFRESH_SECONDS * 1000),
    staleness: {
      freshWindowMs: Math.round(env.FRESH_WINDOW_S * 1000),
      levels: env.N_VISUAL_DEGRADATIONS,
    },
    slider: {
      min: env.SLIDER_MIN,
      max: env.SLIDER_MAX,
      step: env.SLIDER_STEP,
      default: env.SLIDER_DEFAULT,
    },
    branding: {
      title: env.APP_TITLE,
      logoFile: env.LOGO_FILE,
    },
    uiUrl: env.UI_URL,
    localTz: env.LOCAL_TZ,
    server: {
      host: env.DASHBOARD_HOST,
      port: env.DASHBOARD_PORT,
    },
    advancedDetails: env.ADVANCED_DETAILS,
    logLevel: env.LOG_LEVEL,
  };
}
