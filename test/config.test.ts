import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ZodError } from "zod";
import { loadBranding, loadDotEnv, parseSettings } from "../src/config/load.js";

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "dashboard-config-"));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("parseSettings", () => {
  it("applies defaults", () => {
    const s = parseSettings({});
    expect(s.api).toEqual({ baseUrl: "http://localhost:8000", apiKey: "dev-key", timeoutMs: 3_000 });
    expect(s.quoteAsset).toBe("USDT");
    expect(s.refreshIntervalMs).toBe(60_000);
    expect(s.staleness).toEqual({ freshWindowMs: 300_000, levels: 12 });
    expect(s.slider).toEqual({ min: 10, max: 1000, step: 10, default: 100 });
    expect(s.localTz).toBe("UTC");
    expect(s.server).toEqual({ host: "127.0.0.1", port: 8501 });
    expect(s.advancedDetails).toBe(true);
    expect(s.logLevel).toBe("info");
  });

  it("coerces and converts environment strings", () => {
    const s = parseSettings({
      API_URL: "http://exchange.test:9000/",
      API_KEY: "test-secret",
      REFRESH_SECONDS: "1.5",
      FRESH_WINDOW_S: "60",
      ADVANCED_DETAILS: "0",
      LOCAL_TZ: "Europe/Paris",
      APP_TITLE: "",
    });
    expect(s.api.baseUrl).toBe("http://exchange.test:9000");
    expect(s.api.apiKey).toBe("test-secret");
    expect(s.refreshIntervalMs).toBe(1_500);
    expect(s.staleness.freshWindowMs).toBe(60_000);
    expect(s.advancedDetails).toBe(false);
    expect(s.localTz).toBe("Europe/Paris");
    expect(s.branding.title).toBe("");
  });

  it.each([
    ["REFRESH_SECONDS", "0"],
    ["REFRESH_SECONDS", "0.0001"],
    ["REFRESH_SECONDS", "3000000"],
    ["FRESH_WINDOW_S", "0.0001"],
    ["FRESH_WINDOW_S", "3000000"],
    ["N_VISUAL_DEGRADATIONS", "1"],
    ["API_URL", "not a url"],
    ["LOCAL_TZ", "Mars/Olympus"],
    ["SLIDER_DEFAULT", "5000"],
    ["LOG_LEVEL", "verbose"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => parseSettings({ [key]: value })).toThrow(ZodError);
  });

  it("accepts the interval bounds", () => {
    const low = parseSettings({ REFRESH_SECONDS: "0.001", FRESH_WINDOW_S: "0.001" });
    expect(low.refreshIntervalMs).toBe(1);
    expect(low.staleness.freshWindowMs).toBe(1);
    const high = parseSettings({ REFRESH_SECONDS: "2147483" });
    expect(high.refreshIntervalMs).toBe(2_147_483_000);
  });

  it("rejects a slider whose minimum exceeds its maximum", () => {
    expect(() => parseSettings({ SLIDER_MIN: "500", SLIDER_MAX: "100", SLIDER_DEFAULT: "200" })).toThrow(ZodError);
  });
});

describe("loadDotEnv", () => {
  it("fills unset variables without overriding set ones", () => {
    const envPath = path.join(dir, ".env");
    fs.writeFileSync(envPath, ["# comment", "API_KEY=from-file", 'APP_TITLE="My Desk"', "QUOTE_ASSET=EUR", ""].join("\n"));
    const target: NodeJS.ProcessEnv = { QUOTE_ASSET: "USDT" };

    loadDotEnv(envPath, target);

    expect(target).toEqual({ QUOTE_ASSET: "USDT", API_KEY: "from-file", APP_TITLE: "My Desk" });
  });

  it("ignores a missing file", () => {
    const target: NodeJS.ProcessEnv = {};
    loadDotEnv(path.join(dir, "absent.env"), target);
    expect(target).toEqual({});
  });
});

describe("loadBranding", () => {
  it("has no logo when none is configured", () => {
    const b = loadBranding(parseSettings({ APP_TITLE: "Desk" }), dir);
    expect(b).toEqual({ title: "Desk", logo: null });
  });

  it("reads a configured logo", () => {
    fs.writeFileSync(path.join(dir, "logo.svg"), "<svg/>");
    const b = loadBranding(parseSettings({ LOGO_FILE: "logo.svg" }), dir);
    expect(b.logo?.contentType).toBe("image/svg+xml");
    expect(b.logo?.bytes.toString()).toBe("<svg/>");
  });

  it("fails at startup when the logo is missing", () => {
    expect(() => loadBranding(parseSettings({ LOGO_FILE: "missing.png" }), dir)).toThrow(/Logo file not readable/);
  });
});
