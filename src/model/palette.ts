/**
 * Order-row colours: a base background per status, faded toward black as
 * the row ages through its staleness tiers.
 */
import type { KnownOrderStatus, OrderStatus } from "./orders.js";

export const STATUS_BASE_COLOURS: Readonly<Record<KnownOrderStatus, string>> = {
  new: "#aa55ff",
  partially_filled: "#11aaff",
  filled: "#00ff00",
  partially_canceled: "#fff700",
  canceled: "#ff5555",
  rejected: "#ff5555",
  expired: "#ff5555",
};

export const STATUS_LIGHTS: Readonly<Record<KnownOrderStatus, string>> = {
  new: "\u{1F7E3}",
  partially_filled: "\u{1F535}",
  filled: "\u{1F7E2}",
  partially_canceled: "\u{1F7E1}",
  canceled: "\u{1F534}",
  rejected: "\u{1F534}",
  expired: "\u{1F534}",
};

export interface RowStyle {
  background: string;
  color: string;
}

/** One entry per fade level; each maps status → style. */
export type FadePalette = ReadonlyArray<Readonly<Record<KnownOrderStatus, RowStyle>>>;

const HEX = /^#([0-9a-f]{6})$/i;

function channels(hex: string): [number, number, number] {
  let h = hex.trim();
  if (/^#[0-9a-f]{3}$/i.test(h)) h = "#" + [...h.slice(1)].map((c) => c + c).join("");
  const m = HEX.exec(h);
  if (!m) throw new Error(`Not a #rrggbb colour: ${hex}`);
  const n = parseInt(m[1], 16);
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

function toHex(rgb: readonly number[]): string {
  return "#" + rgb.map((c) => c.toString(16).padStart(2, "0")).join("");
}

/** Blend `hex` toward black; `t = 0` keeps the colour, `t = 1` is black. */
export function darken(hex: string, t: number): string {
  const k = 1 - Math.min(1, Math.max(0, t));
  return toHex(channels(hex).map((c) => Math.round(c * k)));
}

/** Black on light backgrounds, white on dark ones (YIQ luminance, threshold 128). */
export function contrastTextColour(backgroundHex: string): string {
  const [r, g, b] = channels(backgroundHex);
  const yiq = (r * 299 + g * 587 + b * 114) / 1000;
  return yiq >= 128 ? "#000000" : "#ffffff";
}

function perStatus<T>(fn: (status: KnownOrderStatus) => T): Record<KnownOrderStatus, T> {
  return {
    new: fn("new"),
    partially_filled: fn("partially_filled"),
    filled: fn("filled"),
    partially_canceled: fn("partially_canceled"),
    canceled: fn("canceled"),
    rejected: fn("rejected"),
    expired: fn("expired"),
  };
}

export function buildFadePalette(levels: number): FadePalette {
  if (!Number.isInteger(levels) || levels < 2) {
    throw new Error(`Fade levels must be an integer of at least 2, got ${levels}`);
  }
  const palette: Record<KnownOrderStatus, RowStyle>[] = [];
  for (let level = 0; level < levels; level++) {
    const last = level === levels - 1;
    palette.push(
      perStatus((status) => {
        const background = last ? "#000000" : darken(STATUS_BASE_COLOURS[status], level / (levels - 1));
        return { background, color: contrastTextColour(background) };
      })
    );
  }
  return palette;
}

/** `null` (default table colours) past the last fade level or for an unknown status. */
export function rowStyle(status: OrderStatus, tier: number, palette: FadePalette): RowStyle | null {
  if (status === "unknown" || tier < 0 || tier >= palette.length) return null;
  return palette[tier][status];
}
