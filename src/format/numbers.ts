export const EMPTY_DISPLAY = "--";

const twoDecimals = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * `|v| >= 1`: thousands separators and two decimals (`1,234.57`).
 * `|v| < 1`: two significant digits (`0.012`, `-0.00066`).
 * Zero, null and NaN render as `--`.
 */
export function formatSignificant(value: number | null | undefined, unit?: string): string {
  if (value === null || value === undefined || Number.isNaN(value) || value === 0) return EMPTY_DISPLAY;

  const abs = Math.abs(value);
  let body: string;
  if (!Number.isFinite(abs)) {
    body = "∞";
  } else if (abs >= 1) {
    body = twoDecimals.format(abs);
  } else {
    const rounded = Number(abs.toPrecision(2));
    body = rounded >= 1 ? twoDecimals.format(rounded) : rounded.toFixed(1 - Math.floor(Math.log10(rounded)));
  }

  const signed = value < 0 ? `-${body}` : body;
  return unit ? `${signed} ${unit}` : signed;
}

/** `1,234.50 USDT`, with a leading warning marker when the figure is incomplete. */
export function formatCash(value: number, unit: string, incomplete = false): string {
  const text = `${twoDecimals.format(value)} ${unit}`;
  return incomplete ? `⚠️ ${text}` : text;
}

export function formatPercent(ratio: number | null | undefined, digits = 2): string {
  if (ratio === null || ratio === undefined || !Number.isFinite(ratio)) return EMPTY_DISPLAY;
  return `${(ratio * 100).toFixed(digits)}%`;
}

/** Multiples below 2 read better as a percentage; larger ones as `2.35×`. */
export function formatRatio(ratio: number | null | undefined): string {
  if (ratio === null || ratio === undefined || !Number.isFinite(ratio)) return EMPTY_DISPLAY;
  return Math.abs(ratio) < 2 ? formatPercent(ratio) : `${ratio.toFixed(2)}×`;
}

export function sideMarker(side: string): string {
  const s = side.toUpperCase();
  if (s === "BUY") return "↗ BUY";
  if (s === "SELL") return "↘ SELL";
  return s;
}

export function capitalize(s: string): string {
  return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}

/** `partially_filled` → `Partially filled`. */
export function statusLabel(status: string): string {
  return capitalize(status.replace(/_/g, " "));
}
