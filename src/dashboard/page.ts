/**
 * Single-page UI. Static markup plus a small script that polls `/api/state`
 * and renders the pre-formatted views; all numbers arrive already formatted.
 */
import type { SliderSettings } from "../config/schema.js";

export interface PageOptions {
  title: string;
  hasLogo: boolean;
  slider: SliderSettings;
  refreshIntervalMs: number;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

export function renderPage(opts: PageOptions): string {
  const title = escapeHtml(opts.title || "Paper Exchange");
  const { min, max, step } = opts.slider;
  const config = JSON.stringify({
    refreshIntervalMs: opts.refreshIntervalMs,
    slider: opts.slider,
  }).replace(/</g, "\\u003c");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${title}</title>
<style>
:root{--bg:#0d1117;--card:#161b22;--border:#252d38;--text:#e6edf3;--dim:#7d8590;--muted:#545d68;--accent:#58a6ff;--green:#3fb950;--red:#f85149;--yellow:#d29922;--font:'SF Mono',Menlo,Consolas,monospace;}
*{box-sizing:border-box;margin:0;padding:0;}
body{background:var(--bg);color:var(--text);font:13px/1.5 -apple-system,BlinkMacSystemFont,'Segoe UI',sans-serif;}
.topbar{display:flex;align-items:center;justify-content:space-between;padding:10px 20px;background:var(--card);border-bottom:1px solid var(--border);position:sticky;top:0;z-index:100;}
.topbar-left{display:flex;align-items:center;gap:12px;}
.topbar h1{font-size:16px;font-weight:700;}
.topbar img{height:28px;}
.topbar-right{display:flex;align-items:center;gap:14px;font-size:12px;color:var(--dim);}
.pulse{width:8px;height:8px;border-radius:50%;display:inline-block;margin-right:6px;}
.pulse-green{background:var(--green);}.pulse-red{background:var(--red);}.pulse-yellow{background:var(--yellow);}
.main{padding:16px 20px;}
.card{background:var(--card);border:1px solid var(--border);border-radius:8px;padding:14px 16px;margin-bottom:14px;}
.card-title{font-size:11px;font-weight:700;color:var(--dim);text-transform:uppercase;letter-spacing:0.8px;margin-bottom:10px;}
.kpi-row{display:grid;grid-template-columns:repeat(auto-fill,minmax(180px,1fr));gap:10px;margin-bottom:10px;}
.kpi{background:var(--bg);border:1px solid var(--border);border-radius:6px;padding:8px 10px;}
.kpi .label{font-size:10px;color:var(--dim);text-transform:uppercase;}
.kpi .value{font-size:16px;font-weight:700;font-family:var(--font);}
.kpi.warn .value{color:var(--yellow);}
.error{display:none;background:rgba(248,81,73,0.1);border:1px solid var(--red);color:var(--red);padding:8px 12px;border-radius:6px;margin-bottom:14px;}
.warnings{color:var(--yellow);font-size:12px;margin-bottom:8px;}
.bars .bar{display:flex;align-items:center;gap:8px;margin-bottom:4px;font-family:var(--font);font-size:12px;}
.bars .bar span:first-child{width:80px;color:var(--dim);}
.bars .fill{height:10px;background:var(--accent);border-radius:3px;}
.controls{display:flex;align-items:center;gap:12px;margin-bottom:10px;flex-wrap:wrap;}
.controls select{background:var(--bg);color:var(--text);border:1px solid var(--border);border-radius:4px;}
button{background:var(--bg);color:var(--accent);border:1px solid var(--border);border-radius:4px;padding:3px 10px;cursor:pointer;}
table{width:100%;border-collapse:collapse;font-size:12px;font-family:var(--font);}
th{text-align:left;color:var(--muted);font-weight:600;padding:6px 8px;border-bottom:1px solid var(--border);font-size:10px;text-transform:uppercase;}
td{padding:4px 8px;border-bottom:1px solid rgba(37,45,56,0.5);white-space:nowrap;}
td a{color:inherit;}
.drawer{position:fixed;top:0;right:0;bottom:0;width:560px;max-width:100%;background:var(--card);border-left:1px solid var(--border);z-index:201;overflow-y:auto;padding:20px;transform:translateX(100%);transition:transform 0.25s ease;}
.drawer.open{transform:translateX(0);}
.drawer h2{font-size:14px;margin-bottom:12px;}
.drawer-close{float:right;}
</style>
</head>
<body>
<div class="topbar">
  <div class="topbar-left">
    ${opts.hasLogo ? '<img src="/logo" alt="">' : ""}
    <h1>${title}</h1>
  </div>
  <div class="topbar-right">
    <span><span id="pulse" class="pulse pulse-yellow"></span><span id="status-label">Loading</span></span>
    <span id="as-of"></span>
    <button id="refresh-btn">Refresh</button>
  </div>
</div>

<div class="main">
  <div id="error" class="error"></div>

  <div class="card">
    <div class="card-title">Portfolio</div>
    <div class="kpi-row"><div class="kpi"><div class="label">Equity</div><div class="value" id="equity">--</div></div><div class="kpi"><div class="label">Active assets</div><div class="value" id="active-assets">--</div></div></div>
    <div id="portfolio-warnings" class="warnings"></div>
    <div id="chart" class="bars"></div>
    <table><thead><tr><th>Asset</th><th>Quantity</th><th>Free</th><th>Used</th><th>Price</th><th>Value</th><th>Share</th></tr></thead><tbody id="holdings"></tbody></table>
  </div>

  <div class="card">
    <div class="card-title">Performance</div>
    <div id="performance"></div>
  </div>

  <div class="card">
    <div class="card-title">Orders</div>
    <div class="controls">
      <label>Tail <input id="tail" type="range" min="${min}" max="${max}" step="${step}"> <span id="tail-label"></span></label>
      <label><input id="tail-all" type="checkbox"> all</label>
      <label>Status <select id="f-status"><option value="">any</option></select></label>
      <label>Side <select id="f-side"><option value="">any</option></select></label>
      <label>Type <select id="f-type"><option value="">any</option></select></label>
      <label>Asset <select id="f-asset"><option value="">any</option></select></label>
    </div>
    <div id="orders-caption" class="warnings"></div>
    <table><thead><tr><th></th><th>Updated</th><th>Requested</th><th>Symbol</th><th>Side</th><th>Type</th><th>Status</th><th>Qty</th><th>Filled</th><th>Price</th><th>Limit</th><th>Notional</th><th>Fee</th><th>Net value</th><th>Latency</th></tr></thead><tbody id="orders"></tbody></table>
  </div>
</div>

<div id="drawer" class="drawer">
  <button class="drawer-close" id="drawer-close">Close</button>
  <h2 id="detail-title"></h2>
  <div id="detail-body"></div>
</div>

<script>
const CONFIG = ${config};
const $ = (id) => document.getElementById(id);
const FILTERS = ["status", "side", "type", "asset"];

function el(tag, text, attrs) {
  const node = document.createElement(tag);
  if (text !== undefined && text !== null) node.textContent = String(text);
  if (attrs) for (const [k, v] of Object.entries(attrs)) node.setAttribute(k, v);
  return node;
}

function fillRows(tbody, rows) {
  tbody.replaceChildren(...rows.map((cells) => {
    const tr = el("tr");
    for (const c of cells) tr.appendChild(c instanceof Node ? wrapCell(c) : el("td", c));
    return tr;
  }));
}

function wrapCell(node) { const td = el("td"); td.appendChild(node); return td; }

function cards(list) {
  const row = el("div", null, { class: "kpi-row" });
  for (const c of list) {
    const k = el("div", null, { class: c.incomplete ? "kpi warn" : "kpi" });
    k.appendChild(el("div", c.label, { class: "label" }));
    k.appendChild(el("div", (c.incomplete ? "\\u26A0 " : "") + c.value, { class: "value" }));
    row.appendChild(k);
  }
  return row;
}

function filterQuery() {
  const q = new URLSearchParams();
  for (const f of FILTERS) { const v = $("f-" + f).value; if (v) q.set(f, v); }
  return q.toString();
}

function syncOptions(filters) {
  for (const f of FILTERS) {
    const sel = $("f-" + f);
    const keep = sel.value;
    sel.replaceChildren(el("option", "any", { value: "" }), ...filters[f].map((v) => el("option", v, { value: v })));
    sel.value = filters[f].includes(keep) ? keep : "";
  }
}

function render(s) {
  const err = $("error");
  if (s.refresh.error) {
    err.style.display = "block";
    err.textContent = "Last refresh failed (" + s.refresh.error.kind + "): " + s.refresh.error.message + ". Showing last good data.";
  } else {
    err.style.display = "none";
  }
  $("pulse").className = "pulse " + (s.refresh.error ? "pulse-red" : s.view ? "pulse-green" : "pulse-yellow");
  $("status-label").textContent = s.refresh.error ? "Degraded" : s.view ? "Live" : "Loading";

  const tail = $("tail");
  if (document.activeElement !== tail) {
    $("tail-all").checked = s.tail === null;
    tail.value = s.tail === null ? CONFIG.slider.max : s.tail;
    $("tail-label").textContent = s.tail === null ? "all" : s.tail;
  }
  if (!s.view) return;
  const v = s.view;

  $("as-of").textContent = v.portfolio.asOf;
  $("equity").textContent = v.portfolio.equity;
  $("active-assets").textContent = v.portfolio.activeAssets === null ? "--" : v.portfolio.activeAssets;
  $("portfolio-warnings").textContent = v.portfolio.warnings.join(" ");
  $("chart").replaceChildren(...v.portfolio.chart.map((c) => {
    const bar = el("div", null, { class: "bar" });
    bar.appendChild(el("span", c.label));
    const fill = el("div", null, { class: "fill" });
    fill.style.width = Math.max(1, Math.round(c.percentage * 300)) + "px";
    bar.appendChild(fill);
    bar.appendChild(el("span", (c.percentage * 100).toFixed(1) + "%"));
    return bar;
  }));
  fillRows($("holdings"), v.portfolio.holdings.map((h) => [h.asset, h.quantity, h.free, h.used, h.price, h.value, h.share]));

  const perf = $("performance");
  perf.replaceChildren(cards(v.performance.pnl), cards(v.performance.capital), cards(v.performance.multiples), cards(v.performance.activity));
  if (v.performance.balances.length > 0) perf.appendChild(cards(v.performance.balances));

  syncOptions(v.orders.filters);
  $("orders-caption").textContent = v.orders.caption;
  renderOrders(v.orders.rows);
}

function renderOrders(rows) {
  const tbody = $("orders");
  fillRows(tbody, rows.map((r) => {
    const link = el("a", "\\uD83D\\uDD0D", { href: r.detailsUrl });
    link.addEventListener("click", (e) => { e.preventDefault(); openDetail(r.id); });
    const c = r.cells;
    return [link, c.updated, c.requested, c.symbol, c.side, c.type, c.status, c.quantity, c.filled, c.price, c.limitPrice, c.notional, c.fee, c.feeAdjusted, c.latency];
  }));
  rows.forEach((r, i) => {
    if (!r.style) return;
    const tr = tbody.children[i];
    tr.style.background = r.style.background;
    tr.style.color = r.style.color;
  });
}

async function loadState() {
  const q = filterQuery();
  const res = await fetch("/api/state" + (q ? "?" + q : ""));
  render(await res.json());
}

async function refreshNow() {
  const tail = $("tail-all").checked ? "all" : $("tail").value;
  const q = new URLSearchParams({ tail });
  const f = filterQuery();
  const res = await fetch("/api/refresh?" + q.toString() + (f ? "&" + f : ""), { method: "POST" });
  render(await res.json());
}

async function openDetail(id) {
  $("drawer").classList.add("open");
  $("detail-title").textContent = "Order " + id;
  const body = $("detail-body");
  body.replaceChildren(el("div", "Loading\\u2026"));
  const res = await fetch("/api/orders/" + encodeURIComponent(id));
  const d = await res.json();
  if (!res.ok) { body.replaceChildren(el("div", d.error || "Unavailable", { class: "warnings" })); return; }
  $("detail-title").textContent = d.title;
  const summary = el("table");
  for (const [k, v] of Object.entries(d.order.cells)) {
    const tr = el("tr"); tr.appendChild(el("td", k)); tr.appendChild(el("td", v)); summary.appendChild(tr);
  }
  const hist = el("table");
  const head = el("tr");
  for (const h of ["Step", "At", "Status", "Price", "Filled", "Remaining", "Notional", "Fee", "Comment"]) head.appendChild(el("th", h));
  hist.appendChild(head);
  for (const h of d.history) {
    const tr = el("tr");
    for (const v of [h.step, h.at, h.status, h.price, h.filled, h.remaining, h.notional, h.fee, h.comment]) tr.appendChild(el("td", v));
    hist.appendChild(tr);
  }
  body.replaceChildren(summary, el("h2", "History"), hist);
}

$("drawer-close").addEventListener("click", () => $("drawer").classList.remove("open"));
$("refresh-btn").addEventListener("click", () => refreshNow().catch(console.error));
$("tail").addEventListener("input", () => { $("tail-label").textContent = $("tail").value; });
$("tail").addEventListener("change", () => { $("tail-all").checked = false; refreshNow().catch(console.error); });
$("tail-all").addEventListener("change", () => refreshNow().catch(console.error));
for (const f of FILTERS) $("f-" + f).addEventListener("change", () => loadState().catch(console.error));

const initialOrder = new URLSearchParams(location.search).get("order_id");
if (initialOrder) openDetail(initialOrder).catch(console.error);

loadState().catch(console.error);
setInterval(() => loadState().catch(console.error), Math.min(CONFIG.refreshIntervalMs, 5000));
</script>
</body>
</html>`;
}
