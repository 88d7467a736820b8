// HTML fragments rendered server-side
import type { AccountSummary, PositionView } from '../../core/types.ts'
import type { HistoryView } from '../../core/account-monitor.ts'
import type { Result } from '../../core/result.ts'
import { toChartSeries } from '../../core/history.ts'
import { formatLocalDateTime } from '../../core/dates.ts'
import { round } from '../../core/account.ts'

export function escHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;')
}

/** JSON that is safe inside an inline <script>. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c')
}

export function signed(value: number, digits = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`
}

export function periodLabel(periodDays: number | null): string {
  return periodDays === null ? 'All time' : `${periodDays} days`
}

function periodParam(periodDays: number | null): string {
  return periodDays === null ? 'all' : String(periodDays)
}

const CHART_SCRIPT = `
  let balanceChart = null
  function renderBalanceChart(series) {
    const canvas = document.getElementById('balance-chart')
    if (!canvas || !window.Chart) return
    if (balanceChart) balanceChart.destroy()
    balanceChart = new Chart(canvas, {
      type: 'line',
      data: {
        labels: series.map(p => p.date),
        datasets: [
          { label: 'Min Balance', data: series.map(p => p.min), borderColor: '#ea3943', borderDash: [2, 4], borderWidth: 1, pointRadius: 0 },
          { label: 'Max Balance', data: series.map(p => p.max), borderColor: '#16c784', borderDash: [2, 4], borderWidth: 1, pointRadius: 0 },
          { label: 'Close Balance', data: series.map(p => p.close), borderColor: '#f6465d', borderWidth: 3, pointRadius: 3 },
        ],
      },
      options: {
        animation: false,
        interaction: { mode: 'index', intersect: false },
        plugins: { legend: { labels: { color: '#eaecef' } } },
        scales: {
          x: { ticks: { color: '#848e9c', maxTicksLimit: 10 }, grid: { color: '#2b3139' } },
          y: { ticks: { color: '#848e9c' }, grid: { color: '#2b3139' }, title: { display: true, text: 'Balance (USDT)', color: '#848e9c' } },
        },
      },
    })
  }
`

export function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Futures Monitor - ${escHtml(title)}</title>
  <script src="https://unpkg.com/htmx.org@1.9.10"></script>
  <script src="https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js"></script>
  <script>${CHART_SCRIPT}</script>
  <style>
    body { margin: 0; font-family: system-ui, sans-serif; background: #0b0e11; color: #eaecef; }
    nav { display: flex; align-items: center; gap: 1.5rem; padding: 0.75rem 2rem; background: #181a20; border-bottom: 1px solid #2b3139; }
    nav a { color: #848e9c; text-decoration: none; }
    nav a:hover { color: #f0b90b; }
    .container { max-width: 1200px; margin: 0 auto; padding: 1.5rem 2rem; }
    .grid { display: grid; grid-template-columns: repeat(3, 1fr); gap: 1rem; }
    .card { background: #1e2329; border: 1px solid #2b3139; border-radius: 6px; padding: 1.25rem; margin-bottom: 1rem; }
    .stat { font-size: 1.6rem; font-weight: 600; }
    .label { margin-top: 0.35rem; font-size: 0.8rem; color: #848e9c; }
    table { width: 100%; border-collapse: collapse; font-variant-numeric: tabular-nums; }
    th, td { padding: 0.5rem 0.75rem; text-align: right; border-bottom: 1px solid #2b3139; }
    th:first-child, td:first-child { text-align: left; }
    th { font-weight: normal; color: #848e9c; }
    .muted { color: #848e9c; }
    .positive { color: #0ecb81; }
    .negative { color: #f6465d; }
    .badge { margin-left: 0.5rem; padding: 1px 6px; border-radius: 3px; font-size: 0.75rem; }
    .badge-warn { background: #3c2f0b; color: #f0b90b; }
    .badge-err { background: #3d1a1f; color: #f6465d; }
  </style>
</head>
<body>
  <nav>
    <strong style="color:#f0b90b">Futures Monitor</strong>
    ${[30, 90, null].map(p => `<a href="/?period=${periodParam(p)}">${periodLabel(p)}</a>`).join('\n    ')}
  </nav>
  <div class="container">
    ${body}
  </div>
</body>
</html>`
}

export function dashboardView(data: { periodDays: number | null; refreshSeconds: number }): string {
  const param = periodParam(data.periodDays)
  return layout(periodLabel(data.periodDays), `
    <h2 style="margin-bottom:1rem">Binance Futures Dashboard</h2>
    <div id="live" hx-get="/partials/live?period=${param}" hx-trigger="load, every ${data.refreshSeconds}s" hx-swap="innerHTML">
      <div class="card muted" style="text-align:center">Loading…</div>
    </div>
  `)
}

function chartCard(history: Result<HistoryView, Error>, periodDays: number | null): string {
  const title = `Total Futures Balance - ${periodLabel(periodDays)}`
  if (!history.ok) {
    return `<div class="card"><h3 style="margin-bottom:1rem">${title}</h3><span class="badge badge-err">Error loading data</span></div>`
  }
  const notice = history.value.empty ? ' <span class="badge badge-warn">No data</span>' : ''
  return `<div class="card">
      <h3 style="margin-bottom:1rem">${title}${notice}</h3>
      <canvas id="balance-chart" height="110"></canvas>
      <script>renderBalanceChart(${scriptJson(toChartSeries(history.value.points))})</script>
    </div>`
}

function positionRow(p: PositionView): string {
  const cls = (v: number) => (v > 0 ? 'positive' : v < 0 ? 'negative' : '')
  return `<tr>
      <td>${escHtml(p.symbol)}</td>
      <td>${escHtml(p.positionSide)}</td>
      <td>${p.usdtValue.toFixed(2)}</td>
      <td>${p.leverage}x</td>
      <td>${Math.abs(p.positionAmt)}</td>
      <td>${round(p.entryPrice, 6)}</td>
      <td>${round(p.markPrice, 6)}</td>
      <td class="${cls(p.unRealizedProfit)}">${p.unRealizedProfit.toFixed(2)}</td>
      <td class="${cls(p.roe)}">${p.roe.toFixed(2)}</td>
    </tr>`
}

function summaryCards(summary: AccountSummary): string {
  const pnlClass = summary.totalPnl >= 0 ? 'positive' : 'negative'
  const sizeClass = summary.overexposed ? 'negative' : 'positive'
  return `<div class="grid">
      <div class="card"><div class="stat">${summary.futuresTotal.toFixed(2)} USDT</div><div class="label">Total Futures Balance · Last update: ${formatLocalDateTime(summary.updatedAt)}</div></div>
      <div class="card"><div class="stat ${pnlClass}">${signed(summary.totalPnl)} USDT (${signed(summary.pnlPct)}%)</div><div class="label">Unrealized PnL</div></div>
      <div class="card"><div class="stat ${sizeClass}">${summary.totalSize.toFixed(2)} USDT</div><div class="label ${sizeClass}">Used: ${summary.sizePct.toFixed(1)}% of the balance</div></div>
    </div>`
}

function positionsCard(positions: PositionView[]): string {
  const rows = positions.map(positionRow).join('')
  return `<div class="card">
      <h3 style="margin-bottom:1rem">Open Positions: ${positions.length}</h3>
      <table>
        <thead><tr><th>Symbol</th><th>Side</th><th>Size (USDT)</th><th>Leverage</th><th>Contracts</th><th>Entry</th><th>Mark</th><th>PNL</th><th>ROE (%)</th></tr></thead>
        <tbody>${rows || '<tr><td colspan="9" class="muted" style="text-align:center">No open positions</td></tr>'}</tbody>
      </table>
    </div>`
}

export function liveView(data: {
  summary: Result<AccountSummary, Error>
  history: Result<HistoryView, Error>
  periodDays: number | null
}): string {
  const account = data.summary.ok
    ? `${summaryCards(data.summary.value)}${positionsCard(data.summary.value.positions)}`
    : `<div class="card"><span class="badge badge-err">Error loading data</span> <span class="muted">${escHtml(data.summary.error.message)}</span></div>`
  return `${chartCard(data.history, data.periodDays)}
    ${account}`
}
