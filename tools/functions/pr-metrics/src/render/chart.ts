import moment from 'moment';

import { rollingMedian, type DailyStat } from '../stats';

export const CHART_DAYS = 30;

const WIDTH = 900;
const HEIGHT = 420;
const MARGIN = 60;
const GRID_LINES = 5;
const LABEL_EVERY = 3;

export const EMPTY_CHART = `<svg width="600" height="300" xmlns="http://www.w3.org/2000/svg">
  <text x="300" y="150" text-anchor="middle" font-family="Arial" font-size="16">No data available yet</text>
</svg>`;

const STYLE = [
  '<style>',
  '.axis{stroke:#666;stroke-width:1}',
  '.grid{stroke:#eee;stroke-width:.5}',
  '.p50-line{stroke:#2196F3;stroke-width:1;fill:none;opacity:0.5}',
  '.p90-line{stroke:#FF9800;stroke-width:1;fill:none;opacity:0.5}',
  '.p50-roll{stroke:#0D47A1;stroke-width:2;fill:none}',
  '.p90-roll{stroke:#E65100;stroke-width:2;fill:none}',
  '.text{font-family:Arial,sans-serif;font-size:12px;fill:#333}',
  '.legend{font-family:Arial,sans-serif;font-size:11px}',
  '</style>',
];

const LEGEND: Array<[string, string]> = [
  ['p50-line', 'P50 daily'],
  ['p50-roll', 'P50 7d median'],
  ['p90-line', 'P90 daily'],
  ['p90-roll', 'P90 7d median'],
];

function coord(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Line chart of the last `CHART_DAYS` days: daily P50/P90 as thin lines, their rolling medians bold.
 */
export function renderLeadTimeChart(dailyStats: DailyStat[]): string {
  if (dailyStats.length === 0) {
    return EMPTY_CHART;
  }

  const recent = dailyStats.slice(-CHART_DAYS);
  const maxHours = Math.max(1, ...recent.map((stat) => Math.max(stat.p50Hours, stat.p90Hours)));
  const xScale = (WIDTH - 2 * MARGIN) / Math.max(1, recent.length - 1);
  const yScale = (HEIGHT - 2 * MARGIN) / maxHours;
  const x = (idx: number) => MARGIN + idx * xScale;
  const y = (hours: number) => HEIGHT - MARGIN - hours * yScale;

  const svg = [
    `<svg width="${WIDTH}" height="${HEIGHT}" xmlns="http://www.w3.org/2000/svg">`,
    ...STYLE,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="white"/>`,
  ];

  for (let i = 0; i < GRID_LINES; i++) {
    const gridY = coord(MARGIN + (i * (HEIGHT - 2 * MARGIN)) / (GRID_LINES - 1));
    svg.push(`<line x1="${MARGIN}" y1="${gridY}" x2="${WIDTH - MARGIN}" y2="${gridY}" class="grid"/>`);
  }

  svg.push(`<line x1="${MARGIN}" y1="${MARGIN}" x2="${MARGIN}" y2="${HEIGHT - MARGIN}" class="axis"/>`);
  svg.push(`<line x1="${MARGIN}" y1="${HEIGHT - MARGIN}" x2="${WIDTH - MARGIN}" y2="${HEIGHT - MARGIN}" class="axis"/>`);

  for (let i = 0; i < GRID_LINES; i++) {
    const value = (i * maxHours) / (GRID_LINES - 1);
    svg.push(
      `<text x="${MARGIN - 10}" y="${coord(y(value) + 4)}" text-anchor="end" class="text">${value.toFixed(0)}h</text>`,
    );
  }

  const p50 = recent.map((stat) => stat.p50Hours);
  const p90 = recent.map((stat) => stat.p90Hours);
  const series: Array<[number[], string]> = [
    [p50, 'p50-line'],
    [p90, 'p90-line'],
    [rollingMedian(p50), 'p50-roll'],
    [rollingMedian(p90), 'p90-roll'],
  ];
  for (const [values, cls] of series) {
    const points = values.map((value, idx) => `${coord(x(idx))},${coord(y(value))}`).join(' ');
    svg.push(`<polyline points="${points}" class="${cls}"/>`);
  }

  svg.push(`<rect x="${WIDTH - 180}" y="20" width="160" height="90" fill="white" stroke="#ccc"/>`);
  LEGEND.forEach(([cls, label], idx) => {
    const lineY = 35 + idx * 20;
    svg.push(`<line x1="${WIDTH - 170}" y1="${lineY}" x2="${WIDTH - 150}" y2="${lineY}" class="${cls}"/>`);
    svg.push(`<text x="${WIDTH - 145}" y="${lineY + 4}" class="legend">${label}</text>`);
  });

  svg.push(
    `<text x="${WIDTH / 2}" y="25" text-anchor="middle" font-family="Arial" font-size="14" font-weight="bold">PR Lead Time (Daily + 7d median)</text>`,
  );

  recent.forEach((stat, idx) => {
    if (idx % LABEL_EVERY === 0) {
      const label = moment.utc(stat.day).format('MM/DD');
      svg.push(`<text x="${coord(x(idx))}" y="${HEIGHT - MARGIN + 18}" text-anchor="middle" class="text">${label}</text>`);
    }
  });

  svg.push('</svg>');
  return svg.join('\n');
}
