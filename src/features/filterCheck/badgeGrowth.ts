/**
 * Badge growth chart
 *
 * Cumulative badge count over time, drawn as a step chart. Farmed or bought accounts
 * show up as a cliff: hundreds of badges inside a few days.
 *
 * The chart is an SVG document rasterized with sharp, so no native canvas install
 * is needed.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import sharp from "sharp";
import type { Badge, BadgeSeriesPoint } from "./types.js";

// ============================================================================
// Series
// ============================================================================

/**
 * Badges earned after account creation, oldest first, as running totals starting
 * from (accountCreated, 0). Null when nothing is left after filtering.
 */
export function buildBadgeSeries(
  badges: readonly Badge[],
  accountCreated: Date
): BadgeSeriesPoint[] | null {
  const valid = badges
    .filter((b) => b.createdAt.getTime() > accountCreated.getTime())
    .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

  if (valid.length === 0) return null;

  return [
    { date: accountCreated, count: 0 },
    ...valid.map((b, i) => ({ date: b.createdAt, count: i + 1 })),
  ];
}

// ============================================================================
// Rendering
// ============================================================================

const CHART = {
  width: 1000,
  height: 500,
  marginLeft: 70,
  marginRight: 30,
  marginTop: 50,
  marginBottom: 90,
  xTicks: 6,
  yTicks: 5,
  line: "#2e7d32",
  axis: "#333333",
  grid: "#e0e0e0",
  font: "DejaVu Sans, Arial, sans-serif",
} as const;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * SVG markup for the step chart. Exposed separately from the PNG step for tests.
 */
export function badgeChartSvg(series: readonly BadgeSeriesPoint[], title: string): string {
  const plotW = CHART.width - CHART.marginLeft - CHART.marginRight;
  const plotH = CHART.height - CHART.marginTop - CHART.marginBottom;

  const first = series[0];
  const last = series[series.length - 1];
  const t0 = first ? first.date.getTime() : 0;
  const t1 = last ? last.date.getTime() : 1;
  const span = Math.max(t1 - t0, 1);
  const maxCount = Math.max(last?.count ?? 0, 1);

  const x = (t: number) => CHART.marginLeft + ((t - t0) / span) * plotW;
  const y = (n: number) => CHART.marginTop + plotH - (n / maxCount) * plotH;
  const fmt = (n: number) => n.toFixed(1);

  // where="post": the count holds until the next badge, then jumps
  let path = "";
  series.forEach((point, i) => {
    const px = fmt(x(point.date.getTime()));
    const py = fmt(y(point.count));
    path += i === 0 ? `M${px},${py}` : ` H${px} V${py}`;
  });

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CHART.width}" height="${CHART.height}" viewBox="0 0 ${CHART.width} ${CHART.height}">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<text x="${CHART.width / 2}" y="30" text-anchor="middle" font-family="${CHART.font}" font-size="18">${escapeXml(title)}</text>`
  );

  for (let i = 0; i <= CHART.yTicks; i++) {
    const value = Math.round((maxCount * i) / CHART.yTicks);
    const py = fmt(y(value));
    parts.push(
      `<line x1="${CHART.marginLeft}" y1="${py}" x2="${CHART.width - CHART.marginRight}" y2="${py}" stroke="${CHART.grid}"/>`,
      `<text x="${CHART.marginLeft - 8}" y="${py}" text-anchor="end" dominant-baseline="middle" font-family="${CHART.font}" font-size="12">${value}</text>`
    );
  }

  for (let i = 0; i <= CHART.xTicks; i++) {
    const t = t0 + (span * i) / CHART.xTicks;
    const px = fmt(x(t));
    const py = CHART.marginTop + plotH + 14;
    parts.push(
      `<text x="${px}" y="${py}" text-anchor="end" transform="rotate(-45 ${px} ${py})" font-family="${CHART.font}" font-size="12">${isoDay(new Date(t))}</text>`
    );
  }

  parts.push(
    `<line x1="${CHART.marginLeft}" y1="${CHART.marginTop}" x2="${CHART.marginLeft}" y2="${CHART.marginTop + plotH}" stroke="${CHART.axis}"/>`,
    `<line x1="${CHART.marginLeft}" y1="${CHART.marginTop + plotH}" x2="${CHART.width - CHART.marginRight}" y2="${CHART.marginTop + plotH}" stroke="${CHART.axis}"/>`,
    `<path d="${path}" fill="none" stroke="${CHART.line}" stroke-width="2"/>`,
    `<text x="${CHART.width / 2}" y="${CHART.height - 8}" text-anchor="middle" font-family="${CHART.font}" font-size="14">Date</text>`,
    `<text x="18" y="${CHART.marginTop + plotH / 2}" text-anchor="middle" transform="rotate(-90 18 ${CHART.marginTop + plotH / 2})" font-family="${CHART.font}" font-size="14">Cumulative Badges</text>`,
    `</svg>`
  );

  return parts.join("\n");
}

export async function renderBadgeChart(
  series: readonly BadgeSeriesPoint[],
  username: string,
  userId: number
): Promise<Buffer> {
  const svg = badgeChartSvg(series, `${username} (${userId}) Badge Growth`);
  return sharp(Buffer.from(svg)).png().toBuffer();
}
