/**
 * ADVISORY RENDERER
 * =================
 *
 * The only place report data becomes display text. Two targets:
 *   - plain text (API, logs)
 *   - Telegram HTML (parse_mode=HTML, 4096 character message limit)
 */

import { valueOf } from '../../common/reading.js';
import {
  actionText,
  altseasonText,
  biasText,
  phaseText,
  riskText,
  signalText,
  technicalText,
} from './advisory.labels.js';
import type { AdvisoryReport, AdvisorySection, ReportSummary } from './advisory.types.js';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

// ═══════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════

const usd = (n: number): string => `$${n.toFixed(2)}`;
const pct = (n: number): string => `${n.toFixed(1)}%`;
const signed = (n: number): string => (n > 0 ? `+${n}` : String(n));

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function summaryLine(s: ReportSummary): string {
  const risk = s.riskScore !== null && s.riskCategory !== null
    ? `${s.riskScore}/100 (${riskText(s.riskCategory)})`
    : 'n/a';
  const phase = s.phase !== null ? phaseText(s.phase) : 'n/a';
  const alt = s.altseason !== null ? altseasonText(s.altseason) : 'n/a';
  return `Risk: ${risk} | Phase: ${phase} | Altseason: ${alt}`;
}

/** Fact lines for one section; empty when the section has nothing to show. */
export function sectionFacts(section: AdvisorySection): string[] {
  switch (section.kind) {
    case 'PORTFOLIO': {
      const a = section.analysis;
      if (!a) return [];
      const goal = valueOf(a.goalCost);
      const achieved = valueOf(a.achievementPct);
      const lines = [`alts ${usd(a.altcoinValue)} of goal ${goal !== undefined ? usd(goal) : 'n/a'}`];
      if (achieved !== undefined) lines.push(`achievement ${pct(achieved)}`);
      return lines;
    }
    case 'MARKET_PHASE': {
      const p = section.analysis;
      return p ? [`phase ${phaseText(p.phase)} (rule ${p.rule})`] : [];
    }
    case 'CYCLE_TOP_RISK': {
      const r = section.analysis;
      if (!r) return [];
      const lines = [`score ${r.score}/100 (${riskText(r.category)})`];
      if (r.delta !== null) lines.push(`change ${signed(r.delta)} since last cycle`);
      for (const c of r.contributions) lines.push(`${c.factor} ${signed(c.points)}`);
      return lines;
    }
    case 'ALTSEASON': {
      const a = section.analysis;
      return a ? [`score ${a.score.toFixed(0)}/100 (${altseasonText(a.state)})`] : [];
    }
    case 'BTC_ETH_RATIO': {
      const g = section.analysis;
      if (!g) return [];
      return [`ETH/BTC ${g.ratio.toFixed(5)} (${g.position.toLowerCase()})`, ...g.signals.map(signalText)];
    }
    case 'EXIT': {
      const e = section.analysis;
      const lines: string[] = [];
      if (e) {
        lines.push(`P&L ${e.pnlPct !== null ? pct(e.pnlPct) : 'n/a'}, local score ${e.localScore}`);
        if (e.suppressedByLoss) lines.push('held back: position is at a loss');
      }
      const t = valueOf(section.technicals);
      if (t && t.signals.length > 0) {
        lines.push(`signals ${biasText(t.bias)}: ${t.signals.map(technicalText).join(', ')}`);
      }
      return lines;
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// PLAIN TEXT
// ═══════════════════════════════════════════════════════════════

export function renderReportText(report: AdvisoryReport): string {
  const lines: string[] = [`Cycle Advisor ${report.asOf}`, summaryLine(report.summary), ''];

  for (const section of report.sections) {
    lines.push(`[${section.title}] ${actionText(section.action)}`);
    for (const fact of sectionFacts(section)) lines.push(`  ${fact}`);
    for (const note of section.notes) lines.push(`  ! ${note}`);
  }

  if (report.droppedAssets.length > 0) {
    lines.push('', 'Dropped assets:');
    for (const d of report.droppedAssets) lines.push(`  ${d.assetId} (${d.code}): ${d.message}`);
  }

  return lines.join('\n');
}

// ═══════════════════════════════════════════════════════════════
// TELEGRAM HTML
// ═══════════════════════════════════════════════════════════════

export function renderReportTelegramHtml(report: AdvisoryReport, limit = TELEGRAM_MESSAGE_LIMIT): string {
  const lines: string[] = [
    `<b>Cycle Advisor</b> <i>${escapeHtml(report.asOf)}</i>`,
    escapeHtml(summaryLine(report.summary)),
    '',
  ];

  for (const section of report.sections) {
    lines.push(`<b>${escapeHtml(section.title)}</b>: ${escapeHtml(actionText(section.action))}`);
    for (const fact of sectionFacts(section)) lines.push(`• ${escapeHtml(fact)}`);
    for (const note of section.notes) lines.push(`<i>${escapeHtml(note)}</i>`);
  }

  if (report.droppedAssets.length > 0) {
    lines.push('', '<b>Dropped</b>: ' + escapeHtml(report.droppedAssets.map((d) => d.assetId).join(', ')));
  }

  return truncateLines(lines, limit);
}

/** Drops whole trailing lines so tags are never cut in half. */
function truncateLines(lines: string[], limit: number): string {
  const full = lines.join('\n');
  if (full.length <= limit) return full;

  const marker = '…';
  const kept: string[] = [];
  let length = marker.length;
  for (const line of lines) {
    const added = line.length + 1;
    if (length + added > limit) break;
    kept.push(line);
    length += added;
  }
  kept.push(marker);
  return kept.join('\n');
}
