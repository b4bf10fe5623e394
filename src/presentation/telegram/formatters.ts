import { RegimeChange } from '../../domain/entities/regime-change.entity';
import { ExtremeMove, ExtremeMoveSettings } from '../../domain/types/extreme-move.type';
import { CORRELATION_STRENGTH_LABELS } from '../../domain/types/indicator.type';
import { MarketRegime, RegimeAlert, RegimeTrackerState } from '../../domain/types/market-regime.type';
import { RegimeOverview } from '../../application/use-cases/get-regime-overview.use-case';
import { IMPLICATION_DESCRIPTIONS, INDICATOR_PROFILES } from '../../modules/signal-engine/classifiers/indicator-profiles';

const REGIME_EMOJI: Record<MarketRegime, string> = {
  [MarketRegime.RISK_ON]: '🟢',
  [MarketRegime.RISK_OFF]: '🔴',
  [MarketRegime.MIXED]: '🟡',
  [MarketRegime.NO_DATA]: '⚪',
};

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** `2026-03-02 08:00 UTC` */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function formatSigned(value: number | undefined, digits: number, suffix = ''): string {
  if (value === undefined || !Number.isFinite(value)) return '—';
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}${suffix}`;
}

export function formatRegimeAlert(alert: RegimeAlert): string {
  return `
${REGIME_EMOJI[alert.to]} <b>${escapeHtml(alert.title)}</b>
${alert.from} → <b>${alert.to}</b>

${escapeHtml(alert.body)}

⏰ ${formatTimestamp(alert.changedAt)}
  `.trim();
}

export function formatNotificationState(state: RegimeTrackerState): string {
  return state.notificationsEnabled
    ? '🔔 Regime change alerts are <b>on</b>.'
    : '🔕 Regime change alerts are <b>off</b>.';
}

export function formatRegimeOverview(overview: RegimeOverview): string {
  const { readings, correlations } = overview;
  const lines = [
    `${REGIME_EMOJI[overview.regime]} <b>Market Regime: ${overview.regime}</b>`,
    `<i>${escapeHtml(overview.description)}</i>`,
    '',
    `📉 VIX: <b>${readings.vixLevel?.toFixed(2) ?? '—'}</b> (${CORRELATION_STRENGTH_LABELS[correlations.vix]})`,
    `💵 DXY 30d: <b>${formatSigned(readings.dxyChangePercent, 2, '%')}</b> (${CORRELATION_STRENGTH_LABELS[correlations.dxy]})`,
    `🏦 M2 1m: <b>${formatSigned(readings.m2MonthlyChangePercent, 2, '%')}</b> (${CORRELATION_STRENGTH_LABELS[correlations.m2]})`,
  ];

  const notable = overview.annotations.filter((a) => a.tier !== 'normal');
  if (notable.length > 0) {
    lines.push('');
    for (const annotation of notable) {
      const rarity = annotation.rarity !== null ? `, ~1 in ${annotation.rarity}` : '';
      lines.push(
        `⚠️ ${INDICATOR_PROFILES[annotation.indicator].displayName} ${annotation.sigmaLabel} (${annotation.tier}${rarity}): ` +
          `${IMPLICATION_DESCRIPTIONS[annotation.implication]}`,
      );
    }
  }

  lines.push('', `💡 ${escapeHtml(overview.insight)}`);
  if (overview.staleIndicators.length > 0) {
    lines.push(`<i>Stale data: ${overview.staleIndicators.join(', ')}</i>`);
  }
  lines.push(`⏰ ${formatTimestamp(overview.capturedAt)}`);
  return lines.join('\n');
}

export function formatRegimeHistory(changes: readonly RegimeChange[]): string {
  if (changes.length === 0) {
    return '📜 No regime changes recorded yet.';
  }

  const rows = changes.map(
    (change) =>
      `${REGIME_EMOJI[change.toRegime]} ${formatTimestamp(change.changedAt)}: ${change.fromRegime} → <b>${change.toRegime}</b>` +
      (change.notified ? '' : ' <i>(silent)</i>'),
  );
  return ['📜 <b>Recent regime changes</b>', '', ...rows].join('\n');
}

export function formatExtremeMove(move: ExtremeMove): string {
  return `
${move.severity === 'extreme' ? '🚨' : '⚠️'} <b>${escapeHtml(move.title)}</b>
${escapeHtml(move.body)}

<i>${escapeHtml(move.interpretation)}</i>

⏰ ${formatTimestamp(move.detectedAt)}
  `.trim();
}

export function formatExtremeMoveHistory(
  moves: readonly ExtremeMove[],
  settings: ExtremeMoveSettings,
): string {
  const status =
    `Extreme alerts: <b>${settings.extremeEnabled ? 'on' : 'off'}</b>, ` +
    `significant alerts: <b>${settings.significantEnabled ? 'on' : 'off'}</b>`;
  if (moves.length === 0) {
    return ['📈 No extreme moves recorded yet.', status].join('\n');
  }

  const rows = moves.map(
    (move) =>
      `${move.severity === 'extreme' ? '🚨' : '⚠️'} ${formatTimestamp(move.detectedAt)}: ${escapeHtml(move.title)}`,
  );
  return ['📈 <b>Recent extreme moves</b>', status, '', ...rows].join('\n');
}
