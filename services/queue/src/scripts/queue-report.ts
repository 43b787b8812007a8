import type { ResetResult } from '../services/queue-engine.service.js';
import type { QueueListItem, QueuePreview } from '../services/queue-view.service.js';
import type { QueueTier } from '../services/work-order.types.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(70);
const ROWS_PER_TIER = 20;
const MAX_VIOLATIONS = 10;

const TIER_TITLES: Record<QueueTier, string> = {
  firm_rush: 'FIRM RUSH (by date required)',
  rush: 'RUSH (FIFO by date in)',
  regular: 'REGULAR (FIFO by date in)',
};

function formatRow(item: QueueListItem): string {
  const position = item.position === null ? 'NULL' : String(item.position);
  const name = (item.woName ?? '').slice(0, 30);
  return `  Pos ${position.padStart(4)} | ${item.workOrderNo.padEnd(10)} | ${(item.dateIn ?? '-').padEnd(12)} | ${name}`;
}

export function formatPreviewReport(preview: QueuePreview): string[] {
  const total = preview.tiers.firm_rush.length + preview.tiers.rush.length + preview.tiers.regular.length;
  const lines = [RULE, `CURRENT QUEUE STATE (${total} orders, ${preview.unranked} unranked)`, RULE];

  for (const tier of ['firm_rush', 'rush', 'regular'] as const) {
    const items = preview.tiers[tier];
    lines.push('', `${TIER_TITLES[tier]} (${items.length} orders):`, THIN_RULE);
    if (items.length === 0) {
      lines.push('  (none)');
      continue;
    }
    lines.push(...items.slice(0, ROWS_PER_TIER).map(formatRow));
    if (items.length > ROWS_PER_TIER) {
      lines.push(`  ... and ${items.length - ROWS_PER_TIER} more`);
    }
  }

  lines.push('', RULE, 'FIFO VIOLATIONS (orders out of date-in order):', THIN_RULE);
  if (preview.fifoViolations.length === 0) {
    lines.push('  No FIFO violations found!');
  } else {
    for (const violation of preview.fifoViolations.slice(0, MAX_VIOLATIONS)) {
      lines.push(
        `  ${violation.earlier.workOrderNo} (date in ${violation.earlier.dateIn}, pos ${violation.earlier.position})`,
        '    is BEFORE',
        `  ${violation.later.workOrderNo} (date in ${violation.later.dateIn}, pos ${violation.later.position})`
      );
    }
    if (preview.fifoViolations.length > MAX_VIOLATIONS) {
      lines.push(`  ... and ${preview.fifoViolations.length - MAX_VIOLATIONS} more violations`);
    }
  }

  return lines;
}

export function formatResetFailure(result: ResetResult): string[] {
  return [`ERROR: ${result.message}`];
}

/** Counts come from the preview, which never writes. */
export function formatResetReport(result: ResetResult, preview: QueuePreview): string[] {
  const counts = {
    firm_rush: preview.tiers.firm_rush.length,
    rush: preview.tiers.rush.length,
    regular: preview.tiers.regular.length,
  };

  return [
    result.message,
    '',
    'Queue summary:',
    `  Firm Rush: ${counts.firm_rush}`,
    `  Rush: ${counts.rush}`,
    `  Regular: ${counts.regular}`,
    `  Total: ${counts.firm_rush + counts.rush + counts.regular}`,
  ];
}
