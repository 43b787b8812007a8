import type { CleaningQueueEngine } from '../services/queue-engine.service.js';
import type { CleaningQueueView } from '../services/queue-view.service.js';
import { formatPreviewReport, formatResetFailure, formatResetReport } from './queue-report.js';

export interface ResetCommandDeps {
  engine: CleaningQueueEngine;
  view: CleaningQueueView;
  out?: Pick<Console, 'log' | 'error'>;
}

/**
 * `--preview` prints the current state and changes nothing; otherwise the
 * queue is reset (`--force` skips the already-in-order check). Resolves to
 * false when the reset failed.
 */
export async function runResetCommand(argv: string[], deps: ResetCommandDeps): Promise<boolean> {
  const out = deps.out ?? console;

  if (argv.includes('--preview')) {
    out.log(formatPreviewReport(await deps.view.previewQueue()).join('\n'));
    return true;
  }

  const result = await deps.engine.reset(argv.includes('--force'));
  if (!result.success) {
    out.error(formatResetFailure(result).join('\n'));
    return false;
  }

  out.log(formatResetReport(result, await deps.view.previewQueue()).join('\n'));
  return true;
}
