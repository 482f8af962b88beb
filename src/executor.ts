import { ApplyError, errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { RetryPolicy } from './retry.js';
import type { Correction } from './types.js';

export type CorrectionStatus = 'reported' | 'applied' | 'failed';

export interface CorrectionResult {
  description: string;
  status: CorrectionStatus;
  error?: ApplyError;
}

export interface ExecuteOptions {
  retry: RetryPolicy;
  logger?: Logger;
}

/**
 * Run corrections strictly in order. A failed correction is recorded and
 * execution moves on; earlier corrections are not rolled back.
 */
export async function executeCorrections(
  corrections: readonly Correction[],
  options: ExecuteOptions
): Promise<CorrectionResult[]> {
  const log = options.logger ?? rootLogger;
  const results: CorrectionResult[] = [];

  for (const correction of corrections) {
    if (correction.isReportOnly) {
      log.warn({ notice: correction.description }, 'Skipped change');
      results.push({ description: correction.description, status: 'reported' });
      continue;
    }

    try {
      await options.retry.run(correction.action);
      log.info({ correction: correction.description }, 'Correction applied');
      results.push({ description: correction.description, status: 'applied' });
    } catch (err) {
      const error =
        err instanceof ApplyError
          ? err
          : new ApplyError(`Correction failed: ${errorMessage(err)}`, { cause: err });
      log.error({ correction: correction.description, err: error }, 'Correction failed');
      results.push({ description: correction.description, status: 'failed', error });
    }
  }

  return results;
}
