import type { StrengthReport } from '../lib/strength.js';
import { logger } from './logger.js';
import { colorStrength } from './theme.js';

export const STRENGTH_DISCLAIMER = 'Note: this is only an estimate, not a guarantee.';

/**
 * One-line summary, e.g. "Estimated strength: Weak (~37.6 bits, score 25/100)"
 */
export const formatStrength = (report: StrengthReport, label: string = report.label): string => {
  return `Estimated strength: ${label} (~${report.bits.toFixed(1)} bits, score ${report.score}/100)`;
};

export const printStrength = (report: StrengthReport): void => {
  logger.info(formatStrength(report, colorStrength(report.label)));
  logger.dim(STRENGTH_DISCLAIMER);
};
