/**
 * Design System for the wordseal CLI
 * Icons and strength colors
 */

import chalk from 'chalk';
import figures from 'figures';
import logSymbols from 'log-symbols';
import type { StrengthLabel } from '../lib/strength.js';

// ─────────────────────────────────────────────────────────────────────────────
// Icons (with automatic Unicode fallbacks via figures)
// ─────────────────────────────────────────────────────────────────────────────

export const icons = {
  // Status icons (colored, from log-symbols)
  warning: logSymbols.warning,
  info: logSymbols.info,

  lock: figures.squareSmallFilled,
};

// ─────────────────────────────────────────────────────────────────────────────
// Strength styling
// ─────────────────────────────────────────────────────────────────────────────

const strengthColors: Record<StrengthLabel, typeof chalk> = {
  'VERY WEAK': chalk.bold.red,
  Weak: chalk.red,
  Okay: chalk.yellow,
  Moderate: chalk.yellow,
  Strong: chalk.green,
  'VERY STRONG': chalk.bold.green,
};

export const colorStrength = (label: StrengthLabel): string => strengthColors[label](label);
