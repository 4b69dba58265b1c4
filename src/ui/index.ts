/**
 * UI module exports for the wordseal CLI
 */

// Theme system (icons, strength colors)
export * from './theme.js';

// Components
export * from './banner.js';
export * from './logger.js';
export * from './prompts.js';
export * from './spinner.js';
export * from './strength.js';
