/**
 * UI module exports for the manpage CLI
 */

// Theme system (output config, colors, icons)
export * from './theme.js';

// Components
export * from './banner.js';
export * from './logger.js';
export * from './spinner.js';
