/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { checkCommand, checkAction, type CheckOptions } from './check.js';
export { reportCommand, reportAction, type ReportOptions } from './report.js';
export { sizesCommand, sizesAction, type SizesOptions } from './sizes.js';
