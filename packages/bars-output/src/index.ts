/**
 * @fileoverview Public API for @ibhist/bars-output
 */

export {
  targetZone,
  zoneAbbreviation,
  dateColumnName,
  parseProviderTimestamp,
  formatRows,
  TIMEZONE_SELECTORS,
} from './timezone.js';
export type { TimezoneSelector, ParsedTimestamp, FormattedRows } from './timezone.js';

export { generateFilename } from './filename.js';
export type { FilenameParts } from './filename.js';

export { FileConflictResolver, uniqueFilename, fileExists, parseConflictChoice } from './conflict.js';
export type {
  ConflictAction,
  ConflictResolution,
  ConflictInfo,
  ConflictPrompt,
  ConflictPolicy,
  FileConflictResolverOptions,
} from './conflict.js';

export { writeBarsCsv, renderBarsCsv, PERMISSION_GUIDANCE, VALUE_COLUMNS } from './csv-writer.js';
