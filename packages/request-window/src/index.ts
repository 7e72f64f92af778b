/**
 * @fileoverview Public API for @ibhist/request-window
 */

export { resolveRequestWindow, inclusiveDays } from './resolver.js';
export type { ResolveWindowInput } from './resolver.js';

export { parseDateInput, localCalendarDate } from './date-input.js';
export type { DateInput } from './date-input.js';

export { anchorEndTimestamp, END_TIMESTAMP_FORMAT } from './session-anchor.js';

export { classifyTimeframe, availabilityWarnings, noDataDiagnostics } from './classifier.js';
export type { TimeframeClassification } from './classifier.js';

export { buildRequestEnvelope } from './envelope.js';
