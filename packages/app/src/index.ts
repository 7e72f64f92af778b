/**
 * Main exports for @ibhist/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export type { Config } from './config/schema.js';

// Pipeline exports
export { runDownload } from './pipeline/download.js';
export type { DownloadOptions, DownloadDeps, DownloadOutcome } from './pipeline/download.js';

// Provider exports
export { FixtureProvider, SAMPLE_FIXTURE } from './providers/fixture-provider.js';
export type { FixtureProviderConfig } from './providers/fixture-provider.js';

// CLI exports
export { buildProgram, mergeOptions, conflictPolicy, main, CONFLICT_CHOICES } from './cli/program.js';
export type { CliOptions, ConflictChoice } from './cli/program.js';
export { createConsolePrompt } from './cli/prompt.js';
export { printBanner, printOutcome, printError } from './cli/reporter.js';
