/**
 * @fileoverview Output file conflict resolution
 *
 * Decides what happens when the target file already exists: overwrite it,
 * write beside it under a timestamped name, or skip the write.
 */

import { access, stat } from 'node:fs/promises';
import path from 'node:path';
import moment from 'moment-timezone';
import type { Logger } from '@ibhist/logger';

export type ConflictAction = 'create' | 'overwrite' | 'rename' | 'cancel';

/**
 * Outcome of a conflict check. When `proceed` is false the caller must not write.
 */
export interface ConflictResolution {
  readonly path: string;
  readonly proceed: boolean;
  readonly action: ConflictAction;
}

/**
 * What the operator is shown about an existing file.
 */
export interface ConflictInfo {
  readonly path: string;
  readonly absolutePath: string;
  /** Null when the filesystem cannot report it. */
  readonly createdAt: Date | null;
}

/**
 * Asks the operator for a choice and returns the raw answer. `attempt` starts
 * at 1 and grows after each unrecognised answer.
 */
export type ConflictPrompt = (info: ConflictInfo, attempt: number) => Promise<string>;

export type ConflictPolicy =
  | { kind: 'auto-overwrite' }
  | { kind: 'auto-rename' }
  | { kind: 'auto-cancel' }
  | { kind: 'interactive'; prompt: ConflictPrompt };

export interface FileConflictResolverOptions {
  policy: ConflictPolicy;
  logger: Logger;
  exists?: (filePath: string) => Promise<boolean>;
  createdAt?: (filePath: string) => Promise<Date | null>;
  clock?: () => Date;
}

type Choice = Exclude<ConflictAction, 'create'>;

const CHOICES: Record<string, Choice> = {
  O: 'overwrite',
  OVERWRITE: 'overwrite',
  R: 'rename',
  RENAME: 'rename',
  C: 'cancel',
  CANCEL: 'cancel',
};

/**
 * Maps an answer to a choice; case-insensitive, surrounding whitespace ignored.
 */
export function parseConflictChoice(answer: string): Choice | null {
  return CHOICES[answer.trim().toUpperCase()] ?? null;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function fileCreatedAt(filePath: string): Promise<Date | null> {
  try {
    const stats = await stat(filePath);
    return stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
  } catch {
    return null;
  }
}

/**
 * First free name of the form `<stem>_YYYYMMDD_HHmmss<ext>`, then
 * `<stem>_YYYYMMDD_HHmmss_NN<ext>` counting from 01. Returns `filePath`
 * unchanged when it is free.
 *
 * @example
 * ```typescript
 * await uniqueFilename('SPY_STK_1Y_1d_OHLCV.csv', fileExists, new Date(2025, 8, 4, 16, 30, 45));
 * // 'SPY_STK_1Y_1d_OHLCV_20250904_163045.csv'
 * ```
 */
export async function uniqueFilename(
  filePath: string,
  exists: (candidate: string) => Promise<boolean>,
  now: Date
): Promise<string> {
  if (!(await exists(filePath))) {
    return filePath;
  }

  const ext = path.extname(filePath);
  const stem = filePath.slice(0, filePath.length - ext.length);
  const stamp = moment(now).format('YYYYMMDD_HHmmss');

  let candidate = `${stem}_${stamp}${ext}`;
  let counter = 1;
  while (await exists(candidate)) {
    candidate = `${stem}_${stamp}_${String(counter).padStart(2, '0')}${ext}`;
    counter += 1;
  }
  return candidate;
}

/**
 * Resolves output path conflicts according to a policy.
 *
 * @example
 * ```typescript
 * const resolver = new FileConflictResolver({ policy: { kind: 'auto-rename' }, logger });
 * const { path, proceed } = await resolver.resolve('SPY_STK_1Y_1d_OHLCV.csv', false);
 * ```
 */
export class FileConflictResolver {
  private readonly policy: ConflictPolicy;
  private readonly logger: Logger;
  private readonly exists: (filePath: string) => Promise<boolean>;
  private readonly createdAt: (filePath: string) => Promise<Date | null>;
  private readonly clock: () => Date;

  constructor(options: FileConflictResolverOptions) {
    this.policy = options.policy;
    this.logger = options.logger;
    this.exists = options.exists ?? fileExists;
    this.createdAt = options.createdAt ?? fileCreatedAt;
    this.clock = options.clock ?? (() => new Date());
  }

  async resolve(filePath: string, overwrite: boolean): Promise<ConflictResolution> {
    if (!(await this.exists(filePath))) {
      return { path: filePath, proceed: true, action: 'create' };
    }

    if (overwrite) {
      this.logger.info('Overwriting existing file', { path: filePath, reason: 'overwrite flag' });
      return { path: filePath, proceed: true, action: 'overwrite' };
    }

    const choice = await this.choose(filePath);
    this.logger.info('File conflict resolved', { path: filePath, action: choice, policy: this.policy.kind });

    switch (choice) {
      case 'overwrite':
        return { path: filePath, proceed: true, action: 'overwrite' };
      case 'rename': {
        const renamed = await uniqueFilename(filePath, this.exists, this.clock());
        return { path: renamed, proceed: true, action: 'rename' };
      }
      case 'cancel':
        return { path: filePath, proceed: false, action: 'cancel' };
    }
  }

  private async choose(filePath: string): Promise<Choice> {
    switch (this.policy.kind) {
      case 'auto-overwrite':
        return 'overwrite';
      case 'auto-rename':
        return 'rename';
      case 'auto-cancel':
        return 'cancel';
      case 'interactive':
        return this.ask(filePath, this.policy.prompt);
    }
  }

  private async ask(filePath: string, prompt: ConflictPrompt): Promise<Choice> {
    const info: ConflictInfo = {
      path: filePath,
      absolutePath: path.resolve(filePath),
      createdAt: await this.createdAt(filePath),
    };

    for (let attempt = 1; ; attempt += 1) {
      const answer = await prompt(info, attempt);
      const choice = parseConflictChoice(answer);
      if (choice !== null) {
        return choice;
      }
      this.logger.debug('Unrecognised conflict answer', { answer, attempt });
    }
  }
}
