import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger } from '@ibhist/logger';
import { FileConflictResolver, parseConflictChoice, uniqueFilename } from '../src/index.js';
import type { ConflictInfo, ConflictPolicy } from '../src/index.js';

const logger = createLogger({ level: 'error', console: false });
const CLOCK = () => new Date(2025, 8, 4, 16, 30, 45);

function existing(...paths: string[]) {
  const taken = new Set(paths);
  return async (candidate: string) => taken.has(candidate);
}

function resolverFor(policy: ConflictPolicy, taken: string[]) {
  return new FileConflictResolver({
    policy,
    logger,
    exists: existing(...taken),
    createdAt: async () => new Date(2025, 0, 2, 8, 0, 0),
    clock: CLOCK,
  });
}

describe('FileConflictResolver', () => {
  it('should create when the path is free', async () => {
    const resolver = resolverFor({ kind: 'auto-cancel' }, []);
    expect(await resolver.resolve('SPY.csv', false)).toEqual({ path: 'SPY.csv', proceed: true, action: 'create' });
  });

  it('should overwrite when the flag is set, whatever the policy', async () => {
    const resolver = resolverFor({ kind: 'auto-cancel' }, ['SPY.csv']);
    expect(await resolver.resolve('SPY.csv', true)).toEqual({ path: 'SPY.csv', proceed: true, action: 'overwrite' });
  });

  it('should apply automatic policies', async () => {
    expect(await resolverFor({ kind: 'auto-overwrite' }, ['SPY.csv']).resolve('SPY.csv', false)).toEqual({
      path: 'SPY.csv',
      proceed: true,
      action: 'overwrite',
    });
    expect(await resolverFor({ kind: 'auto-cancel' }, ['SPY.csv']).resolve('SPY.csv', false)).toEqual({
      path: 'SPY.csv',
      proceed: false,
      action: 'cancel',
    });
  });

  it('should rename with a timestamp suffix', async () => {
    const resolver = resolverFor({ kind: 'auto-rename' }, ['out/SPY_STK_1Y_1d_OHLCV.csv']);

    expect(await resolver.resolve('out/SPY_STK_1Y_1d_OHLCV.csv', false)).toEqual({
      path: 'out/SPY_STK_1Y_1d_OHLCV_20250904_163045.csv',
      proceed: true,
      action: 'rename',
    });
  });

  it('should re-prompt until the answer is recognised', async () => {
    const answers = [' x ', 'maybe', ' r '];
    const prompt = vi.fn(async (_info: ConflictInfo, _attempt: number) => answers.shift() ?? 'c');
    const resolver = resolverFor({ kind: 'interactive', prompt }, ['SPY.csv']);

    const resolution = await resolver.resolve('SPY.csv', false);

    expect(resolution).toEqual({ path: 'SPY_20250904_163045.csv', proceed: true, action: 'rename' });
    expect(prompt).toHaveBeenCalledTimes(3);
    expect(prompt.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('should pass conflict details to the prompt', async () => {
    const prompt = vi.fn(async (_info: ConflictInfo, _attempt: number) => 'CANCEL');
    const resolver = resolverFor({ kind: 'interactive', prompt }, ['SPY.csv']);

    const resolution = await resolver.resolve('SPY.csv', false);

    expect(resolution.proceed).toBe(false);
    expect(prompt.mock.calls[0]?.[0]).toEqual({
      path: 'SPY.csv',
      absolutePath: path.resolve('SPY.csv'),
      createdAt: new Date(2025, 0, 2, 8, 0, 0),
    });
  });

  describe('on disk', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should detect real files and report their creation time', async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ibhist-conflict-'));
      const target = path.join(dir, 'SPY.csv');
      fs.writeFileSync(target, 'Date,Open,High,Low,Close,Volume\n');

      let seen: ConflictInfo | undefined;
      const resolver = new FileConflictResolver({
        policy: {
          kind: 'interactive',
          prompt: async (info) => {
            seen = info;
            return 'o';
          },
        },
        logger,
      });

      expect(await resolver.resolve(target, false)).toEqual({ path: target, proceed: true, action: 'overwrite' });
      expect(seen?.absolutePath).toBe(target);
      expect(seen?.createdAt).toBeInstanceOf(Date);
      expect(await resolver.resolve(path.join(dir, 'QQQ.csv'), false)).toEqual({
        path: path.join(dir, 'QQQ.csv'),
        proceed: true,
        action: 'create',
      });
    });
  });
});

describe('uniqueFilename', () => {
  const now = CLOCK();

  it('should return a free path unchanged', async () => {
    expect(await uniqueFilename('SPY.csv', existing(), now)).toBe('SPY.csv');
  });

  it('should count from 01 when the timestamped name is taken', async () => {
    const exists = existing('SPY.csv', 'SPY_20250904_163045.csv', 'SPY_20250904_163045_01.csv');
    expect(await uniqueFilename('SPY.csv', exists, now)).toBe('SPY_20250904_163045_02.csv');
  });

  it('should handle names without an extension', async () => {
    expect(await uniqueFilename('bars', existing('bars'), now)).toBe('bars_20250904_163045');
  });
});

describe('parseConflictChoice', () => {
  it.each([
    ['o', 'overwrite'],
    ['Overwrite', 'overwrite'],
    [' R ', 'rename'],
    ['rename', 'rename'],
    ['c', 'cancel'],
    ['CANCEL', 'cancel'],
  ])('should read %j as %s', (answer, choice) => {
    expect(parseConflictChoice(answer)).toBe(choice);
  });

  it('should reject anything else', () => {
    expect(parseConflictChoice('yes')).toBeNull();
    expect(parseConflictChoice('')).toBeNull();
  });
});
