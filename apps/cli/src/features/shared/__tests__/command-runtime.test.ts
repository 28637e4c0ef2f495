import { ConfigError } from '@fxlake/core';
import { SnapshotIngester } from '@fxlake/ingestion';
import { err, ok } from 'neverthrow';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { CommandContext, runCommand } from '../command-runtime.js';

const { mockGetExchangeApiConfig } = vi.hoisted(() => ({
  mockGetExchangeApiConfig: vi.fn(),
}));

vi.mock('@fxlake/env', () => ({
  getDataDirectory: () => '/tmp/fxlake-test',
  getExchangeApiConfig: mockGetExchangeApiConfig,
  getPipelineVersion: () => '1.0.0',
}));

describe('CommandContext', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('resolves lake paths from the configured data directory', () => {
    const ctx = new CommandContext();

    expect(ctx.paths.rawSnapshot('2024-03-01')).toBe('/tmp/fxlake-test/raw/2024-03-01.json');
    expect(ctx.paths).toBe(ctx.paths);
  });

  it('reports a missing API key only when an ingester is requested', () => {
    mockGetExchangeApiConfig.mockReturnValue(err(new ConfigError('EXCHANGE_API_KEY is not set')));
    const ctx = new CommandContext();

    ctx.validationService();
    const ingester = ctx.snapshotIngester();

    expect(mockGetExchangeApiConfig).toHaveBeenCalledOnce();
    expect(ingester.isErr()).toBe(true);
  });

  it('builds an ingester and closes its client on dispose', async () => {
    mockGetExchangeApiConfig.mockReturnValue(ok({ apiKey: 'test-key', baseUrl: 'https://rates.example.com/v6' }));
    const ctx = new CommandContext();

    const ingester = ctx.snapshotIngester();

    expect(ingester._unsafeUnwrap()).toBeInstanceOf(SnapshotIngester);
    await expect(ctx.dispose()).resolves.toBeUndefined();
  });

  describe('dispose()', () => {
    it('runs cleanup functions in LIFO order, once', async () => {
      const order: number[] = [];
      const ctx = new CommandContext();
      ctx.onCleanup(async () => {
        order.push(1);
      });
      ctx.onCleanup(async () => {
        order.push(2);
      });

      await ctx.dispose();
      await ctx.dispose();

      expect(order).toEqual([2, 1]);
    });

    it('keeps running after a failure and rethrows it', async () => {
      const ctx = new CommandContext();
      const survivor = vi.fn().mockResolvedValue(undefined);
      ctx.onCleanup(survivor);
      ctx.onCleanup(() => Promise.reject(new Error('close failed')));

      await expect(ctx.dispose()).rejects.toThrow('close failed');
      expect(survivor).toHaveBeenCalledOnce();
    });

    it('aggregates several failures', async () => {
      const ctx = new CommandContext();
      ctx.onCleanup(() => Promise.reject(new Error('first')));
      ctx.onCleanup(() => Promise.reject(new Error('second')));

      await expect(ctx.dispose()).rejects.toThrow('Multiple cleanup failures');
    });
  });
});

describe('runCommand', () => {
  it('returns the body value after cleanup', async () => {
    const cleanup = vi.fn().mockResolvedValue(undefined);

    const value = await runCommand(async (ctx) => {
      ctx.onCleanup(cleanup);
      return 42;
    });

    expect(value).toBe(42);
    expect(cleanup).toHaveBeenCalledOnce();
  });

  it('prefers the body error over a cleanup error', async () => {
    await expect(
      runCommand(async (ctx) => {
        ctx.onCleanup(() => Promise.reject(new Error('cleanup failed')));
        throw new Error('body failed');
      })
    ).rejects.toThrow('body failed');
  });

  it('propagates a cleanup error when the body succeeded', async () => {
    await expect(
      runCommand(async (ctx) => {
        ctx.onCleanup(() => Promise.reject(new Error('cleanup failed')));
        return 'done';
      })
    ).rejects.toThrow('cleanup failed');
  });
});
