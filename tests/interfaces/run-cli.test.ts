import { describe, it, expect, vi } from 'vitest';
import { USAGE, runCli, type CliDeps } from '../../src/interfaces/cli/run-cli.js';
import type { AppContext } from '../../src/context.js';
import { captureOutput, fakeMarket, testContext } from '../helpers.js';

async function harness() {
  const context = await testContext();
  const { out, lines, errors } = captureOutput();
  const deps = {
    createContext: vi.fn(async () => context.ctx),
    serve: vi.fn(async (_ctx: AppContext) => {}),
    out,
  } satisfies CliDeps;
  return { ...context, deps, lines, errors };
}

describe('runCli', () => {
  // --- usage ---

  it('prints usage and exits 2 without a command', async () => {
    const { deps, lines } = await harness();

    expect(await runCli([], deps)).toBe(2);
    expect(lines).toEqual([USAGE]);
    expect(deps.createContext).not.toHaveBeenCalled();
  });

  it('prints usage and exits 0 for --help', async () => {
    const { deps, lines } = await harness();

    expect(await runCli(['--help'], deps)).toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it('rejects an unknown command before building a context', async () => {
    const { deps, errors } = await harness();

    expect(await runCli(['launch-rocket'], deps)).toBe(2);
    expect(errors[0]).toBe('Unknown command: launch-rocket');
    expect(deps.createContext).not.toHaveBeenCalled();
  });

  it('rejects an unknown option', async () => {
    const { deps } = await harness();

    expect(await runCli(['get-all-markets', '--bogus'], deps)).toBe(2);
  });

  // --- dispatch ---

  it('runs a command with its options and closes the context', async () => {
    const { deps, feed, ctx } = await harness();
    feed.getTrendingMarkets.mockResolvedValue([fakeMarket('hot')]);

    expect(await runCli(['get-trending-markets', '--limit', '3'], deps)).toBe(0);
    expect(feed.getTrendingMarkets).toHaveBeenCalledWith(3);
    expect(await ctx.audit.isStoreConnected()).toBe(false);
  });

  it('applies default limits', async () => {
    const { deps, feed, driver } = await harness();
    feed.getAllMarkets.mockResolvedValue([]);

    await runCli(['get-all-markets'], deps);

    const [command] = await driver.find('cli_history', {}, {});
    expect(command).toMatchObject({ parameters: { limit: 5, sort_by: 'spread' } });
  });

  it('joins positional keywords for the news search', async () => {
    const { deps, news } = await harness();
    news.getArticles.mockResolvedValue([]);

    expect(await runCli(['get-relevant-news', 'rate', 'cut'], deps)).toBe(0);
    expect(news.getArticles).toHaveBeenCalledWith('rate cut');
  });

  it('passes --failed through to the history listing', async () => {
    const { deps, ctx, lines } = await harness();
    await ctx.audit.logCliCommand({ command: 'broken', success: false, error: 'bad' });
    await ctx.audit.logCliCommand({ command: 'fine' });

    expect(await runCli(['history', 'cli_history', '--failed'], deps)).toBe(0);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ command: 'broken' });
  });

  // --- failures ---

  it('exits 1 and prints the error when a command fails', async () => {
    const { deps, feed, errors } = await harness();
    feed.getAllMarkets.mockRejectedValue(new Error('feed down'));

    expect(await runCli(['get-all-markets'], deps)).toBe(1);
    expect(errors).toEqual(['Error: feed down']);
  });

  it('exits 1 for an invalid limit', async () => {
    const { deps, errors } = await harness();

    expect(await runCli(['get-all-markets', '--limit', '0'], deps)).toBe(1);
    expect(errors).toEqual(['Error: --limit must be a positive integer, got "0"']);
  });

  it('exits 1 when history has no collection', async () => {
    const { deps, errors } = await harness();

    expect(await runCli(['history'], deps)).toBe(1);
    expect(errors).toEqual(['Error: history needs a collection name']);
  });

  // --- serve ---

  it('hands the context to the server and keeps it open', async () => {
    const { deps, ctx } = await harness();

    expect(await runCli(['serve'], deps)).toBe(0);
    expect(deps.serve).toHaveBeenCalledWith(ctx);
    expect(await ctx.audit.isStoreConnected()).toBe(true);
  });
});
