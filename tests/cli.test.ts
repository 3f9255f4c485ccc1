import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtempSync, rmSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram, executeDownload, parseCount } from '../src/cli.js';
import { requireFormDefinition } from '../src/core/forms.js';
import type { AppConfig } from '../src/core/config.js';
import { TICKERS_URL } from '../src/core/sec-client.js';
import { createFakeEdgar, aaplRoutes } from './fake-edgar.js';

const tenK = requireFormDefinition('10-k');

function quietProgram() {
  return createProgram(tenK)
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
}

describe('parseCount', () => {
  it('accepts positive integers', () => {
    expect(parseCount('5')).toBe(5);
    expect(parseCount(' 12 ')).toBe(12);
  });

  it('rejects zero, negatives and fractions', () => {
    expect(() => parseCount('0')).toThrow('Must be a positive integer.');
    expect(() => parseCount('-2')).toThrow('Must be a positive integer.');
    expect(() => parseCount('2.5')).toThrow('Must be a positive integer.');
    expect(() => parseCount('ten')).toThrow('Must be a positive integer.');
  });
});

describe('createProgram', () => {
  it('names the script after the form', () => {
    const help = quietProgram().helpInformation();
    expect(help).toContain('Usage: download_10k [options] <tickers...>');
    expect(help).toContain('-n, --number <count>');
    expect(help).toContain('-e, --email <email>');
  });

  it('requires at least one ticker', async () => {
    await expect(quietProgram().parseAsync(['node', 'download_10k'])).rejects.toMatchObject({
      code: 'commander.missingArgument',
    });
  });

  it('rejects an invalid count', async () => {
    await expect(quietProgram().parseAsync(['node', 'download_10k', 'AAPL', '-n', '0'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});

describe('executeDownload', () => {
  let root: string;
  let config: AppConfig;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'edgar-cli-test-'));
    config = {
      contactEmail: 'env@example.com',
      userAgent: 'Env Agent env@example.com',
      downloadDir: root,
      requestTimeoutMs: 1000,
    };
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('uses the configured User-Agent and download directory', async () => {
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);

    const summary = await executeDownload(tenK, ['AAPL'], { number: 1 }, config);

    expect(summary.totals.filings_downloaded).toBe(1);
    expect(fake.calls.map(c => c.userAgent)).toEqual([
      'Env Agent env@example.com',
      'Env Agent env@example.com',
      'Env Agent env@example.com',
    ]);
    expect(readdirSync(join(root, '10-k'))).toEqual(['AAPL_2024-11-01_10K.html']);
  });

  it('lets -e replace the configured User-Agent and -o the directory', async () => {
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);
    const outDir = join(root, 'out');

    const summary = await executeDownload(tenK, ['AAPL'], { number: 1, email: 'cli@example.com', outDir }, config);

    expect(fake.calls[0].userAgent).toBe('edgar-filings-downloader cli@example.com');
    expect(summary.output_dir).toBe(outDir);
    expect(readdirSync(join(outDir, '10-k'))).toEqual(['AAPL_2024-11-01_10K.html']);
  });

  it('rejects an invalid email before any request', async () => {
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);

    await expect(executeDownload(tenK, ['AAPL'], { number: 1, email: 'nope' }, config))
      .rejects.toThrow('Invalid contact email: "nope"');
    expect(fake.calls).toEqual([]);
  });
});

describe('download command', () => {
  let root: string;
  let previousLevel: typeof chalk.level;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'edgar-cli-test-'));
    previousLevel = chalk.level;
    chalk.level = 1;
    vi.stubEnv('SEC_DOWNLOAD_DIR', root);
    vi.stubEnv('SEC_CONTACT_EMAIL', 'env@example.com');
    vi.stubEnv('SEC_USER_AGENT', '');
    vi.stubEnv('SEC_REQUEST_TIMEOUT_MS', '');
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`process.exit(${String(code)})`);
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = previousLevel;
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  function run(...args: string[]) {
    return createProgram(tenK).parseAsync(['node', 'download_10k', ...args]);
  }

  it('finishes without exiting when a ticker fails and prints the summary', async () => {
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);

    await run('AAPL', 'ZZZZ999', '-n', '1');

    expect(process.exit).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledTimes(3);
    const summary = String(vi.mocked(console.log).mock.calls[1][0]);
    expect(summary).toContain(chalk.red('  ZZZZ999: Ticker "ZZZZ999" not found in the SEC company tickers table.'));
    expect(summary).toContain(`  1 filing(s) saved to ${join(root, '10-k')}`);
    expect(summary).toContain(chalk.yellow('  1 of 2 ticker(s) failed'));
    expect(readdirSync(join(root, '10-k'))).toEqual(['AAPL_2024-11-01_10K.html']);
  });

  it('exits with status 1 when the ticker table is unavailable', async () => {
    const fake = createFakeEdgar({ [TICKERS_URL]: { status: 503, body: 'busy' } });
    vi.stubGlobal('fetch', fake.fetch);

    await expect(run('AAPL')).rejects.toThrow('process.exit(1)');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(console.error).toHaveBeenLastCalledWith(chalk.red('Error: SEC API error: 503'));
    expect(console.log).not.toHaveBeenCalled();
    expect(fake.calls.map(c => c.url)).toEqual([TICKERS_URL]);
  });

  it('prints the summary as JSON with -j', async () => {
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);

    await run('AAPL', '-n', '1', '-j');

    expect(console.log).toHaveBeenCalledTimes(1);
    const parsed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(parsed).toMatchObject({
      form: '10-K',
      output_dir: join(root, '10-k'),
      requested_count: 1,
      totals: { tickers: 1, tickers_failed: 0, filings_downloaded: 1, filings_failed: 0 },
      tickers: [{ ticker: 'AAPL', cik: '0000320193', status: 'ok' }],
    });
  });

  it('lets -e stand in for an invalid SEC_CONTACT_EMAIL', async () => {
    vi.stubEnv('SEC_CONTACT_EMAIL', 'me at home');
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);

    await run('AAPL', '-n', '1', '-e', 'ok@example.com');

    expect(process.exit).not.toHaveBeenCalled();
    expect(fake.calls.map(c => c.userAgent)).toEqual([
      'edgar-filings-downloader ok@example.com',
      'edgar-filings-downloader ok@example.com',
      'edgar-filings-downloader ok@example.com',
    ]);
  });

  it('rejects an invalid SEC_CONTACT_EMAIL when -e is not given', async () => {
    vi.stubEnv('SEC_CONTACT_EMAIL', 'me at home');
    const fake = createFakeEdgar(aaplRoutes());
    vi.stubGlobal('fetch', fake.fetch);

    await expect(run('AAPL')).rejects.toThrow('process.exit(1)');

    expect(console.error).toHaveBeenLastCalledWith(chalk.red('Error: Invalid contact email: "me at home"'));
    expect(fake.calls).toEqual([]);
  });
});
