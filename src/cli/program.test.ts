/**
 * Unit tests for the command line
 * Runs the whole program against an in-process transport and dataset
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { runCli, parsePeriodCount, PROMPT_TEXT, type CliDeps, type CliIO } from './program.js';
import { loadConfig } from '../config/env.js';
import type { FetchLike } from '../domain/http-client.js';
import { MemoryDataset, healthyFetch } from '../test-utils/nws.js';

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
  prompt: Mock<(question: string) => Promise<string>>;
}

function captureIO(answer = '90210'): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    write: (text) => {
      out.push(text);
    },
    writeError: (text) => {
      err.push(text);
    },
    prompt: vi.fn(async (_question: string) => answer),
  };
}

describe('runCli', () => {
  let io: CapturedIO;
  let fetchImpl: Mock<FetchLike>;
  let dataset: MemoryDataset;
  let deps: CliDeps;

  beforeEach(() => {
    io = captureIO();
    fetchImpl = healthyFetch();
    dataset = new MemoryDataset();
    deps = {
      config: loadConfig({}),
      io,
      fetchImpl,
      openDataset: () => dataset,
    };
  });

  it('should print the first period for a ZIP argument', async () => {
    const code = await runCli(['90210'], deps);

    expect(code).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out.join('')).toBe(
      'Weather forecast for Beverly Hills, CA (90210)\n' +
        '\n' +
        '>> Tonight:\n' +
        '   Temperature: 58°F\n' +
        '   Chance of Precipitation: 20%\n' +
        '   Wind: 5 mph SW\n' +
        '   Forecast: Mostly Clear\n'
    );
  });

  it('should close the dataset after the run', async () => {
    await runCli(['90210'], deps);

    expect(dataset.closed).toBe(true);
  });

  it('should prompt when no ZIP is given', async () => {
    const code = await runCli([], deps);

    expect(code).toBe(0);
    expect(io.prompt).toHaveBeenCalledWith(PROMPT_TEXT);
    expect(io.out.join('')).toContain('>> Tonight:');
  });

  it('should accept the explicit forecast command and --periods', async () => {
    const code = await runCli(['forecast', '90210', '--periods', '3'], deps);

    expect(code).toBe(0);
    const text = io.out.join('');
    expect(text).toContain('>> Tonight:');
    expect(text).toContain('>> Sunday:');
    expect(text).toContain('>> Sunday Night:');
  });

  it('should print JSON with --json', async () => {
    const code = await runCli(['90210', '--json'], deps);

    expect(code).toBe(0);
    const parsed: unknown = JSON.parse(io.out.join(''));
    expect(parsed).toMatchObject({
      locationName: 'Beverly Hills, CA',
      errorMessage: null,
      forecastPeriods: [{ name: 'Tonight', temperature: 58, shortForecast: 'Mostly Clear' }],
    });
  });

  it('should exit 1 with a message for an unknown ZIP and make no request', async () => {
    const code = await runCli(['00000'], deps);

    expect(code).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual(['Error: No valid geographic information found for ZIP code: 00000\n']);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should exit 1 for an empty prompt answer', async () => {
    deps.io = io = captureIO('');

    const code = await runCli([], deps);

    expect(code).toBe(1);
    expect(io.err).toEqual(['Error: No ZIP code was provided.\n']);
  });

  it('should report failures as JSON with --json', async () => {
    const code = await runCli(['00000', '--json'], deps);

    expect(code).toBe(1);
    expect(io.err).toEqual([]);
    const parsed: unknown = JSON.parse(io.out.join(''));
    expect(parsed).toEqual({
      locationName: null,
      latitude: null,
      longitude: null,
      errorMessage: 'No valid geographic information found for ZIP code: 00000',
      forecastPeriods: [],
    });
  });

  it('should exit 1 when the weather service fails', async () => {
    fetchImpl.mockRejectedValue(new TypeError('fetch failed'));

    const code = await runCli(['90210'], deps);

    expect(code).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual(['Error: Unable to reach the weather service: fetch failed\n']);
  });

  it('should reject an out-of-range period count', async () => {
    const code = await runCli(['90210', '--periods', '0'], deps);

    expect(code).toBe(1);
    expect(io.err.join('')).toContain('Must be an integer from 1 to 14.');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should print the version', async () => {
    const code = await runCli(['--version'], deps);

    expect(code).toBe(0);
    expect(io.out).toEqual(['0.1.0\n']);
  });

  describe('import-postal-codes', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'zipcast-cli-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should import a GeoNames file', async () => {
      const source = join(dir, 'US.txt');
      const target = join(dir, 'postal.db');
      writeFileSync(
        source,
        'US\t90210\tBeverly Hills\tCalifornia\tCA\tLos Angeles\t037\t\t\t34.0901\t-118.4065\t4\n'
      );

      const code = await runCli(['import-postal-codes', source, target], deps);

      expect(code).toBe(0);
      expect(io.out).toEqual([`Imported 1 postal codes into ${target} (1 in total)\n`]);
    });

    it('should exit 1 when the source is missing', async () => {
      const code = await runCli(
        ['import-postal-codes', join(dir, 'missing.txt'), join(dir, 'postal.db')],
        deps
      );

      expect(code).toBe(1);
      expect(io.err.join('')).toMatch(/^Error: ENOENT/);
    });
  });
});

describe('parsePeriodCount', () => {
  it('should accept integers from 1 to 14', () => {
    expect(parsePeriodCount('1')).toBe(1);
    expect(parsePeriodCount('14')).toBe(14);
  });

  it('should reject anything else', () => {
    expect(() => parsePeriodCount('15')).toThrow('Must be an integer from 1 to 14.');
    expect(() => parsePeriodCount('2.5')).toThrow('Must be an integer from 1 to 14.');
    expect(() => parsePeriodCount('many')).toThrow('Must be an integer from 1 to 14.');
  });
});
