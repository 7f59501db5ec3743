import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCli } from '../helpers/cli.js';
import { readIntervals } from '../../src/commands/convert.js';
import { ConversionError } from '../../src/lib/errors.js';

describe('convert command', () => {
  let workDir: string;

  function writeFile(name: string, content: string): string {
    const filePath = path.join(workDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oadr3-convert-test-'));
    vi.stubEnv('OADR3_CONFIG_PATH', path.join(workDir, 'config.json'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should convert CSV rows to interval JSON', async () => {
    const file = writeFile(
      'intervals.csv',
      'type,values,start,duration\nPRICE,[0.3],2025-03-02T17:00:00Z,PT1H\nPRICE,[0.25],,\n'
    );

    const run = await runCli(['convert', file]);

    expect(run.exitCode).toBeUndefined();
    expect(JSON.parse(run.stdout)).toEqual({
      success: true,
      count: 2,
      intervals: [
        {
          id: 0,
          intervalPeriod: { start: '2025-03-02T17:00:00Z', duration: 'PT1H' },
          payloads: [{ type: 'PRICE', values: [0.3] }],
        },
        { id: 1, payloads: [{ type: 'PRICE', values: [0.25] }] },
      ],
    });
  });

  it('should convert JSON rows to CSV', async () => {
    const file = writeFile(
      'intervals.json',
      JSON.stringify([{ type: 'SIMPLE', values: [1, 2], start: '2025-03-02T18:00:00+01:00', duration: 'PT15M' }])
    );

    const run = await runCli(['convert', file]);

    expect(run.stdout).toBe(
      'type,values,start,duration,randomizeStart\nSIMPLE,"[1,2]",2025-03-02T17:00:00.000Z,PT15M,'
    );
  });

  it('should honour an explicit target format', async () => {
    const file = writeFile('intervals.json', JSON.stringify([{ type: 'SIMPLE', values: [1] }]));

    const run = await runCli(['convert', file, '--to', 'json']);

    expect(JSON.parse(run.stdout).intervals).toEqual([{ id: 0, payloads: [{ type: 'SIMPLE', values: [1] }] }]);
  });

  it('should report invalid rows and exit with code 1', async () => {
    const file = writeFile('intervals.csv', 'type,values\n,[1]\nPRICE,[2]\n');

    const run = await runCli(['convert', file]);

    expect(run.exitCode).toBe(1);
    expect(JSON.parse(run.stdout)).toEqual({
      success: false,
      error: { code: 'CONVERSION_ERROR', message: '1 of 2 rows failed validation' },
    });
  });
});

describe('readIntervals', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oadr3-read-test-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should require a JSON array', () => {
    const file = path.join(workDir, 'rows.json');
    fs.writeFileSync(file, JSON.stringify({ type: 'PRICE', values: [1] }));

    expect(() => readIntervals(file)).toThrow(`${file} must contain a JSON array of rows`);
  });

  it('should reject a file that is neither CSV nor JSON', () => {
    const file = path.join(workDir, 'rows.txt');
    fs.writeFileSync(file, 'type,values');

    expect(() => readIntervals(file)).toThrow(ConversionError);
  });

  it('should read CSV case-insensitively by extension', () => {
    const file = path.join(workDir, 'ROWS.CSV');
    fs.writeFileSync(file, 'type,values\nGHG,[120]');

    expect(readIntervals(file)).toEqual([{ id: 0, payloads: [{ type: 'GHG', values: [120] }] }]);
  });
});
