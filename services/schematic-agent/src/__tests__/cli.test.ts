import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { CliIO, formatProgress, parseCliArgs, runCli, USAGE } from '../cli.js';
import type { CommandRunner } from '../kicad/erc.js';
import { SymbolIndex } from '../kicad/symbol-library.js';
import { createProgressEvent, PipelineEventType } from '../pipeline/progress.js';

const EXAMPLE_CIRCUIT = fileURLToPath(new URL('../../examples/circuit.json', import.meta.url));

const noKicad: CommandRunner = async (command) => {
  throw Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
};

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe('parseCliArgs', () => {
  it('fills defaults for optional flags', () => {
    expect(parseCliArgs(['--input', 'circuit.json'])).toEqual({
      help: false,
      options: {
        input: 'circuit.json',
        outDir: 'output',
        iters: 3,
        llm: false,
        llmValidator: false,
        mode: 'template',
        failOnIssues: false,
      },
    });
  });

  it('reads every flag', () => {
    const result = parseCliArgs([
      '--input',
      'c.json',
      '--out-dir',
      'out',
      '--iters',
      '5',
      '--llm',
      '--llm-validator',
      '--mode',
      'llm-text',
      '--reference',
      'ref.kicad_sch',
      '--fail-on-issues',
    ]);
    expect(result).toEqual({
      help: false,
      options: {
        input: 'c.json',
        outDir: 'out',
        iters: 5,
        llm: true,
        llmValidator: true,
        mode: 'llm-text',
        reference: 'ref.kicad_sch',
        failOnIssues: true,
      },
    });
  });

  it('recognizes help', () => {
    expect(parseCliArgs(['-h'])).toEqual({ help: true });
    expect(parseCliArgs(['--help', '--input', 'x.json'])).toEqual({ help: true });
  });

  it('rejects missing or invalid values', () => {
    expect(() => parseCliArgs([])).toThrow('--input is required');
    expect(() => parseCliArgs(['--input', 'c.json', '--iters', '0'])).toThrow('--iters must be a positive integer');
    expect(() => parseCliArgs(['--input', 'c.json', '--mode', 'freestyle'])).toThrow(/Invalid enum value/);
    expect(() => parseCliArgs(['--input', 'c.json', '--bogus'])).toThrow(/Unknown option '--bogus'/);
  });
});

describe('formatProgress', () => {
  it('prefixes the percentage and lists issues', () => {
    const event = createProgressEvent('op', PipelineEventType.ISSUES_FOUND, 7, '2 issue(s) found', {
      issues: ['[overlap] Bounding boxes overlap: R1 and D1', 'Title block is missing a date'],
    });
    expect(formatProgress(event)).toEqual([
      '[  7%] 2 issue(s) found',
      '       Issue: [overlap] Bounding boxes overlap: R1 and D1',
      '       Issue: Title block is missing a date',
    ]);
    expect(formatProgress(createProgressEvent('op', PipelineEventType.COMPLETE, 100, 'Schematic accepted'))).toEqual([
      '[100%] Schematic accepted',
    ]);
  });
});

describe('runCli', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
  });

  afterEach(async () => {
    await fs.rm(outDir, { recursive: true, force: true });
  });

  const overrides = () => ({ symbolIndex: new SymbolIndex(), erc: { runner: noKicad } });

  it('prints usage for --help', async () => {
    const io = capture();
    expect(await runCli(['--help'], io)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('prints the error and usage for bad arguments', async () => {
    const io = capture();
    expect(await runCli([], io)).toBe(1);
    expect(io.stderr).toEqual(['Error: --input is required', USAGE]);
  });

  it('writes the schematic and report for the example circuit', async () => {
    const io = capture();
    const code = await runCli(['--input', EXAMPLE_CIRCUIT, '--out-dir', outDir], io, overrides());

    expect(code).toBe(0);
    expect(io.stderr).toEqual([]);
    expect(io.stdout[0]).toBe('[  0%] Loading circuit');
    expect(io.stdout.slice(-3)).toEqual([
      `Schematic written to: ${path.join(outDir, 'LED_Indicator.kicad_sch')}`,
      `Report written to: ${path.join(outDir, 'LED_Indicator.report.json')}`,
      'ERC was not run: no KiCad binary found (set KICAD_CLI_PATH)',
    ]);
    await expect(fs.access(path.join(outDir, 'LED_Indicator.kicad_sch'))).resolves.toBeUndefined();
  });

  it('exits with 2 when --fail-on-issues is set and issues remain', async () => {
    const input = path.join(outDir, 'cramped.json');
    await fs.writeFile(
      input,
      JSON.stringify({
        title: 'Cramped',
        parts: [
          { ref: 'R1', type: 'R', pins: { '1': 'A', '2': 'B' }, position: [50, 50] },
          { ref: 'R2', type: 'R', pins: { '1': 'A', '2': 'B' }, position: [55, 50] },
        ],
        nets: [{ name: 'A' }, { name: 'B' }],
      })
    );

    const io = capture();
    const code = await runCli(
      ['--input', input, '--out-dir', outDir, '--iters', '1', '--fail-on-issues'],
      io,
      overrides()
    );

    expect(code).toBe(2);
    expect(io.stderr).toEqual(['Schematic not accepted after 1 iteration(s)']);
    expect(io.stdout).toContain('       Issue: [overlap] Bounding boxes overlap: R1 and R2');
  });

  it('exits with 1 when the circuit cannot be loaded', async () => {
    const io = capture();
    const code = await runCli(['--input', path.join(outDir, 'missing.json'), '--out-dir', outDir], io, overrides());

    expect(code).toBe(1);
    expect(io.stderr).toHaveLength(1);
    expect(io.stderr[0]?.startsWith('Error: ')).toBe(true);
  });
});
