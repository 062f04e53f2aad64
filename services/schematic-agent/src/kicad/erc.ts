/**
 * KiCad ERC Runner
 *
 * Runs `sch erc` through kicad-cli (or the older kicad-sch entry point) and
 * turns its JSON or text report into an {@link ErcReport}. A host without
 * KiCad, or an ERC run that times out or fails to start, yields
 * `{ available: false }` rather than an error.
 *
 * @module kicad/erc
 */

import { spawn, ChildProcess } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { isSchematicAgentError, KiCadError, TimeoutError } from '../utils/errors.js';
import { log, Logger } from '../utils/logger.js';
import type { ErcFinding, ErcReport, ErcSeverity } from '../types/index.js';

const ercLogger: Logger = log.child({ service: 'kicad-erc' });

const DEFAULT_BINARIES = ['kicad-cli', 'kicad-sch'];
const PROBE_TIMEOUT_MS = 10000;
const DEFAULT_ERC_TIMEOUT_MS = 120000;

/**
 * SIGTERM→SIGKILL grace period (ms)
 */
const SIGKILL_GRACE_MS = 5000;

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<ProcessResult>;

export interface ErcOptions {
  /** Explicit binary, tried before kicad-cli and kicad-sch */
  cliPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

// ============================================================================
// Process execution
// ============================================================================

/**
 * Run a command to completion. Rejects on spawn failure (e.g. ENOENT) and
 * with {@link TimeoutError} when the deadline passes.
 */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const startTime = Date.now();
    let stdout = '';
    let stderr = '';
    let settled = false;

    const proc: ChildProcess = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const timeoutHandle = setTimeout(() => {
      if (settled) return;
      settled = true;
      proc.kill('SIGTERM');
      const killHandle = setTimeout(() => {
        if (proc.exitCode === null) proc.kill('SIGKILL');
      }, SIGKILL_GRACE_MS);
      killHandle.unref();
      reject(
        new TimeoutError(`${command} ${args.join(' ')}`, options.timeoutMs, {
          operation: 'spawnCommand',
        })
      );
    }, options.timeoutMs);

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code: number | null) => {
      clearTimeout(timeoutHandle);
      if (settled) return;
      settled = true;
      resolve({
        exitCode: code ?? -1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        durationMs: Date.now() - startTime,
      });
    });

    proc.on('error', (error: Error) => {
      clearTimeout(timeoutHandle);
      if (settled) return;
      settled = true;
      reject(error);
    });
  });

/**
 * First candidate binary that answers `--version`.
 */
export async function findErcBinary(options: ErcOptions = {}): Promise<string | undefined> {
  const runner = options.runner ?? spawnCommand;
  const candidates = options.cliPath ? [options.cliPath, ...DEFAULT_BINARIES] : DEFAULT_BINARIES;

  for (const candidate of candidates) {
    try {
      const result = await runner(candidate, ['--version'], { timeoutMs: PROBE_TIMEOUT_MS });
      if (result.exitCode === 0) {
        ercLogger.debug('ERC binary found', { binary: candidate, version: result.stdout });
        return candidate;
      }
    } catch {
      // Not installed under this name
    }
  }
  return undefined;
}

// ============================================================================
// Report parsing
// ============================================================================

const PositionSchema = z.object({ x: z.number(), y: z.number() });

const ViolationSchema = z
  .object({
    type: z.string().optional(),
    severity: z.string().optional(),
    description: z.string().optional(),
    message: z.string().optional(),
    items: z
      .array(
        z
          .object({
            description: z.string().optional(),
            pos: PositionSchema.optional(),
          })
          .passthrough()
      )
      .optional(),
    references: z
      .array(z.object({ ref: z.string().optional(), uuid: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

const ErcJsonSchema = z
  .object({
    sheets: z.array(z.object({ violations: z.array(ViolationSchema).default([]) }).passthrough()).optional(),
    violations: z.array(ViolationSchema).optional(),
  })
  .passthrough();

type Violation = z.infer<typeof ViolationSchema>;

function normalizeSeverity(value: string | undefined): ErcSeverity {
  switch ((value ?? '').toLowerCase()) {
    case 'error':
      return 'error';
    case 'exclusion':
    case 'excluded':
      return 'exclusion';
    case 'info':
    case 'ignore':
      return 'info';
    default:
      return 'warning';
  }
}

function toFinding(violation: Violation): ErcFinding {
  const item = violation.items?.[0];
  const ref =
    violation.references?.find((r) => r.ref)?.ref ??
    item?.description?.match(/Symbol\s+([A-Za-z]+\d+)/)?.[1];

  const finding: ErcFinding = {
    severity: normalizeSeverity(violation.severity),
    message: violation.description ?? violation.message ?? violation.type ?? 'ERC violation',
  };
  if (violation.type) finding.type = violation.type;
  if (item?.pos) {
    finding.location = { x: item.pos.x, y: item.pos.y, ...(ref ? { ref } : {}) };
  }
  return finding;
}

/**
 * Parse a KiCad ERC JSON report. Accepts the per-sheet form and a flat
 * `violations` array. Returns undefined for anything else.
 */
export function parseErcJson(data: unknown): { violationCount: number; findings: ErcFinding[] } | undefined {
  const parsed = ErcJsonSchema.safeParse(data);
  if (!parsed.success) return undefined;
  if (!parsed.data.sheets && !parsed.data.violations) return undefined;

  const violations: Violation[] = [
    ...(parsed.data.sheets ?? []).flatMap((sheet) => sheet.violations),
    ...(parsed.data.violations ?? []),
  ];

  const findings = violations.map(toFinding);
  const violationCount = findings.filter((f) => f.severity !== 'exclusion').length;
  return { violationCount, findings };
}

/**
 * Violation count from text output (`Found N violations`), 0 if absent.
 */
export function parseViolationCount(output: string): number {
  const match = output.match(/Found\s+(\d+)\s+violations?/i);
  return match ? Number.parseInt(match[1], 10) : 0;
}

// ============================================================================
// Public API
// ============================================================================

async function readJsonReport(reportPath: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(reportPath, 'utf-8'));
  } catch {
    // No report written, or not JSON
    return undefined;
  }
}

/**
 * Run ERC on a schematic file.
 */
export async function runErc(schematicPath: string, options: ErcOptions = {}): Promise<ErcReport> {
  const runner = options.runner ?? spawnCommand;
  const timeoutMs = options.timeoutMs ?? DEFAULT_ERC_TIMEOUT_MS;

  const binary = await findErcBinary({ ...options, runner });
  if (!binary) {
    ercLogger.warn('No KiCad ERC binary found; structural checks only', { schematicPath });
    return { available: false, violationCount: 0, findings: [] };
  }

  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'schematic-erc-'));
  const reportPath = path.join(tmpDir, 'erc.json');

  try {
    const jsonRun = await runner(
      binary,
      ['sch', 'erc', '--format', 'json', '--severity-all', '--output', reportPath, schematicPath],
      { timeoutMs }
    );
    const parsed = parseErcJson(await readJsonReport(reportPath));

    if (parsed) {
      ercLogger.info('ERC complete', {
        binary,
        exitCode: jsonRun.exitCode,
        violationCount: parsed.violationCount,
      });
      return {
        available: true,
        binary,
        exitCode: jsonRun.exitCode,
        violationCount: parsed.violationCount,
        findings: parsed.findings,
        rawOutput: [jsonRun.stdout, jsonRun.stderr].filter(Boolean).join('\n'),
      };
    }

    ercLogger.debug('ERC JSON report unavailable; retrying in text mode', {
      binary,
      exitCode: jsonRun.exitCode,
    });

    const textRun = await runner(binary, ['sch', 'erc', schematicPath], { timeoutMs });
    const rawOutput = [textRun.stdout, textRun.stderr].filter(Boolean).join('\n');
    const violationCount = parseViolationCount(rawOutput);

    ercLogger.info('ERC complete (text mode)', { binary, exitCode: textRun.exitCode, violationCount });
    return {
      available: true,
      binary,
      exitCode: textRun.exitCode,
      violationCount,
      findings: [],
      rawOutput,
    };
  } catch (error) {
    const failure = isSchematicAgentError(error)
      ? error
      : new KiCadError(`ERC run failed: ${error instanceof Error ? error.message : String(error)}`, {
          operation: 'runErc',
          binary,
          schematicPath,
        });
    ercLogger.error('ERC run failed; structural checks only', failure, { code: failure.code, binary, schematicPath });
    return { available: false, binary, violationCount: 0, findings: [], error: failure.message };
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
}

export function isErcClean(report: ErcReport): boolean {
  return !report.available || (report.exitCode === 0 && report.violationCount === 0);
}

/**
 * Human-readable lines for logs and prompts.
 */
export function summarizeErc(report: ErcReport, maxItems = 10): string[] {
  if (!report.available) {
    return [report.error ? `ERC not run: ${report.error}` : 'ERC not run: no KiCad binary found'];
  }

  const lines = [`ERC violations: ${report.violationCount} (exit code ${report.exitCode ?? 'unknown'})`];
  for (const finding of report.findings.slice(0, maxItems)) {
    const where = finding.location?.ref ? ` [${finding.location.ref}]` : '';
    lines.push(`- ${finding.severity}: ${finding.message}${where}`);
  }
  return lines;
}
