#!/usr/bin/env node
/**
 * Schematic Agent CLI
 *
 * Usage:
 *   schematic-agent --input examples/circuit.json --out-dir output --iters 3
 *   schematic-agent --input circuit.json --llm --llm-validator --mode llm-text
 *
 * Exit codes: 0 on success, 1 on error, 2 when --fail-on-issues is set and
 * the schematic was not accepted.
 */

import 'dotenv/config';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { z } from 'zod';
import { config } from './config.js';
import { runPipeline, PipelineOptions } from './pipeline/orchestrator.js';
import { PipelineEventType, PipelineProgressEvent } from './pipeline/progress.js';
import { handleError } from './utils/errors.js';

export const USAGE = `Usage: schematic-agent --input <circuit.json> [options]

Options:
  --input <path>       Circuit JSON file (required)
  --out-dir <dir>      Output directory (default: ${config.pipeline.outputDir})
  --iters <n>          Maximum architect/validator iterations (default: ${config.pipeline.maxIterations})
  --llm                Model-driven symbol choice and placement
  --llm-validator      Model-driven compliance review and ERC interpretation
  --mode <mode>        template | llm-text (default: template)
  --reference <path>   Example schematic offered to the model in llm-text mode
  --fail-on-issues     Exit with code 2 when the schematic is not accepted
  -h, --help           Show this help
`;

const CliOptionsSchema = z.object({
  input: z.string().min(1, '--input is required'),
  outDir: z.string().min(1),
  iters: z.coerce.number().int().positive('--iters must be a positive integer'),
  llm: z.boolean(),
  llmValidator: z.boolean(),
  mode: z.enum(['template', 'llm-text']),
  reference: z.string().optional(),
  failOnIssues: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export type CliParseResult = { help: true } | { help: false; options: CliOptions };

export function parseCliArgs(argv: string[]): CliParseResult {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      input: { type: 'string' },
      'out-dir': { type: 'string' },
      iters: { type: 'string' },
      llm: { type: 'boolean', default: false },
      'llm-validator': { type: 'boolean', default: false },
      mode: { type: 'string' },
      reference: { type: 'string' },
      'fail-on-issues': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) return { help: true };

  const parsed = CliOptionsSchema.safeParse({
    input: values.input ?? '',
    outDir: values['out-dir'] ?? config.pipeline.outputDir,
    iters: values.iters ?? config.pipeline.maxIterations,
    llm: values.llm ?? false,
    llmValidator: values['llm-validator'] ?? false,
    mode: values.mode ?? 'template',
    reference: values.reference,
    failOnIssues: values['fail-on-issues'] ?? false,
  });

  if (!parsed.success) {
    throw new Error(parsed.error.errors.map((e) => e.message).join('; '));
  }
  return { help: false, options: parsed.data };
}

export function formatProgress(event: PipelineProgressEvent): string[] {
  const prefix = `[${String(event.progress_percentage).padStart(3)}%]`;
  const lines = [`${prefix} ${event.current_step}`];
  if (event.type === PipelineEventType.ISSUES_FOUND && event.issues) {
    lines.push(...event.issues.map((issue) => `       Issue: ${issue}`));
  }
  return lines;
}

const consoleIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
};

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO = consoleIO,
  overrides: Partial<PipelineOptions> = {}
): Promise<number> {
  let parsed: CliParseResult;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    io.err(USAGE);
    return 1;
  }

  if (parsed.help) {
    io.out(USAGE);
    return 0;
  }

  const { options } = parsed;
  try {
    const result = await runPipeline({
      inputPath: options.input,
      outDir: options.outDir,
      maxIterations: options.iters,
      useLlm: options.llm,
      validatorUseLlm: options.llmValidator,
      mode: options.mode,
      referencePath: options.reference,
      onProgress: (event) => formatProgress(event).forEach(io.out),
      ...overrides,
    });

    io.out(`Schematic written to: ${result.schematicPath}`);
    io.out(`Report written to: ${result.reportPath}`);
    if (result.report.erc.error) {
      io.out(`ERC was not run: ${result.report.erc.error}`);
    } else if (!result.report.erc.available) {
      io.out('ERC was not run: no KiCad binary found (set KICAD_CLI_PATH)');
    }

    if (options.failOnIssues && !result.accepted) {
      io.err(`Schematic not accepted after ${result.iterations} iteration(s)`);
      return 2;
    }
    return 0;
  } catch (error) {
    const normalized = handleError(error);
    io.err(`Error: ${normalized.message}`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
