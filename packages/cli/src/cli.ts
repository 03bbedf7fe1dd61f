#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';

import {
  AnalyzeError,
  ContractRunner,
  TOOL_VERSION,
  analyzeSource,
  compareAnalysisPaths,
  computeCoverage,
  createDefaultRegistry,
  createStreamOutput,
  errorMessage,
  lintContracts,
  reportHasFailures,
  runIsolate,
  schemaVersionFor,
  verifyPaths,
  type Output,
  type OutputFormat,
  type WritableLike
} from '@cdd/core';
import { renderAnalysisTable, renderComparisonTable } from './render/analyze.js';
import { renderCoverageTable, renderLintTable, renderPathsTable } from './render/checks.js';
import { renderIsolatePlan } from './render/isolate.js';
import { renderTestReportTable } from './render/report.js';

export interface CliIo {
  stdout: WritableLike;
  stderr: WritableLike;
}

/** Bad command-line input; maps to exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_USAGE = 2;

export function parseVars(pairs: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq < 0) throw new UsageError(`--var must be key=value, got: ${pair}`);
    out[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return out;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

export async function main(
  argv = process.argv,
  io: CliIo = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  let exitCode = 0;
  let output: Output = createStreamOutput(io);

  async function emit(args: { format: OutputFormat; out?: string }, value: unknown, table: () => string): Promise<void> {
    const content = args.format === 'json' ? `${JSON.stringify(value, null, 2)}\n` : table();
    if (args.out) {
      await fs.writeFile(args.out, content, 'utf8');
      return;
    }
    io.stdout.write(content);
  }

  const parser = yargs(hideBin(argv))
    .scriptName('cdd')
    .strict()
    .help()
    .version(false)
    .exitProcess(false)
    .fail((message, err) => {
      throw err ?? new UsageError(message);
    })
    // Shared options (accepted by all commands).
    .option('format', {
      choices: ['json', 'table'] as const,
      default: 'table' as const,
      describe: 'Output format'
    })
    .option('out', {
      type: 'string',
      describe: 'Write output to this file (default: stdout)'
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      default: false,
      describe: 'Show debug output and filesystem operations'
    })
    .middleware((args) => {
      output = createStreamOutput({ ...io, verbose: args.verbose });
    })
    .command(
      'spec',
      'Print the tool version',
      (cmd) =>
        cmd.option('version', {
          type: 'boolean',
          default: false,
          describe: 'Print only the bare tool version, whatever the format'
        }),
      async (args) => {
        if (args.version) {
          io.stdout.write(`${TOOL_VERSION}\n`);
          return;
        }
        await emit(args, { tool_version: TOOL_VERSION, schema_version: schemaVersionFor(TOOL_VERSION) }, () => `${TOOL_VERSION}\n`);
      }
    )
    .command(
      'lint [path]',
      'Lint contract files (schema + coverage gates)',
      (cmd) =>
        cmd
          .positional('path', {
            type: 'string',
            default: 'contracts',
            describe: 'Contracts directory or file'
          })
          .option('strict', {
            type: 'boolean',
            default: false,
            describe: 'Treat warnings as errors'
          }),
      async (args) => {
        const report = await lintContracts(args.path, { strict: args.strict });
        await emit(args, report, () => renderLintTable(report));
        exitCode = report.ok ? 0 : 1;
      }
    )
    .command(
      'test [path]',
      'Run contract tests',
      (cmd) =>
        cmd
          .positional('path', {
            type: 'string',
            default: 'contracts',
            describe: 'Contracts directory or file'
          })
          .option('artifacts', {
            type: 'string',
            default: 'artifacts',
            describe: 'Artifacts root directory'
          })
          .option('require-exact-spec', {
            type: 'boolean',
            default: false,
            describe: 'Fail unless the project spec version equals the tool version'
          })
          .option('var', {
            type: 'string',
            array: true,
            describe: 'Inject a variable (key=value); repeatable'
          })
          .option('fail-fast', {
            type: 'boolean',
            default: false,
            describe: 'Stop a contract at its first failing test'
          })
          .option('only', {
            type: 'string',
            array: true,
            describe: 'Run only this test id; repeatable'
          })
          .option('deterministic', {
            type: 'boolean',
            default: false,
            describe: 'Freeze timestamps for byte-stable report output'
          }),
      async (args) => {
        let vars: Record<string, string>;
        try {
          vars = parseVars(args.var ?? []);
        } catch (err) {
          if (!(err instanceof UsageError)) throw err;
          output.error(err.message);
          exitCode = EXIT_USAGE;
          return;
        }

        const runner = new ContractRunner({
          registry: createDefaultRegistry(),
          artifactsRoot: args.artifacts,
          requireExactSpec: args.requireExactSpec,
          failFast: args.failFast,
          deterministic: args.deterministic,
          output
        });
        const report = await runner.run(args.path, { vars, only: args.only ?? [] });
        await emit(args, report, () => renderTestReportTable(report));
        exitCode = reportHasFailures(report) ? 1 : 0;
      }
    )
    .command(
      'coverage [path]',
      'Report requirement to test linkage',
      (cmd) =>
        cmd
          .positional('path', {
            type: 'string',
            default: 'contracts',
            describe: 'Contracts directory or file'
          })
          .option('strict', {
            type: 'boolean',
            default: false,
            describe: 'Exit 1 when any requirement is uncovered'
          }),
      async (args) => {
        const report = await computeCoverage(args.path);
        await emit(args, report, () => renderCoverageTable(report));
        exitCode = args.strict && report.uncovered_count > 0 ? 1 : 0;
      }
    )
    .command(
      'analyze <source>',
      'Capture a source file as a frozen reference for evidence-based contracts',
      (cmd) =>
        cmd
          .positional('source', {
            type: 'string',
            demandOption: true,
            describe: 'Source file to analyze'
          })
          .option('output', {
            alias: 'o',
            type: 'string',
            default: 'analysis',
            describe: 'Output directory for analysis artifacts'
          })
          .option('deterministic', {
            type: 'boolean',
            default: false,
            describe: 'Freeze the capture timestamp'
          }),
      async (args) => {
        output.debug(`analyzing: ${args.source}`);
        try {
          const result = await analyzeSource(args.source, args.output, { deterministic: args.deterministic });
          await emit(args, result, () => renderAnalysisTable(result));
        } catch (err) {
          if (!(err instanceof AnalyzeError)) throw err;
          output.error(err.message);
          exitCode = 1;
        }
      }
    )
    .command(
      'compare <original> <generated>',
      'Compare two source reference analyses',
      (cmd) =>
        cmd
          .positional('original', {
            type: 'string',
            demandOption: true,
            describe: 'Original analysis directory or structure.json'
          })
          .positional('generated', {
            type: 'string',
            demandOption: true,
            describe: 'Generated analysis directory or structure.json'
          }),
      async (args) => {
        try {
          const diff = await compareAnalysisPaths(args.original, args.generated);
          await emit(args, diff, () => renderComparisonTable(diff));
          exitCode = diff.match ? 0 : 1;
        } catch (err) {
          if (!(err instanceof AnalyzeError)) throw err;
          output.error(err.message);
          exitCode = 1;
        }
      }
    )
    .command(
      'paths [path]',
      'Verify all file paths in contracts resolve',
      (cmd) =>
        cmd.positional('path', {
          type: 'string',
          default: 'contracts',
          describe: 'Contracts directory or file'
        }),
      async (args) => {
        if (!(await pathExists(args.path))) {
          output.error(`Path not found: ${args.path}`);
          exitCode = 1;
          return;
        }
        const report = await verifyPaths(args.path);
        await emit(args, report, () => renderPathsTable(report));
        exitCode = report.ok ? 0 : 1;
      }
    )
    .command(
      'isolate <contract>',
      'Execute a single contract in an isolated workspace',
      (cmd) =>
        cmd
          .positional('contract', {
            type: 'string',
            demandOption: true,
            describe: 'Path to contract YAML file'
          })
          .option('project', {
            alias: 'p',
            type: 'string',
            describe: 'Project root directory'
          })
          .option('keep', {
            alias: 'k',
            type: 'boolean',
            default: false,
            describe: 'Keep work directory after run'
          })
          .option('keep-on-fail', {
            type: 'boolean',
            default: false,
            describe: 'Keep work directory only on failure'
          })
          .option('work-dir', {
            alias: 'w',
            type: 'string',
            describe: 'Custom work directory'
          })
          .option('paths-only', {
            type: 'boolean',
            default: false,
            describe: 'Only run path verification'
          })
          .option('dry-run', {
            type: 'boolean',
            default: false,
            describe: 'Print plan and exit'
          }),
      async (args) => {
        const result = await runIsolate(args.contract, {
          project: args.project,
          keep: args.keep,
          keepOnFail: args.keepOnFail,
          workDir: args.workDir,
          verbose: args.verbose,
          pathsOnly: args.pathsOnly,
          dryRun: args.dryRun,
          output
        });
        if (result.error) output.error(result.error);

        await emit(
          args,
          {
            exit_code: result.exitCode,
            plan: result.plan,
            error: result.error,
            paths: result.paths,
            report: result.report,
            cleaned: result.cleaned
          },
          () => {
            const parts: string[] = [];
            if (result.plan) parts.push(renderIsolatePlan(result.plan));
            if (args.dryRun && result.plan) parts.push('dry run: no changes made\n');
            if (result.paths && (!result.paths.ok || args.pathsOnly)) parts.push(renderPathsTable(result.paths));
            if (result.report) parts.push(renderTestReportTable(result.report));
            return parts.join('\n');
          }
        );
        exitCode = result.exitCode;
      }
    )
    .demandCommand(1, 'Provide a command');

  try {
    await parser.parse();
  } catch (err) {
    output.error(errorMessage(err));
    return err instanceof UsageError ? EXIT_USAGE : 1;
  }
  return exitCode;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
