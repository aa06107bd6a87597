#!/usr/bin/env node

/**
 * cfgsql CLI entrypoint.
 */

import { Command, CommanderError } from 'commander';
import {
  DEFAULT_MODEL,
  askQuestion,
  createCatalog,
  defaultEvalCases,
  formatEvalReport,
  loadConfig,
  loadEnvFile,
  loadEvalSuite,
  runEvals,
  summarize,
  synthesize,
  type AppConfig,
} from '@cfgsql/core';
import { createDeps } from './deps.js';
import {
  EXIT_CODE_EVAL_FAILED,
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  refusalError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printBlock,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { buildServer } from './server.js';

const VERSION = '0.1.0';

const CONFIG_VARIABLES = [
  'OPENAI_API_KEY',
  'CFGSQL_MODEL',
  'CFGSQL_ENGINE',
  'TINYBIRD_HOST',
  'TINYBIRD_TOKEN',
  'CFGSQL_SQLITE_PATH',
  'PORT',
] as const;

const envFile = loadEnvFile();

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function engineConfig(): AppConfig {
  return loadConfig(process.env, { requireGenerator: false });
}

function parseReferenceTime(raw: string | undefined): Date | undefined {
  if (raw === undefined) return undefined;
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw usageError(`Invalid --at "${raw}". Expected an ISO-8601 timestamp, e.g. 2024-06-15T12:00:00Z.`);
  }
  return parsed;
}

function parsePort(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw usageError('Invalid --port. Expected 1-65535.');
  }
  return port;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('cfgsql')
  .description('cfgsql: grammar-constrained natural language to SQL')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:   doctor, schema, grammar
  Query:   ask
  Verify:  eval
  Serve:   serve
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment and configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeMajor = parseInt(nodeVersion.slice(1), 10);
          const nodeOk = nodeMajor >= 20;

          const variables = Object.fromEntries(
            CONFIG_VARIABLES.map((key) => [key, Boolean(process.env[key]?.trim())]),
          );

          let configError: string | null = null;
          try {
            loadConfig(process.env);
          } catch (err: unknown) {
            configError = err instanceof Error ? err.message : String(err);
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            envFile,
            engine: process.env.CFGSQL_ENGINE?.trim() || 'tinybird',
            model: process.env.CFGSQL_MODEL?.trim() || `${DEFAULT_MODEL} (default)`,
            variables,
            configOk: configError === null,
            configError,
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('cfgsql Doctor', output);
          printHuman('=============', output);
          printHuman('', output);
          printHuman(`Node.js:   ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`Env file:  ${envFile ?? 'none'}`, output);
          printHuman(`Engine:    ${payload.engine}`, output);
          printHuman(`Model:     ${payload.model}`, output);
          printHuman('', output);
          printHuman('Variables:', output);
          for (const key of CONFIG_VARIABLES) {
            printHuman(`  ${key.padEnd(20)} ${variables[key] ? 'set' : 'not set'}`, output);
          }
          printHuman('', output);
          if (configError) {
            printWarning(configError, output);
          } else {
            printHuman('Configuration OK ✓', output);
          }
        });
      }),
  ),
  ['cfgsql doctor', 'cfgsql doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Fetch and print the tables and columns the generator can use')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const config = engineConfig();
          const schema = await createCatalog(config).fetchSchema();

          if (output.json) {
            printCommandSuccess(schema, output);
            return;
          }

          if (schema.tables.length === 0) {
            printHuman('No tables found.', output);
            return;
          }
          for (const table of schema.tables) {
            printHuman(`${table.name} (${table.columns.length} columns)`, output);
            printHumanTable(
              ['column', 'type'],
              table.columns.map((col) => ({ column: col.name, type: col.type })),
              output,
            );
            printHuman('', output);
          }
        });
      }),
  ),
  ['cfgsql schema', 'CFGSQL_ENGINE=sqlite CFGSQL_SQLITE_PATH=./orders.sqlite cfgsql schema --json'],
);

// ── grammar ──────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('grammar')
      .description('Print the grammar synthesized from the current schema')
      .option('--capabilities', 'Print the capability description instead', false)
      .action(async function (this: Command, opts: { capabilities: boolean }) {
        await runCommand(this, async (output) => {
          const config = engineConfig();
          const schema = await createCatalog(config).fetchSchema();
          const grammar = synthesize(schema);

          if (output.json) {
            printCommandSuccess(grammar, output);
            return;
          }
          printBlock(opts.capabilities ? grammar.capabilities : grammar.grammar, output);
        });
      }),
  ),
  ['cfgsql grammar', 'cfgsql grammar --capabilities'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a natural language question: generate constrained SQL and execute it')
      .argument('<question>', 'Natural language question')
      .option('--at <iso>', 'Reference time for relative phrases (default: now)')
      .action(async function (this: Command, question: string, opts: { at?: string }) {
        await runCommand(this, async (output) => {
          const referenceTime = parseReferenceTime(opts.at);
          const config = loadConfig(process.env);

          if (output.verbose) {
            printHuman(`Question: "${question}"`, output);
            printHuman(`Engine: ${config.engine}, model: ${config.model}`, output);
          }

          const answer = await askQuestion(question, createDeps(config), { referenceTime });
          if (answer.status === 'unsupported') {
            throw refusalError(answer.reason, answer.hint);
          }

          if (output.json) {
            printCommandSuccess(answer, output);
            return;
          }

          printHuman(`Generated SQL (model: ${config.model}):`, output);
          printHuman(`  ${answer.sql}`, output);
          for (const warning of answer.warnings) {
            printWarning(warning, output);
          }
          printHuman('', output);
          printHumanTable(answer.result.columns, answer.result.rows, output);
          printHuman('', output);
          printHuman(
            `${answer.result.rowCount} row${answer.result.rowCount !== 1 ? 's' : ''} returned in ${answer.result.execMs}ms`,
            output,
          );
        });
      }),
  ),
  [
    'cfgsql ask "What is the total revenue?"',
    'cfgsql ask "Revenue from the last 7 days" --at 2024-06-15T12:00:00Z',
    'cfgsql ask "Count all items" --json',
  ],
);

// ── eval ─────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('eval')
      .description('Run the verification harness against the configured engine and model')
      .option('--suite <file>', 'JSON suite file (default: built-in cases)')
      .action(async function (this: Command, opts: { suite?: string }) {
        await runCommand(this, async (output) => {
          const cases = opts.suite ? await loadEvalSuite(opts.suite) : defaultEvalCases();
          const config = loadConfig(process.env);
          const deps = createDeps(config);

          if (output.verbose) {
            printHuman(`Running ${cases.length} evals against ${config.engine} with ${config.model}...`, output);
          }

          const schema = await deps.catalog.fetchSchema();
          const run = await runEvals(cases, { generator: deps.generator, engine: deps.engine, grammar: synthesize(schema) });
          const summary = summarize(run.results);

          if (output.json) {
            printCommandSuccess({ results: run.results, summary, passed: run.error === null, error: run.error }, output);
          } else {
            printBlock(formatEvalReport(run.results), output);
            if (run.error) {
              printWarning(run.error, output);
            }
          }

          if (run.error) {
            process.exitCode = EXIT_CODE_EVAL_FAILED;
          }
        });
      }),
  ),
  ['cfgsql eval', 'cfgsql eval --suite packages/eval/fixtures/suite.json --json'],
);

// ── serve ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('serve')
      .description('Start the HTTP API (POST /api/query, GET|POST /api/eval)')
      .option('--port <port>', 'Port to listen on (default: PORT or 8080)')
      .option('--host <host>', 'Interface to bind', '0.0.0.0')
      .action(async function (this: Command, opts: { port?: string; host: string }) {
        await runCommand(this, async () => {
          const config = loadConfig(process.env);
          const port = parsePort(opts.port, config.port);
          const app = buildServer({ deps: () => createDeps(config), logger: true });
          await app.listen({ port, host: opts.host });
        });
      }),
  ),
  ['cfgsql serve', 'cfgsql serve --port 3000'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
