/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import type {
  AgentConfig,
  BackendName,
  ParsedArgs,
  Subcommand,
  Verbosity,
} from '../types/runner.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE = 'Usage: turnwright [options] <run|task> ...';

interface RawArgs {
  positionalArgs: string[];
  config: Partial<AgentConfig>;
}

function fail(message: string, usage = USAGE): never {
  console.error(`Error: ${message}`);
  console.error(usage);
  process.exit(1);
}

function isBackend(value: string): value is BackendName {
  return value === 'anthropic' || value === 'openai';
}

/**
 * Value of an option given as `--name value` or `--name=value`
 */
function optionValue(args: string[], index: number, name: string): { value: string; consumed: number } {
  const arg = args[index] ?? '';
  if (arg.startsWith(`${name}=`)) {
    return { value: arg.slice(name.length + 1), consumed: 0 };
  }
  const next = args[index + 1];
  if (next === undefined || next.startsWith('-')) {
    fail(`${name} requires a value`);
  }
  return { value: next, consumed: 1 };
}

/**
 * Extract options from raw args, returning positional args and config
 */
function extractOptions(args: string[]): RawArgs {
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let verbosity: Verbosity = 'normal';
  const config: Partial<AgentConfig> = {};
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const name = arg.split('=')[0] ?? arg;

    if (arg === '--quiet') {
      verbosity = 'quiet';
    } else if (arg === '--normal') {
      verbosity = 'normal';
    } else if (arg === '--verbose') {
      verbosity = 'verbose';
    } else if (arg === '--no-log') {
      config.enableLog = false;
    } else if (arg === '--no-pipelines') {
      config.pipelines = false;
    } else if (name === '--model' || name === '-m') {
      const { value, consumed } = optionValue(args, i, name);
      config.model = value;
      i += consumed;
    } else if (name === '--workspace' || name === '-w') {
      const { value, consumed } = optionValue(args, i, name);
      config.workspace = value;
      i += consumed;
    } else if (name === '--backend') {
      const { value, consumed } = optionValue(args, i, name);
      if (!isBackend(value)) {
        fail(`unknown backend '${value}' (expected anthropic or openai)`);
      }
      config.backend = value;
      i += consumed;
    } else if (name === '--timeout') {
      const { value, consumed } = optionValue(args, i, name);
      const seconds = Number(value);
      if (!Number.isFinite(seconds) || seconds <= 0) {
        fail(`--timeout expects a positive number of seconds, got '${value}'`);
      }
      config.requestTimeoutMs = Math.round(seconds * 1000);
      i += consumed;
    } else if (arg.startsWith('-') && arg !== '-') {
      fail(`unknown option '${arg}'`);
    } else {
      positionalArgs.push(arg);
    }
  }

  config.verbosity = verbosity;
  return { positionalArgs, config };
}

/**
 * `key=value` script parameters
 */
export function parseParams(values: string[]): Record<string, string> {
  const params: Record<string, string> = {};
  for (const value of values) {
    const eq = value.indexOf('=');
    if (eq <= 0) {
      fail(`invalid parameter '${value}' (expected key=value)`, 'Usage: turnwright run <script> [key=value ...]');
    }
    params[value.slice(0, eq)] = value.slice(eq + 1);
  }
  return params;
}

const VALID_SUBCOMMANDS: readonly Subcommand[] = ['run', 'task'];

function isValidSubcommand(value: string): value is Subcommand {
  return VALID_SUBCOMMANDS.some((s) => s === value);
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const { positionalArgs, config } = extractOptions(args);
  const firstArg = positionalArgs[0];

  if (!firstArg) {
    fail('subcommand required');
  }
  if (!isValidSubcommand(firstArg)) {
    console.error(`Error: unknown subcommand '${firstArg}'`);
    console.error('Valid subcommands: run, task');
    console.error(USAGE);
    process.exit(1);
  }

  switch (firstArg) {
    case 'run': {
      const file = positionalArgs[1];
      if (!file) {
        fail('script file required', 'Usage: turnwright run <script> [key=value ...]');
      }
      return {
        subcommand: 'run',
        scriptFile: file,
        params: parseParams(positionalArgs.slice(2)),
        message: '',
        config,
      };
    }
    case 'task': {
      const message = positionalArgs.slice(1).join(' ').trim();
      if (!message) {
        fail('task text required', 'Usage: turnwright task <message...>');
      }
      return { subcommand: 'task', scriptFile: null, params: {}, message, config };
    }
  }
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
turnwright - script-driven code generation agent

Usage:
  turnwright [options] run <script> [key=value ...]
  turnwright [options] task <message...>

Subcommands:
  run <script> [params]     Run a conversation script; params override its parameters
  task <message>            Run a one-turn script for the message

Options:
  --workspace, -w <dir>     Directory the file tools may touch (default: .)
  --model, -m <model>       Model name (default: backend default or TURNWRIGHT_MODEL)
  --backend <name>          anthropic (default) or openai
  --timeout <seconds>       Hard timeout per model call (default: 120)
  --quiet                   Minimal output (warnings and errors only)
  --normal                  Default output level
  --verbose                 Full output with tool results and directives
  --no-log                  Disable logging to file (enabled by default)
  --no-pipelines            Never route the first request to the blueprint or upgrade flow
  --version, -V             Print the version
  --help, -h                Print this help

Environment:
  ANTHROPIC_API_KEY         Key for the anthropic backend
  OPENAI_API_KEY            Key for the openai backend (optional for local servers)
  OPENAI_BASE_URL           Base URL of an OpenAI-compatible server
  TURNWRIGHT_MODEL          Default model when --model is not given
`);
}
