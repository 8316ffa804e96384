#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { Writable } from 'node:stream';
import { expandArgumentFiles } from '../common/argfiles';
import { ConfigurationError, EXIT_CODES, exitCodeFor, isHookError, UNEXPECTED_EXIT_CODE } from '../common/errors';
import { configureLogger, getLogger, parseLogFormat, parseLogLevel } from '../common/logger';
import {
  CACHE_PATH_ENV,
  DEFAULT_BRANCH,
  DEFAULT_CACHE_PATH,
  DEFAULT_GIT_TIMEOUT_SECONDS,
  DEFAULT_LOCK_TIMEOUT_SECONDS,
  DEFAULT_PATTERNS,
  HookProfileConfig,
  loadConfig,
  OutputMode,
  parseOutputMode,
  parseSeconds,
  resolveSettings,
} from '../config';
import { runHook } from '../hook';
import { VERSION } from '../version';

export const LOG_LEVEL_ENV = 'GIT_CONFIG_HOOK_LOG_LEVEL';
export const LOG_FORMAT_ENV = 'GIT_CONFIG_HOOK_LOG_FORMAT';

export interface CliIO {
  stdout: Writable;
  stderr: Writable;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Aborting stops the hook; git is killed and waited for before the lock is released. */
  signal?: AbortSignal;
}

interface CliOptions {
  branch?: string;
  cachePath?: string;
  maxAge?: number;
  lockTimeout?: number;
  gitTimeout?: number;
  pattern?: string[];
  exclude?: string[];
  forceInclude?: string[];
  dot?: boolean;
  mode?: OutputMode;
  separators?: boolean;
  pathKey?: string;
  config?: string;
  profile?: string;
  logLevel?: string;
  logFormat?: string;
}

function secondsOption(flag: string) {
  return (value: string): number => parseSeconds(value, flag);
}

function buildProgram(io: CliIO, run: (gitUri: string | undefined, options: CliOptions) => Promise<void>): Command {
  const program = new Command();
  program
    .name('git-config-hook')
    .description('Print configuration from a git repository for a cluster node configuration hook.\n'
      + 'Arguments may be read from files given as @path, one argument per line.')
    .version(VERSION)
    .argument('[git-uri]', 'git repository URI to fetch files from')
    .option('-b, --branch <name>', `branch to fetch files from (default: "${DEFAULT_BRANCH}")`)
    .option('--cache-path <dir>', `directory caching repository mirrors (default: $${CACHE_PATH_ENV} or "${DEFAULT_CACHE_PATH}")`)
    .option('--max-age <seconds>', 'seconds before a new update is pulled; inf disables updates (default: 300±10)', secondsOption('--max-age'))
    .option('--lock-timeout <seconds>', `seconds to wait for a concurrent hook; inf waits forever (default: ${DEFAULT_LOCK_TIMEOUT_SECONDS})`, secondsOption('--lock-timeout'))
    .option('--git-timeout <seconds>', `seconds allowed per git command (default: ${DEFAULT_GIT_TIMEOUT_SECONDS})`, secondsOption('--git-timeout'))
    .option('--pattern <globs...>', `glob pattern(s) selecting configuration files (default: ${DEFAULT_PATTERNS.join(' ')})`)
    .option('--exclude <globs...>', 'glob pattern(s) ignoring configuration files')
    .option('--force-include <globs...>', 'glob pattern(s) re-admitting excluded files')
    .option('--dot', 'let patterns match files and directories starting with a dot')
    .option('--mode <mode>', 'content: print file contents; include: print "include :" lines (default: content)', parseOutputMode)
    .option('--separators', 'precede each file with a "# source:" comment')
    .option('--path-key <key>', 'config key exposing the mirror path, printed first')
    .option('--config <path>', 'YAML, TOML or JSON file with hook settings')
    .option('--profile <name>', 'profile from the config file')
    .option('--log-level <level>', 'log level (silent|error|warn|info|debug)')
    .option('--log-format <format>', 'log format (text|json)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .action(async (gitUri: string | undefined) => {
      await run(gitUri, program.opts<CliOptions>());
    });
  return program;
}

/**
 * Run the hook for the given argv and return the process exit code.
 * Configuration is written to `io.stdout` only when every step succeeded.
 */
export async function runCli(argv = process.argv, io: CliIO = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
  const env = io.env ?? process.env;
  configureLogger({ level: 'warn', format: 'text', destination: io.stderr });
  const log = getLogger('cli');

  const program = buildProgram(io, async (gitUri, options) => {
    configureLogger({
      level: parseLogLevel(options.logLevel ?? env[LOG_LEVEL_ENV]) ?? 'warn',
      format: parseLogFormat(options.logFormat ?? env[LOG_FORMAT_ENV]) ?? 'text',
      destination: io.stderr,
    });
    if (options.profile && !options.config) {
      throw new ConfigurationError('--profile requires --config');
    }

    let file: HookProfileConfig | undefined;
    if (options.config) {
      file = await loadConfig(options.config, options.profile);
    }
    const settings = resolveSettings({
      overrides: {
        repository: gitUri,
        branch: options.branch,
        cachePath: options.cachePath,
        maxAge: options.maxAge,
        lockTimeout: options.lockTimeout,
        gitTimeout: options.gitTimeout,
        patterns: options.pattern,
        exclude: options.exclude,
        forceInclude: options.forceInclude,
        dot: options.dot,
        mode: options.mode,
        separators: options.separators,
        pathKey: options.pathKey,
      },
      file,
      env,
    });
    await runHook({ settings, output: io.stdout, logger: getLogger('hook'), signal: io.signal });
  });

  try {
    const [node = process.execPath, script = 'git-config-hook', ...rest] = argv;
    const args = await expandArgumentFiles(rest, io.cwd);
    await program.parseAsync([node, script, ...args]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version end with exitCode 0; anything else is a usage error
      return error.exitCode === 0 ? 0 : EXIT_CODES.CONFIGURATION;
    }
    if (io.signal?.aborted) {
      log.warn('Interrupted before the configuration was written', { reason: String(io.signal.reason) });
      return UNEXPECTED_EXIT_CODE;
    }
    if (isHookError(error)) {
      log.error(error.message, error.details);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Unexpected failure: ${message}`, { error });
    }
    return exitCodeFor(error);
  }
}

const TERMINATION_SIGNALS: Array<[NodeJS.Signals, number]> = [
  ['SIGHUP', 1],
  ['SIGINT', 2],
  ['SIGTERM', 15],
];

// git is killed and awaited, and the lock released, before the process exits
function exitOnSignals(controller: AbortController, run: Promise<number>): void {
  for (const [signal, number] of TERMINATION_SIGNALS) {
    process.once(signal, () => {
      controller.abort(signal);
      const exit = () => process.exit(128 + number);
      void run.then(exit, exit);
    });
  }
}

if (require.main === module) {
  const controller = new AbortController();
  const run = runCli(process.argv, { stdout: process.stdout, stderr: process.stderr, signal: controller.signal });
  exitOnSignals(controller, run);
  void run.then((code) => {
    process.exitCode = code;
  });
}
