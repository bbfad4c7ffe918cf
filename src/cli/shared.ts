/**
 * Pieces shared by the command-line tools: connection options, dependency
 * wiring and failure reporting.
 *
 * @module cli/shared
 */

import { Command, CommanderError } from 'commander';
import { GitLabClient, type FetchFn } from '../client.js';
import { resolveConfig, ENV_REPO, ENV_SERVER, ENV_TOKEN, type ToolConfig } from '../config.js';
import { NetworkError, PreprocessError, isGitLabToolsError } from '../errors.js';
import { createCliLogger, type Logger } from '../observability.js';
import { SpawnProcessRunner, type ProcessRunner } from '../process.js';
import { detectRemote } from '../remote.js';
import type { OutputSink } from '../search/log-search.js';
import { createGitLabServices, type GitLabServices } from '../services/index.js';

/**
 * Everything a CLI run touches outside its own logic
 */
export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  /**
   * Tool output, one line per call
   */
  stdout: OutputSink;
  /**
   * Diagnostic stream, raw text
   */
  stderr: (text: string) => void;
  fetch?: FetchFn;
  runner?: ProcessRunner;
  /**
   * Parent of the cache directory (default: OS temp directory)
   */
  cacheRoot?: string;
  now?: () => Date;
}

/**
 * Options common to both tools
 */
export interface ConnectionOptions {
  token?: string;
  server?: string;
  repo?: string;
  debug: boolean;
  clean: boolean;
}

/**
 * A configured client and the services built on it
 */
export interface Runtime {
  config: ToolConfig;
  logger: Logger;
  runner: ProcessRunner;
  services: GitLabServices;
}

export function resolveDependencies(overrides: Partial<CliDependencies>): CliDependencies {
  return {
    env: process.env,
    stdout: (line) => {
      process.stdout.write(`${line}\n`);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    ...overrides,
  };
}

/**
 * Create a program with the connection options and usage errors routed to stderr
 */
export function createProgram(name: string, description: string, deps: CliDependencies): Command {
  return new Command(name)
    .description(description)
    .option('--token <token>', `GitLab access token (env: ${ENV_TOKEN})`)
    .option('--server <url>', `GitLab server URL (env: ${ENV_SERVER}, default: git remote or https://gitlab.com)`)
    .option('--repo <slug>', `repository path, e.g. group/project (env: ${ENV_REPO}, default: git remote)`)
    .option('-d, --debug', 'print the equivalent requests and commands to stderr', false)
    .option('--clean', 'empty the cache directory before running', false)
    .exitOverride()
    .configureOutput({
      writeErr: (text) => deps.stderr(text),
    });
}

/**
 * Resolve the configuration and build the client and services
 */
export async function createRuntime(
  options: ConnectionOptions,
  deps: CliDependencies,
  logger: Logger
): Promise<Runtime> {
  const runner = deps.runner ?? new SpawnProcessRunner(logger);
  const config = await resolveConfig(
    {
      token: options.token,
      server: options.server,
      repo: options.repo,
      debug: options.debug,
    },
    {
      env: deps.env,
      detectRemote: () => detectRemote(runner, logger),
    }
  );
  logger.debug('Resolved configuration', {
    serverUrl: config.serverUrl,
    repoSlug: config.repoSlug,
  });

  const client = new GitLabClient(config, { fetch: deps.fetch, logger });
  return { config, logger, runner, services: createGitLabServices(client, logger) };
}

export function createLogger(debug: boolean, deps: CliDependencies): Logger {
  return createCliLogger(debug, (line) => deps.stderr(`${line}\n`));
}

/**
 * Report a fatal error on the diagnostic stream
 *
 * @returns The exit code for the failure
 */
export function reportFailure(error: unknown, logger: Logger, debug: boolean): number {
  if (!isGitLabToolsError(error)) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  logger.error(error.message, debug ? { code: error.code } : {});
  if (error instanceof PreprocessError && error.stderr.trim() !== '') {
    logger.error(error.stderr.trim());
  }
  if (error instanceof NetworkError && !debug) {
    logger.warn('Re-run with --debug to see the underlying request');
  }
  return 1;
}

/**
 * Parse arguments and translate commander's own exits (help, usage errors)
 */
export async function parseProgram(program: Command, args: readonly string[]): Promise<number | undefined> {
  try {
    await program.parseAsync([...args], { from: 'user' });
    return undefined;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }
}
