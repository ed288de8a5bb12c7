/**
 * Helpers shared by CLI commands.
 */
import type { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { Pipeline } from '../../core/pipeline/pipeline.js';
import { PromptsmithError } from '../../utils/errors.js';
import { writeFile } from '../../utils/file-system.js';

export interface GlobalOptions {
  root?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Result of a command handler: what to print and how to exit.
 */
export interface CommandOutcome {
  output: string;
  exitCode: number;
}

export function getGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  return {
    root: typeof opts.root === 'string' ? opts.root : undefined,
    config: typeof opts.config === 'string' ? opts.config : undefined,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
  };
}

export function resolveProjectRoot(globals: GlobalOptions): string {
  return path.resolve(globals.root ?? process.cwd());
}

export async function loadPipeline(globals: GlobalOptions): Promise<Pipeline> {
  const projectRoot = resolveProjectRoot(globals);
  const config = await loadConfig(projectRoot, globals.config);
  return new Pipeline(projectRoot, config);
}

/**
 * Print an outcome to stdout (or a file) and set the exit code.
 */
export async function emit(outcome: CommandOutcome, outputFile?: string): Promise<void> {
  if (outputFile) {
    await writeFile(path.resolve(outputFile), outcome.output.endsWith('\n') ? outcome.output : `${outcome.output}\n`);
  } else if (outcome.output.length > 0) {
    process.stdout.write(outcome.output.endsWith('\n') ? outcome.output : `${outcome.output}\n`);
  }
  process.exitCode = outcome.exitCode;
}

export function formatError(error: unknown): string {
  if (error instanceof PromptsmithError) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function exitWithError(error: unknown): never {
  console.error(chalk.red('Error:'), formatError(error));
  process.exit(1);
}

/**
 * Commander collector for repeatable options.
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
