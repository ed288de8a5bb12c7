/**
 * CLI command: compose a prompt from a template and context values.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import type { Pipeline } from '../../core/pipeline/pipeline.js';
import {
  parseContextAssignments,
  loadContextFile,
  readStream,
  stagedDiffContext,
  mergeContexts,
} from '../../core/context/providers.js';
import {
  collect,
  emit,
  exitWithError,
  getGlobalOptions,
  loadPipeline,
  type CommandOutcome,
} from './shared.js';

export interface ComposeOptions {
  set?: string[];
  context?: string;
  diff?: boolean;
  stdin?: string;
  output?: string;
  json?: boolean;
  raw?: boolean;
}

/**
 * Build the context and compose. Later sources override earlier ones:
 * context file, then --diff, then --stdin, then --set.
 */
export async function runCompose(
  pipeline: Pipeline,
  templateName: string,
  options: ComposeOptions,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<CommandOutcome> {
  if (options.raw) {
    const resolved = await pipeline.resolve(templateName);
    return {
      output: options.json ? JSON.stringify(resolved, null, 2) : resolved.text,
      exitCode: 0,
    };
  }

  const cwd = process.cwd();
  const layers: Array<Map<string, string>> = [];
  if (options.context) {
    layers.push(await loadContextFile(path.resolve(cwd, options.context)));
  }
  if (options.diff) {
    layers.push(await stagedDiffContext(pipeline.projectRoot));
  }
  if (options.stdin) {
    layers.push(new Map([[options.stdin, await readStream(stdin)]]));
  }
  layers.push(await parseContextAssignments(options.set ?? [], cwd));

  const composition = await pipeline.compose(templateName, mergeContexts(...layers));

  return {
    output: options.json ? JSON.stringify(composition, null, 2) : composition.text,
    exitCode: 0,
  };
}

export function createComposeCommand(): Command {
  return new Command('compose')
    .description('Compose a prompt from a template, expanding @references and filling {{insertion points}}')
    .argument('<template>', 'Template name, relative to the template root')
    .option('-s, --set <key=value>', 'Bind an insertion point (repeatable; value @file reads a file)', collect, [])
    .option('-c, --context <file>', 'YAML or JSON file of context values')
    .option('--diff', 'Bind "diff" to the staged git diff')
    .option('--stdin <key>', 'Bind stdin to the given insertion point')
    .option('--raw', 'Print the resolved template without binding context')
    .option('-o, --output <file>', 'Write the prompt to a file instead of stdout')
    .option('--json', 'Output as JSON')
    .action(async (templateName: string, opts: ComposeOptions, command: Command) => {
      try {
        const pipeline = await loadPipeline(getGlobalOptions(command));
        await emit(await runCompose(pipeline, templateName, opts), opts.output);
      } catch (error) {
        exitWithError(error);
      }
    });
}
