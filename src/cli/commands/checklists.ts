/**
 * CLI command: list checklists, or show the items of one.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import type { Pipeline } from '../../core/pipeline/pipeline.js';
import { emit, exitWithError, getGlobalOptions, loadPipeline, type CommandOutcome } from './shared.js';

export interface ChecklistsOptions {
  json?: boolean;
}

export async function runChecklists(
  pipeline: Pipeline,
  name: string | undefined,
  options: ChecklistsOptions
): Promise<CommandOutcome> {
  if (name) {
    const checklist = await pipeline.checklists.load(name);
    if (options.json) {
      return { output: JSON.stringify(checklist, null, 2), exitCode: 0 };
    }

    const lines = [chalk.bold(checklist.name) + chalk.dim(` (${checklist.origin})`)];
    if (checklist.description) {
      lines.push(`  ${checklist.description}`);
    }
    lines.push('');
    for (const item of checklist.items) {
      const check = item.check ? chalk.dim(` [${item.check.type}]`) : chalk.dim(' [manual]');
      lines.push(`  ${item.severity.toUpperCase().padEnd(8)} ${item.id}: ${item.description}${check}`);
    }
    return { output: lines.join('\n'), exitCode: 0 };
  }

  const checklists = await pipeline.listChecklists();
  if (options.json) {
    return { output: JSON.stringify(checklists, null, 2), exitCode: 0 };
  }
  if (checklists.length === 0) {
    return { output: chalk.dim('No checklists found'), exitCode: 0 };
  }

  const width = Math.max(...checklists.map(c => c.name.length));
  const lines = checklists.map(c => {
    const description = c.description ? `  ${c.description}` : '';
    return `${c.name.padEnd(width)}  ${chalk.dim(c.origin.padEnd(7))}  ${String(c.items).padStart(2)} items${description}`;
  });
  return { output: lines.join('\n'), exitCode: 0 };
}

export function createChecklistsCommand(): Command {
  return new Command('checklists')
    .description('List available checklists, or show the items of one')
    .argument('[name]', 'Checklist to inspect')
    .option('--json', 'Output as JSON')
    .action(async (name: string | undefined, opts: ChecklistsOptions, command: Command) => {
      try {
        const pipeline = await loadPipeline(getGlobalOptions(command));
        await emit(await runChecklists(pipeline, name, opts));
      } catch (error) {
        exitWithError(error);
      }
    });
}
