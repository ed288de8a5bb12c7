/**
 * CLI command: list templates, or show one resolved template's inputs.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import type { Pipeline } from '../../core/pipeline/pipeline.js';
import { emit, exitWithError, getGlobalOptions, loadPipeline, type CommandOutcome } from './shared.js';

export interface TemplatesOptions {
  json?: boolean;
}

export async function runTemplates(
  pipeline: Pipeline,
  name: string | undefined,
  options: TemplatesOptions
): Promise<CommandOutcome> {
  if (name) {
    const template = await pipeline.resolve(name);
    if (options.json) {
      return { output: JSON.stringify(template, null, 2), exitCode: 0 };
    }

    const lines = [chalk.bold(template.name) + chalk.dim(` (${template.origin})`)];
    if (template.description) {
      lines.push(`  ${template.description}`);
    }
    lines.push('', 'Inputs:');
    if (template.insertionPoints.length === 0) {
      lines.push(chalk.dim('  (none)'));
    }
    for (const point of template.insertionPoints) {
      const description = template.inputs[point];
      lines.push(description ? `  ${point} - ${description}` : `  ${point}`);
    }
    if (template.includes.length > 0) {
      lines.push('', 'Includes:');
      lines.push(...template.includes.map(include => `  ${include}`));
    }
    return { output: lines.join('\n'), exitCode: 0 };
  }

  const templates = await pipeline.listTemplates();
  if (options.json) {
    return { output: JSON.stringify(templates, null, 2), exitCode: 0 };
  }
  if (templates.length === 0) {
    return { output: chalk.dim('No templates found'), exitCode: 0 };
  }

  const width = Math.max(...templates.map(t => t.name.length));
  const lines = templates.map(t => {
    const inputs = t.inputs.length > 0 ? chalk.cyan(` [${t.inputs.join(', ')}]`) : '';
    const description = t.description ? `  ${t.description}` : '';
    const error = t.error ? chalk.red(` [error: ${t.error}]`) : '';
    return `${t.name.padEnd(width)}  ${chalk.dim(t.origin.padEnd(7))}${description}${inputs}${error}`;
  });
  return { output: lines.join('\n'), exitCode: 0 };
}

export function createTemplatesCommand(): Command {
  return new Command('templates')
    .description('List available templates, or show the inputs and includes of one')
    .argument('[name]', 'Template to inspect')
    .option('--json', 'Output as JSON')
    .action(async (name: string | undefined, opts: TemplatesOptions, command: Command) => {
      try {
        const pipeline = await loadPipeline(getGlobalOptions(command));
        await emit(await runTemplates(pipeline, name, opts));
      } catch (error) {
        exitWithError(error);
      }
    });
}
