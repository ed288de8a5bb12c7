import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';
import { createComposeCommand } from './commands/compose.js';
import { createReviewCommand } from './commands/review.js';
import { createTemplatesCommand } from './commands/templates.js';
import { createChecklistsCommand } from './commands/checklists.js';
import { createInitCommand } from './commands/init.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('promptsmith')
    .description('Compose AI-assistant prompts from Markdown templates and review what comes back against checklists')
    .version(readVersion())
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('--config <file>', 'Config file, relative to the project root')
    .option('-v, --verbose', 'Debug logging')
    .option('-q, --quiet', 'Only print results')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.verbose === true) {
        logger.setLevel('debug');
      } else if (opts.quiet === true) {
        logger.setLevel('silent');
      }
    });

  [createComposeCommand, createReviewCommand, createTemplatesCommand, createChecklistsCommand, createInitCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
