/**
 * CLI command: initialize a project's .promptsmith directory.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { getDefaultConfig, getConfigPath, configExists } from '../../core/config/loader.js';
import { ensureDir, writeFile } from '../../utils/file-system.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';
import { exitWithError, getGlobalOptions, resolveProjectRoot } from './shared.js';

export interface InitOptions {
  force?: boolean;
}

export interface InitResult {
  created: string[];
  skipped: string[];
}

const CONFIG_HEADER = '# promptsmith configuration\n# Project templates and checklists shadow the built-in library by name.\n\n';

export async function runInit(projectRoot: string, options: InitOptions): Promise<InitResult> {
  const config = getDefaultConfig();
  const result: InitResult = { created: [], skipped: [] };

  const configPath = getConfigPath(projectRoot);
  if ((await configExists(projectRoot)) && !options.force) {
    result.skipped.push(configPath);
  } else {
    await writeFile(configPath, CONFIG_HEADER + stringifyYaml(config));
    result.created.push(configPath);
  }

  for (const dir of [config.templates.dir, config.checklists.dir]) {
    const dirPath = path.resolve(projectRoot, dir);
    await ensureDir(dirPath);
    result.created.push(dirPath);
  }

  return result;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create .promptsmith/config.yaml and the project template and checklist directories')
    .option('--force', 'Overwrite an existing config file')
    .action(async (opts: InitOptions, command: Command) => {
      try {
        const projectRoot = resolveProjectRoot(getGlobalOptions(command));
        const result = await runInit(projectRoot, opts);
        for (const file of result.created) {
          logger.success(`Created ${path.relative(projectRoot, file) || '.'}`);
        }
        for (const file of result.skipped) {
          logger.warn(`Kept existing ${path.relative(projectRoot, file)} (use --force to overwrite)`);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
