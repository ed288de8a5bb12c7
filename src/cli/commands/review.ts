/**
 * CLI command: review an artifact against a checklist.
 */
import { Command, Option } from 'commander';
import * as path from 'node:path';
import type { Pipeline } from '../../core/pipeline/pipeline.js';
import type { OutputFormat } from '../../core/config/schema.js';
import { readStream } from '../../core/context/providers.js';
import { createArtifact } from '../../core/validation/validator.js';
import { readFile, fileExists } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { createFormatter } from '../formatters/index.js';
import { emit, exitWithError, getGlobalOptions, loadPipeline, type CommandOutcome } from './shared.js';

export interface ReviewOptions {
  format?: OutputFormat;
  json?: boolean;
  showPassing?: boolean;
  color?: boolean;
}

export async function runReview(
  pipeline: Pipeline,
  checklistName: string,
  artifactPath: string | undefined,
  options: ReviewOptions,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<CommandOutcome> {
  const format: OutputFormat = options.json ? 'json' : options.format ?? pipeline.config.review.output_format;

  let text: string;
  let name: string | undefined;
  if (artifactPath && artifactPath !== '-') {
    const filePath = path.resolve(artifactPath);
    if (!(await fileExists(filePath))) {
      throw new SystemError(
        ErrorCodes.FILE_NOT_FOUND,
        `Artifact not found: ${filePath}`,
        { artifact: filePath }
      );
    }
    text = await readFile(filePath);
    name = artifactPath;
  } else {
    text = await readStream(stdin);
  }

  const report = await pipeline.review(createArtifact(text, name), checklistName);
  const formatter = createFormatter(format, {
    colors: options.color ?? true,
    showPassing: options.showPassing ?? false,
  });
  const { exit_codes } = pipeline.config.review;

  return {
    output: formatter.formatReport(report),
    exitCode: report.status === 'PASS' ? exit_codes.success : exit_codes.blocked,
  };
}

export function createReviewCommand(): Command {
  return new Command('review')
    .description('Review an artifact (commit message, script, docs) against a checklist')
    .argument('<checklist>', 'Checklist name')
    .argument('[artifact]', 'File to review (default: stdin)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['human', 'json', 'compact']))
    .option('--json', 'Output as JSON (same as --format json)')
    .option('--show-passing', 'Include passing items in human output')
    .option('--no-color', 'Disable colors')
    .action(async (checklistName: string, artifactPath: string | undefined, opts: ReviewOptions, command: Command) => {
      try {
        const pipeline = await loadPipeline(getGlobalOptions(command));
        await emit(await runReview(pipeline, checklistName, artifactPath, opts));
      } catch (error) {
        exitWithError(error);
      }
    });
}
