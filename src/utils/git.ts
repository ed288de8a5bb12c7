/**
 * Git integration utilities.
 * Supplies diff text for the `diff` insertion point of commit-message templates.
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import { SystemError, ErrorCodes } from './errors.js';

const execFileAsync = promisify(execFile);

/** Diffs larger than this are rejected rather than pasted into a prompt. */
const MAX_DIFF_BUFFER = 16 * 1024 * 1024;

async function runGit(projectRoot: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execFileAsync('git', args, {
      cwd: projectRoot,
      encoding: 'utf-8',
      maxBuffer: MAX_DIFF_BUFFER,
    });
    return stdout;
  } catch (error) {
    throw new SystemError(
      ErrorCodes.GIT_ERROR,
      `git ${args.join(' ')} failed: ${error instanceof Error ? error.message : String(error)}`,
      { projectRoot, args }
    );
  }
}

/**
 * Get the staged diff (`git diff --staged`).
 *
 * @param projectRoot - Root directory of the repository
 * @returns Unified diff text; empty when nothing is staged
 */
export async function getStagedDiff(projectRoot: string): Promise<string> {
  return runGit(projectRoot, ['diff', '--staged', '--no-color']);
}
