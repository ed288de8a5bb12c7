/**
 * Location of the bundled template and checklist library.
 * Both src/ and dist/ sit directly under the package root, beside library/.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const BUILTIN_LIBRARY_ROOT = path.resolve(__dirname, '../../../library');

export function getBuiltinTemplatesDir(): string {
  return path.join(BUILTIN_LIBRARY_ROOT, 'templates');
}

export function getBuiltinChecklistsDir(): string {
  return path.join(BUILTIN_LIBRARY_ROOT, 'checklists');
}
