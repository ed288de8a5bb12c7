/**
 * Tests for shared CLI helpers.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { collect, emit, formatError } from '../../../../src/cli/commands/shared.js';
import { TemplateError } from '../../../../src/utils/errors.js';

describe('shared command helpers', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  describe('formatError', () => {
    it('prefixes pipeline errors with their code', () => {
      expect(formatError(new TemplateError('T001', "Template 'x.md' not found"))).toBe("[T001] Template 'x.md' not found");
    });

    it('uses the message of other errors', () => {
      expect(formatError(new Error('plain'))).toBe('plain');
      expect(formatError('text')).toBe('text');
    });
  });

  describe('collect', () => {
    it('accumulates repeated values', () => {
      expect(collect('b=2', collect('a=1'))).toEqual(['a=1', 'b=2']);
    });
  });

  describe('emit', () => {
    it('writes output with a trailing newline and sets the exit code', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await emit({ output: 'hello', exitCode: 2 });

      expect(writeSpy).toHaveBeenCalledWith('hello\n');
      expect(process.exitCode).toBe(2);
    });

    it('writes nothing for empty output', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await emit({ output: '', exitCode: 0 });

      expect(writeSpy).not.toHaveBeenCalled();
    });
  });
});
