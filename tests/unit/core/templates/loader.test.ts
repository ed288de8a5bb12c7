/**
 * Tests for the template loader.
 */
import { describe, it, expect } from 'vitest';
import { TemplateLoader } from '../../../../src/core/templates/loader.js';
import { MemoryTemplateSource } from '../../../../src/core/templates/sources.js';
import { SecurityError, TemplateError } from '../../../../src/utils/errors.js';

function loaderFor(templates: Record<string, string>, maxDepth?: number): TemplateLoader {
  return new TemplateLoader(new MemoryTemplateSource(templates), { maxDepth });
}

describe('TemplateLoader', () => {
  describe('reference expansion', () => {
    it('expands nested references depth-first in place', async () => {
      const loader = loaderFor({
        main: 'Header\n@parts/a.md\nFooter\n',
        'parts/a': 'A1\n@parts/b.md\n',
        'parts/b.md': 'B\n',
      });

      const template = await loader.load('main');

      expect(template.name).toBe('main.md');
      expect(template.text).toBe('Header\nA1\nB\nFooter\n');
      expect(template.includes).toEqual(['parts/a.md', 'parts/b.md']);
      expect(template.origin).toBe('memory');
    });

    it('returns a template without references unchanged', async () => {
      const loader = loaderFor({ plain: 'Just text\n' });

      const template = await loader.load('plain.md');

      expect(template.text).toBe('Just text\n');
      expect(template.includes).toEqual([]);
    });

    it('includes the same template twice when referenced twice', async () => {
      const loader = loaderFor({ main: '@rule.md\n---\n@rule.md\n', rule: 'Be brief.\n' });

      const template = await loader.load('main');

      expect(template.text).toBe('Be brief.\n---\nBe brief.\n');
      expect(template.includes).toEqual(['rule.md']);
    });

    it('resolves ./ references relative to the including template', async () => {
      const loader = loaderFor({ 'dir/a': '@./b.md', 'dir/b': 'B' });

      const template = await loader.load('dir/a');

      expect(template.text).toBe('B');
      expect(template.includes).toEqual(['dir/b.md']);
    });

    it('leaves references in fenced code blocks literal', async () => {
      const loader = loaderFor({ doc: '```\n@missing.md\n```\n' });

      const template = await loader.load('doc');

      expect(template.text).toBe('```\n@missing.md\n```\n');
    });

    it('leaves email addresses literal', async () => {
      const loader = loaderFor({ doc: 'Mail team@example.md today\n' });

      expect((await loader.load('doc')).text).toBe('Mail team@example.md today\n');
    });

    it('expands references with a configured extension', async () => {
      const source = new MemoryTemplateSource({ main: 'A\n@part.txt\n@note.md\n', part: 'B\n' }, '.txt');
      const loader = new TemplateLoader(source, { extension: '.txt' });

      const template = await loader.load('main');

      expect(template.name).toBe('main.txt');
      expect(template.text).toBe('A\nB\n@note.md\n');
      expect(template.includes).toEqual(['part.txt']);
    });
  });

  describe('errors', () => {
    it('reports a missing top-level template', async () => {
      const loader = loaderFor({});

      await expect(loader.load('nope')).rejects.toThrow(TemplateError);
      await expect(loader.load('nope')).rejects.toThrow("Template 'nope.md' not found");
    });

    it('reports a missing referenced template with its includer', async () => {
      const loader = loaderFor({ a: '@missing.md\n' });

      await expect(loader.load('a')).rejects.toMatchObject({
        code: 'T001',
        message: "Template 'missing.md' not found (referenced by 'a.md')",
      });
    });

    it('detects a cycle between two templates', async () => {
      const loader = loaderFor({ a: '@b.md\n', b: '@a.md\n' });

      await expect(loader.load('a')).rejects.toMatchObject({
        code: 'T002',
        message: 'Cyclic template reference: a.md → b.md → a.md',
        details: { template: 'a.md', cycle: ['a.md', 'b.md', 'a.md'] },
      });
    });

    it('detects a template that references itself', async () => {
      const loader = loaderFor({ a: 'x @a.md' });

      await expect(loader.load('a')).rejects.toMatchObject({
        code: 'T002',
        message: 'Cyclic template reference: a.md → a.md',
      });
    });

    it('enforces the maximum depth', async () => {
      const templates = { l0: '@l1.md', l1: '@l2.md', l2: '@l3.md', l3: 'end' };

      await expect(loaderFor(templates, 2).load('l0')).rejects.toMatchObject({ code: 'T003' });
      await expect(loaderFor(templates, 3).load('l0')).resolves.toMatchObject({ text: 'end' });
    });

    it('rejects names outside the template root', async () => {
      const loader = loaderFor({ a: '@../../x.md' });

      await expect(loader.load('../secret')).rejects.toThrow(SecurityError);
      await expect(loader.load('a')).rejects.toThrow(SecurityError);
    });
  });

  describe('metadata', () => {
    it('lists insertion points in text order, then declared-only inputs', async () => {
      const loader = loaderFor({
        t: '---\ndescription: Greeting\ninputs:\n  extra: Extra notes\n---\nHello {{name}} and {{ name }} \\{{skip}}\n',
      });

      const template = await loader.load('t');

      expect(template.description).toBe('Greeting');
      expect(template.insertionPoints).toEqual(['name', 'extra']);
      expect(template.inputs).toEqual({ extra: 'Extra notes' });
      expect(template.text).toBe('Hello {{name}} and {{ name }} \\{{skip}}\n');
    });

    it('merges inputs from includes without overriding the includer', async () => {
      const loader = loaderFor({
        parent: '---\ninputs:\n  a: parent\n---\n@child.md\n',
        child: '---\ninputs:\n  a: child\n  b: from child\n---\n{{a}} {{b}}\n',
      });

      const template = await loader.load('parent');

      expect(template.inputs).toEqual({ a: 'parent', b: 'from child' });
      expect(template.text).toBe('{{a}} {{b}}\n');
      expect(template.insertionPoints).toEqual(['a', 'b']);
    });
  });
});
