/**
 * Tests for the templates command.
 */
import { describe, it, expect, vi } from 'vitest';
import { createTemplatesCommand, runTemplates } from '../../../../src/cli/commands/templates.js';
import { Pipeline } from '../../../../src/core/pipeline/pipeline.js';
import { MemoryTemplateSource } from '../../../../src/core/templates/sources.js';

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    cyan: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    blue: (s: string) => s,
    gray: (s: string) => s,
    magenta: (s: string) => s,
  },
}));

const TEMPLATES = {
  greet: '---\ndescription: Greeting\ninputs:\n  name: Who to greet\n---\nHello {{name}}\n@parts/sig.md\n',
  'parts/sig': '-- {{sender}}\n',
};

function createPipeline(templates: Record<string, string> = TEMPLATES): Pipeline {
  return new Pipeline('/project', undefined, { templateSource: new MemoryTemplateSource(templates) });
}

describe('templates command', () => {
  it('defines the command', () => {
    const command = createTemplatesCommand();

    expect(command.name()).toBe('templates');
    expect(command.options.map(o => o.long)).toEqual(['--json']);
  });

  it('lists templates with origin, description and inputs', async () => {
    const outcome = await runTemplates(createPipeline(), undefined, {});

    expect(outcome.output.split('\n')).toEqual([
      'greet.md      memory   Greeting [name, sender]',
      'parts/sig.md  memory  [sender]',
    ]);
    expect(outcome.exitCode).toBe(0);
  });

  it('marks a template that fails to resolve', async () => {
    const outcome = await runTemplates(
      createPipeline({ ok: '---\ndescription: Fine\n---\nFine\n', bad: '@missing.md\n' }),
      undefined,
      {}
    );

    expect(outcome.output.split('\n')).toEqual([
      "bad.md  memory  [error: Template 'missing.md' not found (referenced by 'bad.md')]",
      'ok.md   memory   Fine',
    ]);
    expect(outcome.exitCode).toBe(0);
  });

  it('lists templates as JSON', async () => {
    const outcome = await runTemplates(createPipeline(), undefined, { json: true });

    expect(JSON.parse(outcome.output)).toEqual([
      { name: 'greet.md', origin: 'memory', description: 'Greeting', inputs: ['name', 'sender'] },
      { name: 'parts/sig.md', origin: 'memory', inputs: ['sender'] },
    ]);
  });

  it('reports an empty library', async () => {
    expect((await runTemplates(createPipeline({}), undefined, {})).output).toBe('No templates found');
  });

  it('shows the inputs and includes of one template', async () => {
    const outcome = await runTemplates(createPipeline(), 'greet', {});

    expect(outcome.output.split('\n')).toEqual([
      'greet.md (memory)',
      '  Greeting',
      '',
      'Inputs:',
      '  name - Who to greet',
      '  sender',
      '',
      'Includes:',
      '  parts/sig.md',
    ]);
  });

  it('shows a template without inputs', async () => {
    const outcome = await runTemplates(createPipeline({ plain: 'Static text\n' }), 'plain', {});

    expect(outcome.output.split('\n')).toEqual(['plain.md (memory)', '', 'Inputs:', '  (none)']);
  });
});
