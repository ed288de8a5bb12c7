/**
 * Tests for declarative check evaluators.
 */
import { describe, it, expect } from 'vitest';
import {
  ForbidPatternEvaluator,
  RequirePatternEvaluator,
  MaxLineLengthEvaluator,
  MaxLinesEvaluator,
  FirstLineEvaluator,
  RequireSectionEvaluator,
  compileCheck,
  evaluateCheck,
  getCheckTypes,
  isCheckType,
} from '../../../../src/core/checklists/checks/index.js';
import { createArtifact } from '../../../../src/core/validation/validator.js';
import { ChecklistError } from '../../../../src/utils/errors.js';

describe('ForbidPatternEvaluator', () => {
  const evaluator = new ForbidPatternEvaluator();

  it('passes when the pattern is absent', () => {
    const outcome = evaluator.evaluate(
      { type: 'forbid_pattern', pattern: 'eval\\(', flags: 'm' },
      createArtifact('print("ok")\n')
    );

    expect(outcome).toEqual({ result: 'pass' });
  });

  it('reports the first match and its line', () => {
    const outcome = evaluator.evaluate(
      { type: 'forbid_pattern', pattern: 'eval\\(', flags: 'm' },
      createArtifact('ok\neval(x)\n')
    );

    expect(outcome).toEqual({ result: 'fail', message: 'Forbidden pattern found on line 2: eval(', line: 2 });
  });

  it('lists every line with a match', () => {
    const outcome = evaluator.evaluate(
      { type: 'forbid_pattern', pattern: 'password', flags: 'm' },
      createArtifact('a\npassword = "x"\nb\npassword = "y"\n')
    );

    expect(outcome).toEqual({ result: 'fail', message: 'Forbidden pattern found on lines 2, 4: password', line: 2 });
  });

  it('honours flags', () => {
    const check = { type: 'forbid_pattern' as const, pattern: '^secret', flags: 'im' };

    expect(evaluator.evaluate(check, createArtifact('x\nSECRET=1\n')).result).toBe('fail');
    expect(evaluator.evaluate({ ...check, flags: '' }, createArtifact('x\nSECRET=1\n')).result).toBe('pass');
  });
});

describe('RequirePatternEvaluator', () => {
  const evaluator = new RequirePatternEvaluator();
  const check = { type: 'require_pattern' as const, pattern: 'TODO', flags: 'm', min_count: 1 };

  it('passes when found often enough', () => {
    expect(evaluator.evaluate(check, createArtifact('TODO\n'))).toEqual({ result: 'pass' });
  });

  it('fails when not found', () => {
    expect(evaluator.evaluate(check, createArtifact('done\n'))).toEqual({
      result: 'fail',
      message: 'Required pattern not found: TODO',
    });
  });

  it('fails when found too few times', () => {
    expect(evaluator.evaluate({ ...check, min_count: 3 }, createArtifact('TODO\nTODO\n'))).toEqual({
      result: 'fail',
      message: 'Required pattern found 2 times, expected at least 3: TODO',
    });
    expect(evaluator.evaluate({ ...check, min_count: 2 }, createArtifact('TODO\n')).message).toBe(
      'Required pattern found 1 time, expected at least 2: TODO'
    );
  });
});

describe('MaxLineLengthEvaluator', () => {
  const evaluator = new MaxLineLengthEvaluator();

  it('reports long lines', () => {
    const artifact = createArtifact('short\nxxxxxxxxxxxx\nok\nhttps://example.com/very/long\n');

    expect(evaluator.evaluate({ type: 'max_line_length', max: 10 }, artifact)).toEqual({
      result: 'fail',
      message: 'Lines longer than 10 characters: 2, 4',
      line: 2,
    });
  });

  it('skips lines matching the ignore pattern', () => {
    const artifact = createArtifact('short\nxxxxxxxxxxxx\nok\nhttps://example.com/very/long\n');

    expect(
      evaluator.evaluate({ type: 'max_line_length', max: 10, ignore_pattern: '^https?://' }, artifact)
    ).toEqual({ result: 'fail', message: 'Lines longer than 10 characters: 2', line: 2 });
  });

  it('truncates long offender lists', () => {
    const artifact = createArtifact(Array.from({ length: 7 }, () => 'x'.repeat(5)).join('\n'));

    expect(evaluator.evaluate({ type: 'max_line_length', max: 4 }, artifact).message).toBe(
      'Lines longer than 4 characters: 1, 2, 3, 4, 5 (+2 more)'
    );
  });

  it('passes at exactly the limit', () => {
    expect(evaluator.evaluate({ type: 'max_line_length', max: 5 }, createArtifact('12345\n'))).toEqual({ result: 'pass' });
  });
});

describe('MaxLinesEvaluator', () => {
  const evaluator = new MaxLinesEvaluator();

  it('counts lines without the trailing newline', () => {
    expect(evaluator.evaluate({ type: 'max_lines', max: 2 }, createArtifact('a\nb\n'))).toEqual({ result: 'pass' });
    expect(evaluator.evaluate({ type: 'max_lines', max: 2 }, createArtifact('a\nb\nc\n'))).toEqual({
      result: 'fail',
      message: 'Artifact has 3 lines, limit is 2',
    });
  });
});

describe('FirstLineEvaluator', () => {
  const evaluator = new FirstLineEvaluator();
  const artifact = createArtifact('\n\nfeat: add thing\n\nBody\n');

  it('checks the first non-blank line length', () => {
    expect(evaluator.evaluate({ type: 'first_line', max_length: 10, flags: '' }, artifact)).toEqual({
      result: 'fail',
      message: 'First line is 15 characters, limit is 10',
      line: 3,
    });
  });

  it('checks the first line shape', () => {
    expect(evaluator.evaluate({ type: 'first_line', pattern: '^(feat|fix):', flags: '' }, artifact)).toEqual({
      result: 'pass',
    });
    expect(evaluator.evaluate({ type: 'first_line', pattern: '^fix:', flags: '' }, artifact)).toEqual({
      result: 'fail',
      message: 'First line does not match ^fix:: feat: add thing',
      line: 3,
    });
  });

  it('fails on an empty artifact', () => {
    expect(evaluator.evaluate({ type: 'first_line', max_length: 72, flags: '' }, createArtifact(' \n'))).toEqual({
      result: 'fail',
      message: 'Artifact is empty',
    });
  });
});

describe('RequireSectionEvaluator', () => {
  const evaluator = new RequireSectionEvaluator();
  const artifact = createArtifact('# Title\n\n## Usage\n\nRun it.\n');

  it('matches headings case-insensitively at any level', () => {
    expect(evaluator.evaluate({ type: 'require_section', heading: 'usage' }, artifact)).toEqual({ result: 'pass' });
  });

  it('matches a specific level', () => {
    expect(evaluator.evaluate({ type: 'require_section', heading: 'Usage', level: 2 }, artifact).result).toBe('pass');
    expect(evaluator.evaluate({ type: 'require_section', heading: 'usage', level: 3 }, artifact)).toEqual({
      result: 'fail',
      message: 'Missing section: ### usage',
    });
  });

  it('treats the heading literally', () => {
    expect(evaluator.evaluate({ type: 'require_section', heading: 'C++ (API)' }, createArtifact('## C++ (API)\n')).result).toBe('pass');
    expect(evaluator.evaluate({ type: 'require_section', heading: 'Installation' }, artifact)).toEqual({
      result: 'fail',
      message: 'Missing section: Installation',
    });
  });
});

describe('registry', () => {
  it('knows every check type', () => {
    expect(getCheckTypes()).toEqual([
      'forbid_pattern',
      'require_pattern',
      'max_line_length',
      'max_lines',
      'first_line',
      'require_section',
    ]);
    expect(isCheckType('max_lines')).toBe(true);
    expect(isCheckType('toString')).toBe(false);
  });

  it('rejects invalid regexes at compile time', () => {
    expect(() => compileCheck({ type: 'forbid_pattern', pattern: '(', flags: 'm' })).toThrow(ChecklistError);
    expect(() => compileCheck({ type: 'first_line', pattern: '[', flags: '' })).toThrow(
      /^Invalid regex in first_line check: \[/
    );
  });

  it('dispatches evaluation by type', () => {
    expect(evaluateCheck({ type: 'max_lines', max: 1 }, createArtifact('a\nb')).result).toBe('fail');
  });
});
