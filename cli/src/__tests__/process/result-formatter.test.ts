/**
 * Tests for the result formatter.
 */

import { capitalize, formatOutcome } from '../../process/result-formatter.js';
import type { CommandOutcome } from '../../process/i-process-invoker.js';
import { failed, succeeded } from '../bridge-fakes.js';

describe('formatOutcome', () => {
  it('reports a failure without output using the lower-case label', () => {
    expect(formatOutcome(failed('', 'exit status 1'), 'build')).toBe(
      'build failed: exit status 1\n'
    );
  });

  it('reports a failure with output verbatim', () => {
    expect(formatOutcome(failed('panic: x\n', 'exit status 2'), 'run')).toBe(
      'Run failed:\npanic: x\n'
    );
  });

  it('reports a silent success', () => {
    expect(formatOutcome(succeeded(), 'build')).toBe('Build successful\n');
    expect(formatOutcome(succeeded(), 'run')).toBe('Run successful\n');
  });

  it('reports a success with output', () => {
    expect(formatOutcome(succeeded('hello\n'), 'run')).toBe(
      'Run output:\nhello\n'
    );
  });

  it('does not trim or reformat captured output', () => {
    const output = '  indented\n\n\ttrailing  ';

    expect(formatOutcome(succeeded(output), 'build')).toBe(
      `Build output:\n${output}`
    );
  });

  it('decodes multi-byte UTF-8 output', () => {
    expect(formatOutcome(succeeded('héllo ✓\n'), 'run')).toBe(
      'Run output:\nhéllo ✓\n'
    );
  });

  it('falls back to "unknown error" when a failure carries no error', () => {
    const outcome: CommandOutcome = {
      succeeded: false,
      output: Buffer.alloc(0),
    };

    expect(formatOutcome(outcome, 'build')).toBe(
      'build failed: unknown error\n'
    );
  });

  it('returns identical strings for equal inputs', () => {
    const first = formatOutcome(failed('oops\n', 'exit status 1'), 'build');
    const second = formatOutcome(failed('oops\n', 'exit status 1'), 'build');

    expect(first).toBe(second);
  });
});

describe('capitalize', () => {
  it('upper-cases the first character only', () => {
    expect(capitalize('build')).toBe('Build');
    expect(capitalize('go vet')).toBe('Go vet');
  });

  it('leaves an empty label empty', () => {
    expect(capitalize('')).toBe('');
  });
});
