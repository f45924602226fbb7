import { describe, it, expect } from 'vitest';
import stripAnsi from 'strip-ansi';
import {
  formatDuration,
  renderDiagnostic,
  renderError,
  renderHeader,
} from '@/cli/renderer/output.js';
import { SchedulerError } from '@/engine/errors.js';

describe('formatDuration', () => {
  it('should show milliseconds below one second', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should show seconds with one decimal', () => {
    expect(formatDuration(2000)).toBe('2.0s');
    expect(formatDuration(3250)).toBe('3.3s');
  });
});

describe('renderHeader', () => {
  it('should box the program id and workload', () => {
    const output = stripAnsi(
      renderHeader({
        modeId: 3,
        mode: 'concurrent-synchronized',
        units: [
          { name: 'coffee', durationMs: 2000 },
          { name: 'toast', durationMs: 3000 },
        ],
      }),
    );

    const lines = output.split('\n');
    expect(lines[0].startsWith('╭')).toBe(true);
    expect(lines[lines.length - 1].startsWith('╰')).toBe(true);
    expect(output).toContain('Running program 3...');
    expect(output).toContain('coffee: 2.0s');
    expect(output).toContain('toast: 3.0s');
  });
});

describe('renderDiagnostic', () => {
  it('should prefix the info icon', () => {
    expect(renderDiagnostic('dispatch: coffee (2000ms)', { useColors: false })).toBe(
      '[i] dispatch: coffee (2000ms)',
    );
  });

  it('should keep the text when colored', () => {
    expect(stripAnsi(renderDiagnostic('joined'))).toBe('[i] joined');
  });
});

describe('renderError', () => {
  it('should render error messages', () => {
    expect(renderError(SchedulerError.resourceExhausted(2, 1), { useColors: false })).toBe(
      '[ERR] Cannot allocate 2 execution contexts (capacity 1)',
    );
  });

  it('should render non-error values', () => {
    expect(renderError('plain failure', { useColors: false })).toBe('[ERR] plain failure');
  });
});
