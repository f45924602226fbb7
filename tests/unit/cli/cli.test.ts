import { describe, it, expect } from 'vitest';
import { program } from '@/cli/index.js';

describe('CLI Entry Point', () => {
  describe('Program Configuration', () => {
    it('should have correct name', () => {
      expect(program.name()).toBe('breakfast');
    });

    it('should have a description', () => {
      expect(program.description()).toContain('sequential vs. concurrent task execution');
    });

    it('should have a version', () => {
      const version = program.version();
      expect(version).toMatch(/^\d+\.\d+\.\d+/); // Semver format
    });
  });

  describe('Commands', () => {
    it('should register run and modes commands', () => {
      const names = program.commands.map((cmd) => cmd.name());
      expect(names).toEqual(['run', 'modes']);
    });
  });
});

describe('Run Command', () => {
  const runCommand = program.commands.find((cmd) => cmd.name() === 'run');

  it('should take an optional mode argument defaulting to 3', () => {
    const [modeArgument] = runCommand?.registeredArguments ?? [];
    expect(modeArgument?.name()).toBe('mode');
    expect(modeArgument?.required).toBe(false);
    expect(modeArgument?.defaultValue).toBe(3);
  });

  it('should have a repeatable --unit option', () => {
    const unitOption = runCommand?.options.find((opt) => opt.long === '--unit');
    expect(unitOption).toBeDefined();
    expect(unitOption?.mandatory).toBe(false);
    expect(unitOption?.description).toContain('repeatable');
  });

  it('should have --chunk-size and --max-concurrent options', () => {
    const longs = runCommand?.options.map((opt) => opt.long);
    expect(longs).toContain('--chunk-size');
    expect(longs).toContain('--max-concurrent');
  });

  it('should have a negatable --no-banner option', () => {
    const bannerOption = runCommand?.options.find((opt) => opt.long === '--no-banner');
    expect(bannerOption?.negate).toBe(true);
  });

  it('should have --verbose option with default false', () => {
    const verboseOption = runCommand?.options.find((opt) => opt.long === '--verbose');
    expect(verboseOption?.defaultValue).toBe(false);
  });
});

describe('Modes Command', () => {
  const modesCommand = program.commands.find((cmd) => cmd.name() === 'modes');

  it('should have --format option with default "table"', () => {
    const formatOption = modesCommand?.options.find((opt) => opt.long === '--format');
    expect(formatOption?.defaultValue).toBe('table');
  });
});
