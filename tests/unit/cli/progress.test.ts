import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProgressBar } from '../../../src/cli/progress.js';
import { DetailedParseError } from '../../../src/errors.js';

describe('ProgressBar', () => {
  const wasTTY = process.stderr.isTTY;

  beforeEach(() => {
    Object.defineProperty(process.stderr, 'isTTY', { value: false, configurable: true });
  });

  afterEach(() => {
    Object.defineProperty(process.stderr, 'isTTY', { value: wasTTY, configurable: true });
    vi.restoreAllMocks();
  });

  it('initializes with correct defaults', () => {
    const bar = new ProgressBar(10);
    const stats = bar.getStats();

    expect(stats.totalFiles).toBe(10);
    expect(stats.filesProcessed).toBe(0);
    expect(stats.filesFailed).toBe(0);
    expect(stats.symbolsExtracted).toBe(0);
    expect(stats.dependenciesExtracted).toBe(0);
  });

  it('tracks progress reported by the pool', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bar = new ProgressBar(0);

    bar.logProgress(1, 4, 'src/a.c');
    bar.logProgress(2, 4, 'src/b.c');
    const stats = bar.getStats();

    expect(stats.totalFiles).toBe(4);
    expect(stats.filesProcessed).toBe(2);
    expect(stats.currentItem).toBe('src/b.c');
  });

  it('counts and prints failed files', () => {
    const output = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bar = new ProgressBar(3);
    const error = new DetailedParseError({ file: 'bad.go', kind: 'parse', reason: 'unexpected token', line: 2, column: 5 });

    bar.logError(error);

    expect(bar.getStats().filesFailed).toBe(1);
    expect(output.mock.calls).toEqual([['bad.go:2:5: unexpected token']]);
  });

  it('prints one line per quarter without a terminal', () => {
    const output = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bar = new ProgressBar(8);

    for (let i = 1; i <= 4; i++) bar.logProgress(i, 8, `f${i}.go`);

    expect(output.mock.calls).toEqual([['  Progress: 25% (2/8 files)'], ['  Progress: 50% (4/8 files)']]);
  });

  it('accumulates symbol and dependency totals', () => {
    const bar = new ProgressBar(5);

    bar.addSymbols(10);
    bar.addSymbols(5);
    bar.addDependencies(3);
    const stats = bar.getStats();

    expect(stats.symbolsExtracted).toBe(15);
    expect(stats.dependenciesExtracted).toBe(3);
  });

  it('records the current stage', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bar = new ProgressBar(0);

    bar.setStage('Extracting symbols', 2, 3);
    const stats = bar.getStats();

    expect(stats.stage).toBe('Extracting symbols');
    expect(stats.stageNumber).toBe(2);
    expect(stats.totalStages).toBe(3);
  });

  it('getStats returns a copy (not a reference)', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bar = new ProgressBar(5);
    bar.logProgress(1, 5, 'a.py');

    const stats1 = bar.getStats();
    bar.logProgress(2, 5, 'b.py');
    const stats2 = bar.getStats();

    expect(stats1.filesProcessed).toBe(1);
    expect(stats2.filesProcessed).toBe(2);
  });

  it('prints the extraction summary on finish', () => {
    const output = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bar = new ProgressBar(2);
    bar.addSymbols(7);

    bar.finish();

    const lines = output.mock.calls.map(call => String(call[0]));
    expect(lines.some(line => line.includes('--- Extraction Summary ---'))).toBe(true);
    expect(lines.some(line => line.startsWith('Files processed:'))).toBe(true);
    expect(lines.some(line => line.startsWith('Symbols extracted:') && line.includes('7'))).toBe(true);
  });
});
