import { describe, it, expect, afterAll } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ParserPool, optimalWorkerCount, type ProgressReporter } from '../../../src/parser/pool.js';
import type { ExtractorRegistry, LanguageExtractor } from '../../../src/parser/extractors/index.js';
import { createParsedFile } from '../../../src/parser/extractors/base.js';
import type { DetailedParseError } from '../../../src/errors.js';
import type { LanguageTag, SourceFile } from '../../../src/types.js';

function source(path: string, language: LanguageTag = 'go'): SourceFile {
  return { path, absolutePath: path, language, size: 0 };
}

/** Extractor that resolves after a delay and records how many runs overlap. */
function trackingExtractor(delayMs: number) {
  const state = { inFlight: 0, maxInFlight: 0 };
  const extractor: LanguageExtractor = {
    language: 'go',
    displayName: 'Fake',
    extensions: ['.fake'],
    async extract(file) {
      state.inFlight++;
      state.maxInFlight = Math.max(state.maxInFlight, state.inFlight);
      await new Promise(resolve => setTimeout(resolve, delayMs));
      state.inFlight--;
      return { file: createParsedFile(file.path, 'go', 'content'), error: null };
    },
    extractSource(filePath, content) {
      return { file: createParsedFile(filePath, 'go', content), error: null };
    },
  };
  return { extractor, state };
}

function registryOf(extractor: LanguageExtractor): ExtractorRegistry {
  return { getExtractor: language => (language === extractor.language ? extractor : undefined) };
}

describe('ParserPool', () => {
  const tempDir = mkdtempSync(join(tmpdir(), 'pool-test-'));

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('extracts real files and reports unreadable ones without losing the rest', async () => {
    const good = join(tempDir, 'main.go');
    writeFileSync(good, 'package main\n\nfunc Hello() string { return "hi" }\n');

    const files: SourceFile[] = [
      { path: 'main.go', absolutePath: good, language: 'go', size: 0 },
      { path: 'missing1.go', absolutePath: join(tempDir, 'missing1.go'), language: 'go', size: 0 },
      { path: 'missing2.py', absolutePath: join(tempDir, 'missing2.py'), language: 'python', size: 0 },
    ];

    const pool = new ParserPool({ workers: 2 });
    const { parsedFiles, errors } = await pool.process(files);

    expect(errors).toHaveLength(2);
    expect(errors.map(e => e.file).sort()).toEqual(['missing1.go', 'missing2.py']);
    expect(errors.every(e => e.kind === 'filesystem')).toBe(true);

    const main = parsedFiles.find(f => f.path === 'main.go');
    expect(main?.symbols.map(s => s.name)).toEqual(['main', 'Hello']);
    expect(main?.dependencies).toEqual([]);
  });

  it('returns an empty parsed file for each unreadable file', async () => {
    const files = [source('gone.go'), source('gone.py', 'python')].map(f => ({
      ...f,
      absolutePath: join(tempDir, f.path),
    }));

    const { parsedFiles, errors } = await new ParserPool({ workers: 2 }).process(files);

    expect(parsedFiles.map(f => f.path).sort()).toEqual(['gone.go', 'gone.py']);
    expect(parsedFiles.every(f => f.symbols.length === 0 && f.checksum === '')).toBe(true);
    expect(errors.map(e => e.kind)).toEqual(['filesystem', 'filesystem']);
  });

  it('never runs more extractions at once than the worker count', async () => {
    const { extractor, state } = trackingExtractor(5);
    const pool = new ParserPool({ workers: 3, registry: registryOf(extractor) });

    const files = Array.from({ length: 12 }, (_, i) => source(`f${i}.go`));
    const { parsedFiles, errors } = await pool.process(files);

    expect(parsedFiles).toHaveLength(12);
    expect(errors).toHaveLength(0);
    expect(state.maxInFlight).toBeLessThanOrEqual(3);
    expect(state.maxInFlight).toBeGreaterThan(1);
  });

  it('reports an unsupported language as a mapping error', async () => {
    const { extractor } = trackingExtractor(0);
    const pool = new ParserPool({ workers: 1, registry: registryOf(extractor) });

    const { parsedFiles, errors } = await pool.process([source('a.go'), source('b.swift', 'swift')]);

    expect(parsedFiles.map(f => f.path)).toEqual(['a.go']);
    expect(errors).toHaveLength(1);
    expect(errors[0].kind).toBe('mapping');
    expect(errors[0].message).toBe('b.swift: unsupported language: swift');
  });

  it('turns a throwing extractor into a mapping error', async () => {
    const throwing: LanguageExtractor = {
      language: 'go',
      displayName: 'Broken',
      extensions: ['.broken'],
      async extract() {
        throw new Error('boom');
      },
      extractSource(filePath, content) {
        return { file: createParsedFile(filePath, 'go', content), error: null };
      },
    };
    const pool = new ParserPool({ workers: 2, registry: registryOf(throwing) });

    const { parsedFiles, errors } = await pool.process([source('x.go')]);

    expect(parsedFiles).toEqual([]);
    expect(errors.map(e => e.message)).toEqual(['x.go: extractor failed: boom']);
  });

  it('reports progress once per file and errors as they happen', async () => {
    const { extractor } = trackingExtractor(0);
    const progress: number[] = [];
    const failures: string[] = [];
    const reporter: ProgressReporter = {
      logProgress: current => progress.push(current),
      logError: (error: DetailedParseError) => failures.push(`${error.file}:${error.kind}`),
    };
    const pool = new ParserPool({ workers: 2, registry: registryOf(extractor), progress: reporter });

    await pool.process([source('a.go'), source('b.go'), source('c.kt', 'kotlin')]);

    expect(progress).toEqual([1, 2, 3]);
    expect(failures).toEqual(['c.kt:mapping']);
  });

  it('handles an empty batch', async () => {
    const pool = new ParserPool({ workers: 4 });
    expect(await pool.process([])).toEqual({ parsedFiles: [], errors: [] });
  });

  it('defaults to a positive worker count', () => {
    const pool = new ParserPool();
    expect(pool.workers).toBeGreaterThan(0);
    expect(pool.workers).toBeLessThanOrEqual(16);
  });
});

describe('optimalWorkerCount', () => {
  it('sizes the pool to the batch', () => {
    expect(optimalWorkerCount(5, 8)).toBe(2);
    expect(optimalWorkerCount(5, 1)).toBe(1);
    expect(optimalWorkerCount(20, 8)).toBe(4);
    expect(optimalWorkerCount(20, 1)).toBe(1);
    expect(optimalWorkerCount(100, 8)).toBe(8);
    expect(optimalWorkerCount(100, 32)).toBe(16);
  });
});
