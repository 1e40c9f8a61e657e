import { describe, it, expect, afterAll } from 'vitest';
import { mkdtempSync, writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { collectFiles, headerLanguage } from '../../../src/parser/scanner.js';

const OPTIONS = { maxFileSize: 1024, excludeDirs: ['generated'] };

describe('Scanner', () => {
  const tempDir = mkdtempSync(join(tmpdir(), 'scanner-test-'));

  const setupFixtures = () => {
    writeFileSync(join(tempDir, 'main.c'), 'int main(void) { return 0; }');
    writeFileSync(join(tempDir, 'util.h'), 'int util(void);');
    writeFileSync(join(tempDir, 'app.py'), 'print("hi")');
    writeFileSync(join(tempDir, 'readme.md'), '# Hello');
    writeFileSync(join(tempDir, 'big.go'), `package big\n// ${'x'.repeat(2048)}\n`);

    // Headers take their language from a sibling implementation
    mkdirSync(join(tempDir, 'ios'), { recursive: true });
    writeFileSync(join(tempDir, 'ios', 'Person.h'), '@interface Person @end');
    writeFileSync(join(tempDir, 'ios', 'Person.m'), '@implementation Person @end');

    mkdirSync(join(tempDir, 'engine'), { recursive: true });
    writeFileSync(join(tempDir, 'engine', 'widget.h'), 'class Widget {};');
    writeFileSync(join(tempDir, 'engine', 'widget.cpp'), 'int x;');

    for (const dir of ['node_modules', '.git', 'build', 'Pods', '__pycache__', 'generated']) {
      mkdirSync(join(tempDir, dir), { recursive: true });
      writeFileSync(join(tempDir, dir, 'skipped.py'), '');
    }

    mkdirSync(join(tempDir, 'src', 'deep'), { recursive: true });
    writeFileSync(join(tempDir, 'src', 'deep', 'Nested.java'), 'class Nested {}');
  };

  setupFixtures();

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('collects supported files sorted by relative path', () => {
    const files = collectFiles(tempDir, OPTIONS);

    expect(files.map(f => f.path)).toEqual([
      'app.py',
      join('engine', 'widget.cpp'),
      join('engine', 'widget.h'),
      join('ios', 'Person.h'),
      join('ios', 'Person.m'),
      'main.c',
      join('src', 'deep', 'Nested.java'),
      'util.h',
    ]);
  });

  it('tags each file with its language', () => {
    const files = collectFiles(tempDir, OPTIONS);
    const byPath = new Map(files.map(f => [f.path, f.language]));

    expect(byPath.get('main.c')).toBe('c');
    expect(byPath.get('util.h')).toBe('c');
    expect(byPath.get(join('ios', 'Person.h'))).toBe('objc');
    expect(byPath.get(join('engine', 'widget.h'))).toBe('cpp');
    expect(byPath.get(join('src', 'deep', 'Nested.java'))).toBe('java');
  });

  it('records absolute paths and sizes', () => {
    const main = collectFiles(tempDir, OPTIONS).find(f => f.path === 'main.c');

    expect(main?.absolutePath).toBe(join(tempDir, 'main.c'));
    expect(main?.size).toBe('int main(void) { return 0; }'.length);
  });

  it('skips files over the size limit', () => {
    const files = collectFiles(tempDir, OPTIONS);
    expect(files.map(f => f.path)).not.toContain('big.go');

    const unlimited = collectFiles(tempDir, { maxFileSize: 1024 * 1024, excludeDirs: [] });
    expect(unlimited.map(f => f.path)).toContain('big.go');
  });

  it('skips excluded and configured directories', () => {
    const files = collectFiles(tempDir, OPTIONS);
    expect(files.some(f => f.path.endsWith('skipped.py'))).toBe(false);

    const withGenerated = collectFiles(tempDir, { maxFileSize: 1024, excludeDirs: [] });
    expect(withGenerated.map(f => f.path)).toContain(join('generated', 'skipped.py'));
  });
});

describe('headerLanguage', () => {
  it('prefers Objective-C, then C++, then C', () => {
    expect(headerLanguage('A.h', new Set(['A.h', 'A.mm', 'A.cpp']))).toBe('objc');
    expect(headerLanguage('A.h', new Set(['A.h', 'A.cc']))).toBe('cpp');
    expect(headerLanguage('A.h', new Set(['A.h', 'B.m']))).toBe('c');
  });
});
