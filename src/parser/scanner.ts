import { readdirSync, statSync } from 'fs';
import { basename, extname, join, relative } from 'path';
import type { LanguageTag, SourceFile } from '../types.js';
import type { ExtractorConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { detectLanguage } from './extractors/index.js';

const log = createLogger('scan');

const EXCLUDED_DIRS = new Set([
  'node_modules',
  '.git',
  'dist',
  'target',
  'build',
  'out',
  'vendor',
  'Pods',
  'DerivedData',
  '.gradle',
  '__pycache__',
]);

const OBJC_SOURCES = ['.m', '.mm'];
const CPP_SOURCES = ['.cpp', '.cc', '.cxx'];

export type ScanOptions = Pick<ExtractorConfig, 'maxFileSize' | 'excludeDirs'>;

/** `.h` is shared by C, C++ and Objective-C; the sibling implementation decides. */
export function headerLanguage(headerPath: string, siblings: ReadonlySet<string>): LanguageTag {
  const stem = basename(headerPath, extname(headerPath));
  if (OBJC_SOURCES.some(ext => siblings.has(`${stem}${ext}`))) return 'objc';
  if (CPP_SOURCES.some(ext => siblings.has(`${stem}${ext}`))) return 'cpp';
  return 'c';
}

export function collectFiles(directory: string, options: ScanOptions): SourceFile[] {
  const excluded = new Set([...EXCLUDED_DIRS, ...options.excludeDirs]);
  const files: SourceFile[] = [];

  function walk(dir: string): void {
    const entries = readdirSync(dir, { withFileTypes: true });
    const siblings = new Set(entries.filter(e => e.isFile()).map(e => e.name));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (excluded.has(entry.name)) continue;
        walk(fullPath);
        continue;
      }
      if (!entry.isFile()) continue;

      let language = detectLanguage(entry.name);
      if (!language) continue;
      if (extname(entry.name).toLowerCase() === '.h') {
        language = headerLanguage(entry.name, siblings);
      }

      const size = statSync(fullPath).size;
      if (size > options.maxFileSize) {
        log.debug(`skipping ${fullPath}: ${size} bytes exceeds ${options.maxFileSize}`);
        continue;
      }

      files.push({ path: relative(directory, fullPath), absolutePath: fullPath, language, size });
    }
  }

  walk(directory);
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
