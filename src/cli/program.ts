import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readdirSync, statSync } from 'fs';
import { basename, dirname, extname, resolve } from 'path';
import type { LanguageTag, SourceFile } from '../types.js';
import { loadConfig, type ExtractorConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { setLogLevel } from '../logger.js';
import { associateHeaders } from '../parser/cross-reference.js';
import { detectLanguage, getExtractor, getRegisteredLanguages, isLanguageTag } from '../parser/extractors/index.js';
import { ParserPool, optimalWorkerCount } from '../parser/pool.js';
import { collectFiles, headerLanguage } from '../parser/scanner.js';
import { serializeBatch, serializeError, serializeFile } from '../serialize.js';
import { countSymbols, formatDependency, formatLanguageSummary, formatSymbolTree, summarizeByLanguage } from './format.js';
import { ProgressBar } from './progress.js';
import { green, red } from './colors.js';

export const VERSION = '0.1.0';

export function parseWorkers(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('expected a non-negative integer.');
  }
  return parsed;
}

export function parseLanguages(values: readonly string[]): LanguageTag[] {
  const tags: LanguageTag[] = [];
  for (const value of values) {
    const tag = value.toLowerCase();
    if (!isLanguageTag(tag)) {
      throw new InvalidArgumentError(
        `unknown language "${value}" (expected one of ${getRegisteredLanguages().join(', ')}).`
      );
    }
    tags.push(tag);
  }
  return tags;
}

/** Source descriptor for a single path; `.h` takes its language from its siblings. */
export function describeSourceFile(path: string): SourceFile | null {
  const absolutePath = resolve(path);
  let language = detectLanguage(absolutePath);
  if (!language) return null;

  if (extname(absolutePath).toLowerCase() === '.h') {
    const siblings = new Set(readdirSync(dirname(absolutePath)));
    language = headerLanguage(basename(absolutePath), siblings);
  }
  return { path, absolutePath, language, size: statSync(absolutePath).size };
}

interface ParseOptions {
  workers?: number;
  language?: string[];
  json?: boolean;
  linkHeaders: boolean;
}

interface FileOptions {
  json?: boolean;
}

export function createProgram(env: Record<string, string | undefined> = process.env): Command {
  const program = new Command();

  const configure = (): ExtractorConfig => {
    try {
      const config = loadConfig(env);
      setLogLevel(config.logLevel);
      return config;
    } catch (err) {
      if (err instanceof ConfigError) program.error(err.message);
      throw err;
    }
  };

  program
    .name('symextract')
    .description('Extract symbols and dependencies from C, C++, Objective-C, Go, Python, Java, Kotlin and Swift sources')
    .version(VERSION);

  program
    .command('parse <directory>')
    .description('Extract every supported source file under a directory')
    .option('-w, --workers <n>', 'Concurrent extractions (0 = auto)', parseWorkers)
    .option('-l, --language <tag...>', 'Only extract these languages')
    .option('--json', 'Write the extracted batch to stdout as JSON')
    .option('--no-link-headers', 'Skip header/implementation linking')
    .action(async (directory: string, opts: ParseOptions) => {
      const config = configure();
      const dir = resolve(directory);
      if (!existsSync(dir) || !statSync(dir).isDirectory()) {
        program.error(`Not a directory: ${dir}`);
      }

      let languages: LanguageTag[] = [];
      try {
        languages = parseLanguages(opts.language ?? []);
      } catch (err) {
        if (err instanceof InvalidArgumentError) program.error(`error: option '--language': ${err.message}`);
        throw err;
      }

      const progress = new ProgressBar(0);

      progress.setStage('Collecting files', 1, 3);
      let files = collectFiles(dir, config);
      if (languages.length > 0) {
        const wanted = new Set(languages);
        files = files.filter(file => wanted.has(file.language));
      }
      console.error(`Found ${files.length} source files`);

      progress.setStage('Extracting symbols', 2, 3);
      const requested = opts.workers ?? config.workers;
      const workers = requested > 0 ? requested : optimalWorkerCount(files.length);
      const pool = new ParserPool({ workers, progress });
      const { parsedFiles, errors } = await pool.process(files);

      progress.setStage(opts.linkHeaders ? 'Linking headers' : 'Skipping header linking', 3, 3);
      const linked = opts.linkHeaders ? associateHeaders(parsedFiles) : 0;

      for (const file of parsedFiles) {
        progress.addSymbols(countSymbols(file.symbols));
        progress.addDependencies(file.dependencies.length);
      }
      progress.finish();

      if (opts.json) {
        process.stdout.write(`${JSON.stringify(serializeBatch(parsedFiles, errors), null, 2)}\n`);
        return;
      }

      console.log('');
      console.log(green('--- By Language ---'));
      for (const summary of summarizeByLanguage(parsedFiles)) {
        console.log(formatLanguageSummary(summary));
      }
      if (opts.linkHeaders) {
        console.log(`Declarations linked: ${linked}`);
      }
      if (errors.length > 0) {
        console.log('');
        console.log(red(`--- Errors (${errors.length}) ---`));
        for (const error of errors) {
          console.log(`  ${error.message}`);
        }
      }
    });

  program
    .command('file <path>')
    .description('Extract a single file and print its symbols and dependencies')
    .option('--json', 'Write the extracted file to stdout as JSON')
    .action(async (path: string, opts: FileOptions) => {
      configure();
      if (!existsSync(path)) {
        program.error(`File not found: ${path}`);
      }

      const source = describeSourceFile(path);
      const extractor = source ? getExtractor(source.language) : undefined;
      if (!source || !extractor) {
        program.error(`Unsupported file type: ${path}`);
        return;
      }

      const { file, error } = await extractor.extract(source);

      if (opts.json) {
        const payload = { file: serializeFile(file), error: error ? serializeError(error) : null };
        process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
        return;
      }

      console.log(`${file.path} (${file.language})`);
      console.log('');
      console.log(green('--- Symbols ---'));
      for (const line of formatSymbolTree(file.symbols)) {
        console.log(line);
      }
      console.log('');
      console.log(green('--- Dependencies ---'));
      for (const dep of file.dependencies) {
        console.log(formatDependency(dep));
      }
      if (error) {
        console.log('');
        console.log(red(error.message));
      }
    });

  return program;
}
