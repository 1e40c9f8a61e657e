import os from 'os';
import pLimit from 'p-limit';
import type { ParsedFile, SourceFile } from '../types.js';
import { DetailedParseError, describeError } from '../errors.js';
import { createLogger } from '../logger.js';
import { defaultRegistry, type ExtractorRegistry } from './extractors/index.js';

const log = createLogger('pool');

const MAX_WORKERS = 16;

export interface ProgressReporter {
  logProgress(current: number, total: number, file: string): void;
  /** `error.file` names the failed file. */
  logError(error: DetailedParseError): void;
}

export interface ParserPoolOptions {
  /** 0 or less: available parallelism, capped at 16. */
  workers?: number;
  registry?: ExtractorRegistry;
  progress?: ProgressReporter;
}

export interface BatchResult {
  parsedFiles: ParsedFile[];
  errors: DetailedParseError[];
}

function cpuCount(): number {
  return Math.max(1, os.availableParallelism());
}

/** Worker count sized to the batch: small batches don't pay for a full pool. */
export function optimalWorkerCount(fileCount: number, cpus: number = cpuCount()): number {
  if (fileCount < 10) return Math.min(2, cpus);
  if (fileCount < 50) return Math.max(1, Math.floor(cpus / 2));
  return Math.min(cpus, MAX_WORKERS);
}

export class ParserPool {
  readonly workers: number;
  private readonly registry: ExtractorRegistry;
  private readonly progress?: ProgressReporter;

  constructor(options: ParserPoolOptions = {}) {
    const requested = options.workers ?? 0;
    this.workers = requested > 0 ? requested : Math.min(cpuCount(), MAX_WORKERS);
    this.registry = options.registry ?? defaultRegistry;
    this.progress = options.progress;
  }

  /**
   * Extracts every file with at most `workers` in flight. Per-file failures
   * land in `errors`; a partial result for the same file may still be in
   * `parsedFiles`. Never rejects.
   */
  async process(files: readonly SourceFile[]): Promise<BatchResult> {
    const limit = pLimit(this.workers);
    const parsedFiles: ParsedFile[] = [];
    const errors: DetailedParseError[] = [];
    let completed = 0;

    const record = (file: SourceFile, parsed: ParsedFile | null, error: DetailedParseError | null) => {
      if (parsed) parsedFiles.push(parsed);
      if (error) {
        errors.push(error);
        this.progress?.logError(error);
      }
      completed++;
      this.progress?.logProgress(completed, files.length, file.path);
    };

    log.debug(`extracting ${files.length} file(s) with ${this.workers} worker(s)`);

    await Promise.all(
      files.map(file =>
        limit(async () => {
          const extractor = this.registry.getExtractor(file.language);
          if (!extractor) {
            record(
              file,
              null,
              new DetailedParseError({ file: file.path, kind: 'mapping', reason: `unsupported language: ${file.language}` })
            );
            return;
          }

          try {
            const outcome = await extractor.extract(file);
            record(file, outcome.file, outcome.error);
          } catch (err) {
            record(
              file,
              null,
              new DetailedParseError({
                file: file.path,
                kind: 'mapping',
                reason: `extractor failed: ${describeError(err)}`,
              })
            );
          }
        })
      )
    );

    return { parsedFiles, errors };
  }
}
