import type { ProgressStats } from '../types.js';
import type { DetailedParseError } from '../errors.js';
import type { ProgressReporter } from '../parser/pool.js';
import { COLORS, cyan, yellow, magenta, green, red, dim } from './colors.js';

const BAR_WIDTH = 20;
const FILLED = '█';
const EMPTY = '░';
const CLEAR_LINE = '\r\x1b[K';

function formatTime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

/**
 * Stage headers, a one-line progress bar and the extraction summary, all on
 * stderr so `--json` output on stdout stays parseable. Without a TTY the bar
 * is replaced by one line per 25% milestone.
 */
export class ProgressBar implements ProgressReporter {
  private stats: ProgressStats;
  private readonly isTTY: boolean;
  private lastMilestone = 0;
  private barShown = false;

  constructor(totalFiles: number) {
    this.stats = {
      totalFiles,
      filesProcessed: 0,
      filesFailed: 0,
      symbolsExtracted: 0,
      dependenciesExtracted: 0,
      startTime: Date.now(),
    };
    this.isTTY = process.stderr.isTTY ?? false;
  }

  setStage(stage: string, stageNumber?: number, totalStages?: number): void {
    this.stats.stage = stage;
    this.stats.stageNumber = stageNumber;
    this.stats.totalStages = totalStages;

    this.clearBar();
    if (stageNumber !== undefined && totalStages !== undefined) {
      console.error(`${cyan(`[Stage ${stageNumber}/${totalStages}]`)} ${stage}`);
    } else {
      console.error(stage);
    }
  }

  logProgress(current: number, total: number, file: string): void {
    this.stats.totalFiles = total;
    this.stats.filesProcessed = current;
    this.stats.currentItem = file;
    this.render();
  }

  logError(error: DetailedParseError): void {
    this.stats.filesFailed++;
    this.clearBar();
    console.error(this.isTTY ? red(error.message) : error.message);
    this.render();
  }

  addSymbols(n: number): void {
    this.stats.symbolsExtracted += n;
  }

  addDependencies(n: number): void {
    this.stats.dependenciesExtracted += n;
  }

  private clearBar(): void {
    if (!this.barShown) return;
    process.stderr.write(CLEAR_LINE);
    this.barShown = false;
  }

  private render(): void {
    const done = this.stats.filesProcessed;
    const total = this.stats.totalFiles;
    const ratio = total > 0 ? done / total : 0;

    if (!this.isTTY) {
      const percent = Math.floor(ratio * 100);
      const milestone = Math.floor(percent / 25) * 25;
      if (milestone > this.lastMilestone) {
        console.error(`  Progress: ${percent}% (${done}/${total} files)`);
        this.lastMilestone = milestone;
      }
      return;
    }

    const filled = Math.round(ratio * BAR_WIDTH);
    const bar = `${COLORS.green}${FILLED.repeat(filled)}${COLORS.reset}${COLORS.dim}${EMPTY.repeat(BAR_WIDTH - filled)}${COLORS.reset}`;
    const failed = this.stats.filesFailed > 0 ? ` | ${red(String(this.stats.filesFailed))} failed` : '';
    const current = this.stats.currentItem ? ` ${dim(this.stats.currentItem)}` : '';
    process.stderr.write(`${CLEAR_LINE}[${bar}] ${yellow(`${done}/${total}`)} files${failed}${current}`);
    this.barShown = true;
  }

  finish(): void {
    this.clearBar();

    const elapsed = this.stats.startTime === undefined ? '' : ` ${dim(`(${formatTime(Date.now() - this.stats.startTime)})`)}`;
    const failed = this.stats.filesFailed;

    console.error(green('--- Extraction Summary ---'));
    console.error(`Files processed: ${yellow(String(this.stats.filesProcessed))}${elapsed}`);
    console.error(`Files with errors: ${failed > 0 ? red(String(failed)) : dim('0')}`);
    console.error(`Symbols extracted: ${magenta(String(this.stats.symbolsExtracted))}`);
    console.error(`Dependencies extracted: ${cyan(String(this.stats.dependenciesExtracted))}`);
  }

  getStats(): ProgressStats {
    return { ...this.stats };
  }
}
