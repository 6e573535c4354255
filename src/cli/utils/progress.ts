/**
 * Progress Reporter
 *
 * Progress display for corpus embedding and evaluation runs.
 * Output modes:
 * - Interactive: ora spinner with live counts
 * - JSON: NDJSON event stream on stdout
 * - Text: plain lines for non-TTY environments
 *
 * Spinner updates are throttled to one per 100ms.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Long-running stages a command can report.
 */
export type ProgressStage = 'embedding' | 'evaluating';

const STAGE_LABELS: Record<ProgressStage, string> = {
  embedding: 'Embedding',
  evaluating: 'Evaluating',
};

const STAGE_UNITS: Record<ProgressStage, string> = {
  embedding: 'chunks',
  evaluating: 'questions',
};

export interface ProgressReporterOptions {
  /** Emit NDJSON events instead of human-readable text */
  json: boolean;
  /** Show warnings while a spinner is running */
  verbose: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType = 'stage_start' | 'stage_progress' | 'stage_complete' | 'warning';

export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: ProgressStage;
  data: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * const reporter = createProgressReporter(ctx.options);
 * reporter.startStage('embedding', 120);
 * reporter.updateProgress(32);
 * reporter.completeStage(120, 1850);
 * ```
 */
export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: ProgressStage | null = null;
  private currentTotal = 0;
  private prefix = '';
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
  }

  /**
   * @param total - expected items (0 if unknown)
   * @param prefix - shown before the count, e.g. "Run 2/3"
   */
  startStage(stage: ProgressStage, total = 0, prefix = ''): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.prefix = prefix;
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', stage, data: { total, label: prefix || undefined } });
      return;
    }

    const text = `${this.label()}...`;
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text, color: 'cyan' }).start();
    } else {
      console.log(text);
    }
  }

  updateProgress(processed: number): void {
    if (!this.currentStage) return;

    const now = performance.now();
    const finished = processed >= this.currentTotal && this.currentTotal > 0;
    if (!finished && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        stage: this.currentStage,
        data: { processed, total: this.currentTotal },
      });
      return;
    }

    if (this.options.isInteractive && this.spinner) {
      const percentage =
        this.currentTotal > 0 ? ` (${Math.round((processed / this.currentTotal) * 100)}%)` : '';
      this.spinner.text = `${this.label()} ${processed}/${this.currentTotal}${percentage}`;
    }
  }

  completeStage(processed: number, durationMs: number): void {
    const stage = this.currentStage;
    if (!stage) return;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        stage,
        data: { processed, total: this.currentTotal, durationMs: Math.round(durationMs) },
      });
    } else {
      const text = `${this.label()}: ${processed.toLocaleString()} ${STAGE_UNITS[stage]} in ${formatDuration(durationMs)}`;
      if (this.options.isInteractive && this.spinner) {
        this.spinner.succeed(text);
      } else {
        console.log(text);
      }
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /** Stop the spinner with a failure mark; the caller reports the error */
  failStage(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
    }
    this.currentStage = null;
    this.spinner = null;
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        stage: this.currentStage ?? undefined,
        data: { message },
      });
      return;
    }

    // Keep spinner output clean unless asked
    if (this.options.verbose || !this.options.isInteractive || !this.spinner) {
      console.warn(chalk.yellow(`Warning: ${message}`));
    }
  }

  private label(): string {
    const base = this.currentStage ? STAGE_LABELS[this.currentStage] : '';
    return this.prefix ? `${base} (${this.prefix})` : base;
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    const full: ProgressEvent = { ...event, timestamp: new Date().toISOString() };
    console.log(JSON.stringify(full));
  }
}

/**
 * Human-readable duration: 850ms, 12.3s, 2m 05s.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds % 60);
  return `${minutes}m ${String(rest).padStart(2, '0')}s`;
}

/**
 * Reporter matching the global CLI options and the current terminal.
 */
export function createProgressReporter(options: { json: boolean; verbose: boolean }): ProgressReporter {
  return new ProgressReporter({
    json: options.json,
    verbose: options.verbose,
    isInteractive: Boolean(process.stdout.isTTY) && !process.env.CI,
  });
}

/**
 * Progress hooks for corpus embedding. The spinner starts on the first
 * callback, so a cached index shows nothing.
 */
export interface CorpusProgress {
  onProgress: (processed: number, total: number) => void;
  finish: () => void;
  fail: (message: string) => void;
}

export function createCorpusProgress(options: { json: boolean; verbose: boolean }): CorpusProgress {
  const reporter = createProgressReporter(options);
  const start = performance.now();
  let started = false;
  let processedSoFar = 0;

  return {
    onProgress: (processed, total) => {
      if (!started) {
        reporter.startStage('embedding', total);
        started = true;
      }
      processedSoFar = processed;
      reporter.updateProgress(processed);
    },
    finish: () => {
      if (started) reporter.completeStage(processedSoFar, performance.now() - start);
    },
    fail: (message) => {
      if (started) reporter.failStage(message);
    },
  };
}
