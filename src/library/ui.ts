/**
 * Console output helpers: theme, spinner, progress bar, formatters.
 */
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import figures from 'figures';
import { formatDuration as formatDurationWords, intervalToDuration } from 'date-fns';

// ═══════════════════════════════════════════════════════════════════════════
// THEME
// ═══════════════════════════════════════════════════════════════════════════

export const theme = {
  // Status colors
  error: chalk.red,
  warning: chalk.yellow,

  // Text styling
  bold: chalk.bold,
  dim: chalk.dim,

  // Symbols (cross-platform via figures)
  check: chalk.green(figures.tick),
  cross: chalk.red(figures.cross),
  warn: chalk.yellow(figures.warning),
  bullet: chalk.dim(figures.bullet),

  // Formatting helpers
  separator: chalk.dim(' · '),
  divider: (label: string, width = 60) => {
    const prefix = `━━━ ${label} `;
    const remaining = Math.max(0, width - prefix.length);
    return chalk.cyan.dim(prefix + '━'.repeat(remaining));
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// SPINNER MANAGER
// ═══════════════════════════════════════════════════════════════════════════

let activeSpinner: Ora | null = null;

export const spinner = {
  start(text: string): Ora {
    if (activeSpinner) {
      activeSpinner.stop();
    }
    activeSpinner = ora({
      text,
      spinner: 'dots',
      indent: 4,
    }).start();
    return activeSpinner;
  },

  fail(text?: string): void {
    if (activeSpinner) {
      activeSpinner.fail(text);
      activeSpinner = null;
    }
  },

  stop(): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
  },

  /**
   * Clear the spinner line without stopping
   */
  clear(): void {
    if (activeSpinner) {
      activeSpinner.clear();
    }
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS BAR
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressTracker {
  start(total: number): void;
  update(current: number, label?: string): void;
  stop(): void;
}

export function createProgressTracker(unit: string): ProgressTracker {
  let bar: cliProgress.SingleBar | null = null;
  let startTime = 0;

  return {
    start(total: number) {
      // Stop any active spinner before starting progress
      spinner.stop();

      startTime = Date.now();
      bar = new cliProgress.SingleBar({
        format: `    {bar} {percentage}%  {value}/{total} ${unit}  {duration_formatted}  {current}`,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        barsize: 20,
        hideCursor: true,
        clearOnComplete: false,
        stopOnComplete: false,
        fps: 10,
      });
      bar.start(total, 0, { duration_formatted: '0s', current: '' });
    },

    update(current: number, label = '') {
      if (bar) {
        const elapsed = Math.round((Date.now() - startTime) / 1000);
        bar.update(current, { duration_formatted: `${elapsed}s`, current: theme.dim(label) });
      }
    },

    stop() {
      if (bar) {
        const elapsed = Math.round((Date.now() - startTime) / 1000);
        bar.update(bar.getTotal(), { duration_formatted: `${elapsed}s`, current: '' });
        bar.stop();
        bar = null;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const duration = intervalToDuration({ start: 0, end: Math.round(ms / 1000) * 1000 });
  return formatDurationWords(duration, { format: ['hours', 'minutes', 'seconds'] });
}

export function formatTokens(tokens: number): string {
  if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(1)}M`;
  if (tokens >= 1_000) return `${Math.round(tokens / 1_000)}K`;
  return String(tokens);
}

export function formatCount(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
