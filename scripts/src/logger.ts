/**
 * esprun - Logger
 *
 * One line per message, tagged by level. A pipeline stage owns at most one
 * spinner at a time; any other output stops it first so lines never interleave.
 */

import chalk, { type ChalkInstance } from 'chalk';
import ora, { type Ora } from 'ora';

export type LogLevel = 'info' | 'success' | 'warn' | 'error';

const LEVEL_TAGS: Record<LogLevel, { tag: string; color: ChalkInstance; stderr: boolean }> = {
  info: { tag: '[INFO]', color: chalk.blue, stderr: false },
  success: { tag: '[✓]', color: chalk.green, stderr: false },
  warn: { tag: '[WARN]', color: chalk.yellow, stderr: false },
  error: { tag: '[ERROR]', color: chalk.red, stderr: true },
};

interface ActiveStage {
  name: string;
  startedAt: number;
  spinner: Ora;
}

export interface SummaryEntry {
  name: string;
  path: string;
  size?: string;
}

function seconds(since: number): string {
  return `${((Date.now() - since) / 1000).toFixed(1)}s`;
}

export class Logger {
  private static instance: Logger;
  private stage: ActiveStage | null = null;
  private runStartedAt = Date.now();

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private emit(level: LogLevel, message: string): void {
    this.pauseStage();
    const { tag, color, stderr } = LEVEL_TAGS[level];
    (stderr ? console.error : console.log)(color(tag), message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  success(message: string): void {
    this.emit('success', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  step(message: string): void {
    this.pauseStage();
    console.log(chalk.bold('>>>'), chalk.cyan(message));
  }

  /**
   * Forward external tool output unchanged
   */
  passthrough(text: string): void {
    this.pauseStage();
    if (text.length > 0) {
      process.stderr.write(text.endsWith('\n') ? text : `${text}\n`);
    }
  }

  /**
   * Report a failed external command with everything it printed
   */
  toolFailure(message: string, output: { stdout?: string; stderr: string }): void {
    this.error(message);
    this.passthrough(output.stdout ?? '');
    this.passthrough(output.stderr);
  }

  section(title: string): void {
    this.pauseStage();
    const rule = chalk.cyan('='.repeat(Math.max(40, title.length)));
    console.log(`\n${rule}\n${chalk.cyan(title)}\n${rule}\n`);
  }

  // ===========================================================================
  // Pipeline stages
  // ===========================================================================

  beginStage(name: string): void {
    this.pauseStage();
    this.stage = {
      name,
      startedAt: Date.now(),
      spinner: ora({ text: name, color: 'cyan' }).start(),
    };
  }

  endStage(ok: boolean): void {
    const stage = this.stage;
    if (!stage) return;
    this.stage = null;

    const elapsed = seconds(stage.startedAt);
    if (ok) {
      stage.spinner.succeed(`${stage.name} (${elapsed})`);
    } else {
      stage.spinner.fail(`${stage.name} failed after ${elapsed}`);
    }
  }

  // The spinner line is cleared but the stage keeps its start time
  private pauseStage(): void {
    if (this.stage?.spinner.isSpinning) {
      this.stage.spinner.stop();
    }
  }

  startRun(): void {
    this.runStartedAt = Date.now();
  }

  /**
   * List the deployed ESP contents with sizes
   */
  summary(espDir: string, entries: SummaryEntry[]): void {
    this.section(`Deployed in ${seconds(this.runStartedAt)}`);
    console.log(`ESP: ${espDir}`);
    for (const entry of entries) {
      const size = entry.size ? chalk.gray(` (${entry.size})`) : '';
      console.log(`  ${entry.name.padEnd(14)} ${entry.path}${size}`);
    }
    console.log('');
  }

  /**
   * Print rows as left-aligned columns under a bold header
   */
  table(headers: string[], rows: string[][]): void {
    this.pauseStage();
    const widths = headers.map((header, i) =>
      Math.max(header.length, ...rows.map(row => row[i]?.length ?? 0))
    );
    const line = (cells: string[]) =>
      cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

    console.log(chalk.bold(line(headers)));
    console.log(chalk.gray(widths.map(width => '-'.repeat(width)).join('  ')));
    for (const row of rows) {
      console.log(line(row));
    }
  }
}

export const logger = Logger.getInstance();
