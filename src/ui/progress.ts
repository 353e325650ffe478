/**
 * Terminal Progress UI
 * Using chalk and cli-progress for batch dispatch output
 */

import chalk from 'chalk';
import cliProgress from 'cli-progress';
import Table from 'cli-table3';
import type { ResultEntry } from '../benchmark/results';

export interface DispatchReporter {
  start(total: number, title: string): void;
  advance(entry: ResultEntry): void;
  finish(): void;
}

export interface BatchStats {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
}

export class ProgressUI implements DispatchReporter {
  private progressBar: cliProgress.SingleBar;
  private stats: BatchStats = { total: 0, completed: 0, succeeded: 0, failed: 0 };
  private startTime = 0;
  private title = '';

  constructor() {
    this.progressBar = new cliProgress.SingleBar(
      {
        format: chalk.cyan('{bar}') + ' | {percentage}% | {value}/{total} requests | ok: {succeeded} | failed: {failed} | ETA: {eta_formatted}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
      },
      cliProgress.Presets.shades_classic
    );
  }

  start(total: number, title: string): void {
    this.stats = { total, completed: 0, succeeded: 0, failed: 0 };
    this.title = title;
    this.startTime = Date.now();
    this.printHeader();
    this.progressBar.start(total, 0, { succeeded: 0, failed: 0 });
  }

  private printHeader(): void {
    console.log(chalk.bold.blue('\n' + '='.repeat(70)));
    console.log(chalk.bold.blue(`  ${this.title}`));
    console.log(chalk.bold.blue('='.repeat(70) + '\n'));
  }

  advance(entry: ResultEntry): void {
    this.stats.completed++;
    if (entry.error === null) {
      this.stats.succeeded++;
    } else {
      this.stats.failed++;
    }
    this.progressBar.update(this.stats.completed, {
      succeeded: this.stats.succeeded,
      failed: this.stats.failed,
    });
  }

  finish(): void {
    this.progressBar.stop();
    this.printSummary();
  }

  private printSummary(): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);

    const table = new Table({
      head: [chalk.cyan('Metric'), chalk.cyan('Value')],
      colWidths: [30, 25],
    });

    table.push(
      ['Requests', this.stats.total.toString()],
      [chalk.green('Succeeded'), chalk.green(this.stats.succeeded.toString())],
      [chalk.red('Failed'), chalk.red(this.stats.failed.toString())],
      ['Time Elapsed', `${elapsed}s`]
    );

    console.log(table.toString());
  }
}
