import chalk from 'chalk';
import Table from 'cli-table3';
import { accuracy, type AccuracyStats, type EvaluationReport } from '../evaluation/scorer';

export function formatStats(stats: AccuracyStats): string {
  return `${stats.correct}/${stats.total} (${accuracy(stats).toFixed(1)}%)`;
}

export function buildReportRows(report: EvaluationReport): Array<[string, string]> {
  return [
    ['Overall', formatStats(report.overall)],
    ...report.byLevel.map((row): [string, string] => [`Level ${row.level}`, formatStats(row)]),
    ['Multiple Choice', formatStats(report.multipleChoice)],
    ['Non-Multiple Choice', formatStats(report.nonMultipleChoice)],
  ];
}

export function printEvaluationReport(report: EvaluationReport, outputFile?: string): void {
  console.log('\n' + chalk.bold.blue('='.repeat(70)));
  console.log(chalk.bold.blue(`  EVALUATION (${report.matchMode} match)`));
  console.log(chalk.bold.blue('='.repeat(70)));

  const table = new Table({
    head: [chalk.cyan('Partition'), chalk.cyan('Accuracy')],
    colWidths: [30, 25],
  });
  for (const [label, value] of buildReportRows(report)) {
    table.push(label === 'Overall' ? [chalk.bold(label), chalk.bold(value)] : [label, value]);
  }
  console.log(table.toString());

  if (outputFile) {
    console.log(chalk.dim(`\nSaved to ${outputFile}`));
  }
}
