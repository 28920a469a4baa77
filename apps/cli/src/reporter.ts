import chalk, { type ChalkInstance } from 'chalk';
import type { FinalUnitStatus } from '@evalgate/schemas';
import type { ResultReport, RunObserver, RunStartInfo, UnitOutcome } from '@evalgate/runner';

export type Print = (line: string) => void;

function preview(text: string, width = 48): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > width ? `${flat.slice(0, width - 1)}…` : flat;
}

/** Prints run progress and the final verdict. */
export class ConsoleReporter implements RunObserver {
  constructor(
    private readonly print: Print = (line) => console.log(line),
    private readonly color: ChalkInstance = chalk
  ) {}

  private paint(status: FinalUnitStatus, text: string): string {
    if (status === 'succeeded') return this.color.green(text);
    if (status === 'failed') return this.color.yellow(text);
    return this.color.red(text);
  }

  onRunStart(info: RunStartInfo): void {
    this.print(
      this.color.bold(`Running ${info.totalUnits} test case(s) of "${info.suiteName}" on ${info.workers} worker(s)`)
    );
  }

  onUnitEnd(outcome: UnitOutcome): void {
    const label = outcome.status.toUpperCase().padEnd(9);
    this.print(`${this.paint(outcome.status, label)} #${outcome.index} ${preview(outcome.testCase.input)}`);
    for (const m of outcome.measurements) {
      const detail = m.error
        ? m.error.message
        : `score ${m.score.toFixed(3)} (minimum ${m.minimumScore})`;
      this.print(this.color.dim(`    ${m.metricName}: ${detail}`));
    }
  }

  onRunEnd(report: ResultReport): void {
    const { summary } = report;
    this.print(
      `${summary.total} total, ${this.color.green(`${summary.succeeded} passed`)}, ` +
        `${this.color.yellow(`${summary.failed} failed`)}, ${this.color.red(`${summary.errored} errored`)}`
    );
    this.print(report.allPassed ? this.color.green.bold('All tests passed') : this.color.red.bold('Some tests failed'));
  }
}
