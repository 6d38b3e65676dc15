import chalk from 'chalk';
import { IReporter } from './index.js';
import type { IRunSummary, IScenarioResult, IStepResult, StepStatus } from '../types/index.js';

const STEP_ICONS: Record<StepStatus, string> = {
  passed: '✓',
  failed: '✗',
  skipped: '-'
};

function colorFor(status: StepStatus): (text: string) => string {
  if (status === 'passed') return chalk.green;
  if (status === 'failed') return chalk.red;
  return chalk.gray;
}

export class StdoutReporter implements IReporter {
  async report(results: readonly IScenarioResult[], summary: IRunSummary): Promise<void> {
    console.log('\n' + chalk.bold.blue('=== STEPRUNNER REPORT ==='));

    for (const scenario of results) {
      const color = colorFor(scenario.status);
      const worker = scenario.workerId !== undefined ? ` (worker ${scenario.workerId})` : '';
      console.log(`${color(scenario.status.toUpperCase())} ${chalk.bold(scenario.name)}${worker}`);

      scenario.steps.forEach(step => console.log(this.formatStep(step)));

      if (scenario.error) {
        console.log(chalk.red(`     ${scenario.error.kind}: ${scenario.error.message}`));
      }
      if (scenario.screenshot) {
        console.log(chalk.gray(`     screenshot: ${scenario.screenshot}`));
      }
    }

    console.log('---------------------------');
    console.log(`Scenarios: ${summary.total}  ` +
      `${chalk.green(`passed ${summary.passed}`)}  ` +
      `${chalk.red(`failed ${summary.failed}`)}  ` +
      `${chalk.gray(`skipped ${summary.skipped}`)}`);
    console.log(`Duration:  ${summary.endTime - summary.startTime}ms`);

    if (summary.failed === 0) {
      console.log(chalk.bold.green('FINAL STATUS: PASSED'));
    } else {
      console.log(chalk.bold.red('FINAL STATUS: FAILED'));
    }
    console.log(chalk.bold.blue('=========================') + '\n');
  }

  private formatStep(step: IStepResult): string {
    const color = colorFor(step.status);
    const via = step.locator ? chalk.gray(` [${step.locator.resolvedBy}]`) : '';
    const retries = step.attempts > 1 ? chalk.yellow(` (${step.attempts} attempts)`) : '';
    return `  ${color(STEP_ICONS[step.status])} ${step.index + 1}. ${step.text}${via}${retries}`;
  }
}
