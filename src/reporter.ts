import chalk from 'chalk';
import { formatDuration } from './metrics.js';
import type { RunnerResult, ScenarioRunResult } from './runner.js';
import type { ScenarioDefinition } from './scenarios/index.js';
import type { ShortfallRecord } from './types.js';

export interface ReporterOptions {
  verbose?: boolean;
  json?: boolean;
}

const PASS_ICON = chalk.green('✓');
const FAIL_ICON = chalk.red('✗');
const ERROR_ICON = chalk.magenta('!');
const PENDING_ICON = chalk.yellow('○');

function statusIcon(result: ScenarioRunResult): string {
  switch (result.status) {
    case 'pass':
      return PASS_ICON;
    case 'fail':
      return FAIL_ICON;
    case 'error':
      return ERROR_ICON;
  }
}

export function printHeader(count: number): void {
  console.log(chalk.bold(`\nRAN Throughput Suite (${count} scenarios)`));
  console.log(chalk.gray('═'.repeat(60)));
}

export function printScenarioStart(id: string): void {
  console.log(`   ${PENDING_ICON} ${id}`);
}

export function printScenarioResult(result: ScenarioRunResult, options: ReporterOptions = {}): void {
  const duration = chalk.gray(formatDuration(result.duration).padStart(8));
  console.log(`   ${statusIcon(result)} ${result.id}`);
  console.log(`     ${duration}    ${result.message}`);

  if (result.status !== 'pass' && result.details) {
    console.log(chalk.gray(`     └─ ${result.details}`));
  }

  if (result.suggestion) {
    console.log(chalk.yellow(`     └─ Suggestion: ${result.suggestion}`));
  }

  if (options.verbose) {
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`     └─ Teardown: ${warning}`));
    }
  }
}

export function printSummary(result: RunnerResult): void {
  console.log(chalk.gray('═'.repeat(60)));

  const total = result.results.length;
  const passedStr = chalk.green(`${result.passed}/${total} passed`);
  const failedStr = result.failed > 0 ? chalk.red(`, ${result.failed} failed`) : '';
  const erroredStr = result.errored > 0 ? chalk.magenta(`, ${result.errored} errored`) : '';

  console.log(`   ${passedStr}${failedStr}${erroredStr}    Total: ${formatDuration(result.totalDuration)}`);

  if (result.failed === 0 && result.errored === 0) {
    console.log(chalk.green.bold(`\n   Status: PASSED ✓\n`));
  } else {
    console.log(chalk.red.bold(`\n   Status: FAILED ✗\n`));
  }
}

function violationsOf(result: ScenarioRunResult): { violations?: ShortfallRecord[] } {
  const verdict = result.outcome?.verdict;
  if (verdict?.status !== 'fail' || verdict.violations.length === 0) {
    return {};
  }
  return { violations: verdict.violations };
}

export function toJson(result: RunnerResult) {
  return {
    status: result.failed === 0 && result.errored === 0 ? 'passed' : 'failed',
    scenarios: result.results.map(r => ({
      id: r.id,
      status: r.status,
      duration_ms: Math.round(r.duration),
      message: r.message,
      ...(r.details && { details: r.details }),
      ...(r.suggestion && { suggestion: r.suggestion }),
      ...(r.warnings.length > 0 && { warnings: r.warnings }),
      ...violationsOf(r),
    })),
    summary: {
      total: result.results.length,
      passed: result.passed,
      failed: result.failed,
      errored: result.errored,
      duration_ms: Math.round(result.totalDuration),
    },
  };
}

export function printJson(result: RunnerResult): void {
  console.log(JSON.stringify(toJson(result), null, 2));
}

export function printScenarioList(scenarios: ScenarioDefinition[], options: ReporterOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(
      scenarios.map(s => ({ id: s.id, marks: s.marks, ueCount: s.ueCount, parameters: s.parameters })),
      null,
      2,
    ));
    return;
  }

  for (const scenario of scenarios) {
    console.log(`${scenario.id}  ${chalk.gray(scenario.marks.join(','))}`);
  }
  console.log(chalk.gray(`\n${scenarios.length} scenarios`));
}

export class Reporter {
  private options: ReporterOptions;

  constructor(options: ReporterOptions = {}) {
    this.options = options;
  }

  start(count: number): void {
    if (!this.options.json) {
      printHeader(count);
    }
  }

  onScenarioStart(id: string): void {
    if (!this.options.json && this.options.verbose) {
      printScenarioStart(id);
    }
  }

  onScenarioComplete(result: ScenarioRunResult): void {
    if (!this.options.json) {
      printScenarioResult(result, this.options);
    }
  }

  finish(result: RunnerResult): void {
    if (this.options.json) {
      printJson(result);
    } else {
      printSummary(result);
    }
  }
}
