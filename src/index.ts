#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from './config.js';
import { createConsoleLogger } from './logger.js';
import { Reporter, printScenarioList } from './reporter.js';
import { runScenarios } from './runner.js';
import { allScenarios, parseList, selectScenarios } from './scenarios/index.js';
import { createSimulatedTestBed } from './simulated/index.js';

interface SelectionOptions {
  mark?: string;
  only?: string;
  json?: boolean;
}

interface RunOptions extends SelectionOptions {
  verbose?: boolean;
}

const program = new Command();

program
  .name('ran-throughput')
  .description('Data-plane throughput suite for UE / base station / core network test beds')
  .version('1.0.0');

program
  .command('list')
  .description('List scenarios in the table')
  .option('--mark <marks>', 'Only scenarios carrying all of these marks (comma-separated)')
  .option('--only <ids>', 'Only scenarios whose id contains one of these (comma-separated)')
  .option('--json', 'Output as JSON')
  .action((options: SelectionOptions) => {
    const scenarios = selectScenarios({ marks: parseList(options.mark), only: parseList(options.only) });
    printScenarioList(scenarios, { json: options.json });
  });

program
  .command('run')
  .description('Run scenarios against the simulated test bed')
  .option('--mark <marks>', 'Only scenarios carrying all of these marks (comma-separated)')
  .option('--only <ids>', 'Only scenarios whose id contains one of these (comma-separated)')
  .option('--verbose', 'Show phase-by-phase output and teardown warnings')
  .option('--json', 'Output results as JSON')
  .action(async (options: RunOptions) => {
    try {
      const cfg = loadConfig();
      const scenarios = selectScenarios({ marks: parseList(options.mark), only: parseList(options.only) });

      if (scenarios.length === 0) {
        console.error('No scenarios match the selection');
        console.error(`Marks in use: ${[...new Set(allScenarios.flatMap(s => s.marks))].join(', ')}`);
        process.exit(2);
      }

      const logger = createConsoleLogger({ verbose: options.verbose, stderrOnly: options.json });
      const reporter = new Reporter({ verbose: options.verbose, json: options.json });

      reporter.start(scenarios.length);

      const result = await runScenarios({
        scenarios,
        createTestBed: (scenario) => createSimulatedTestBed(scenario, {
          artifactsDir: cfg.artifactsDir,
          efficiency: cfg.simEfficiency,
          timeScale: cfg.simTimeScale,
        }),
        logger,
        attachTimeoutMs: cfg.attachTimeoutMs,
        trafficGraceMs: cfg.trafficGraceMs,
        onScenarioStart: (scenario) => reporter.onScenarioStart(scenario.id),
        onScenarioComplete: (_, scenarioResult) => reporter.onScenarioComplete(scenarioResult),
      });

      reporter.finish(result);

      process.exit(result.failed > 0 || result.errored > 0 ? 1 : 0);
    } catch (error) {
      if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error('An unknown error occurred');
      }
      process.exit(2);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(2);
});
