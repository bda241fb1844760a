import { AttachError, ConfigurationError, MeasurementTimeoutError, errorCode, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { describeVerdictFailure } from './measurement.js';
import { formatBitrate, summarizeMeasurements } from './metrics.js';
import type { ScenarioDefinition } from './scenarios/index.js';
import { OrchestrationSequencer, teardownWarningsOf } from './sequencer.js';
import type { Outcome, TestBed } from './types.js';

export type ScenarioStatus = 'pass' | 'fail' | 'error';

export interface ScenarioRunResult {
  id: string;
  status: ScenarioStatus;
  duration: number;
  message: string;
  details?: string;
  suggestion?: string;
  warnings: string[];
  outcome?: Outcome;
}

export type TestBedFactory = (scenario: ScenarioDefinition) => TestBed;

export interface RunnerOptions {
  scenarios: ScenarioDefinition[];
  createTestBed: TestBedFactory;
  logger: Logger;
  attachTimeoutMs?: number;
  trafficGraceMs?: number;
  onScenarioStart?: (scenario: ScenarioDefinition) => void;
  onScenarioComplete?: (scenario: ScenarioDefinition, result: ScenarioRunResult) => void;
}

export interface RunnerResult {
  results: ScenarioRunResult[];
  totalDuration: number;
  passed: number;
  failed: number;
  errored: number;
}

function passMessage(outcome: Outcome): string {
  const summaries = summarizeMeasurements(outcome.verdict.measurements);
  const rates = summaries
    .map(s => `${s.direction} avg ${formatBitrate(s.avg)}`)
    .join(', ');
  return outcome.verdict.thresholdChecked ? rates : `${rates} (bitrate not checked)`;
}

function suggestionFor(error: unknown): string | undefined {
  if (error instanceof ConfigurationError) {
    return 'Check the band / bandwidth combination is supported by the test bed';
  }
  if (error instanceof AttachError && error.reason === 'timeout') {
    return `Raise RAN_ATTACH_TIMEOUT_MS or inspect ${error.target} logs`;
  }
  if (error instanceof MeasurementTimeoutError) {
    return 'Raise RAN_TRAFFIC_GRACE_MS or check the traffic generator is reachable';
  }
  return undefined;
}

export function toRunResult(scenario: ScenarioDefinition, outcome: Outcome): ScenarioRunResult {
  const { verdict } = outcome;
  if (verdict.status === 'pass') {
    return {
      id: scenario.id,
      status: 'pass',
      duration: outcome.duration,
      message: passMessage(outcome),
      warnings: outcome.teardownWarnings,
      outcome,
    };
  }

  return {
    id: scenario.id,
    status: 'fail',
    duration: outcome.duration,
    message: verdict.transportFailures.length > 0 ? 'Transport failure' : 'Bitrate below tolerance',
    details: describeVerdictFailure(verdict),
    warnings: outcome.teardownWarnings,
    outcome,
  };
}

/**
 * Runs scenarios one after another, each on a fresh test bed. A thrown error
 * marks that scenario as `error` and the run continues with the next one.
 */
export async function runScenarios(options: RunnerOptions): Promise<RunnerResult> {
  const { scenarios, createTestBed, logger, onScenarioStart, onScenarioComplete } = options;
  const results: ScenarioRunResult[] = [];
  const startTime = performance.now();

  for (const scenario of scenarios) {
    onScenarioStart?.(scenario);
    const scenarioStart = performance.now();

    let result: ScenarioRunResult;
    try {
      const sequencer = new OrchestrationSequencer(createTestBed(scenario), {
        logger,
        attachTimeoutMs: options.attachTimeoutMs,
        trafficGraceMs: options.trafficGraceMs,
      });
      const outcome = await sequencer.run(scenario.parameters);
      result = toRunResult(scenario, outcome);
    } catch (error) {
      result = {
        id: scenario.id,
        status: 'error',
        duration: performance.now() - scenarioStart,
        message: errorMessage(error),
        details: errorCode(error),
        suggestion: suggestionFor(error),
        warnings: teardownWarningsOf(error),
      };
    }

    results.push(result);
    onScenarioComplete?.(scenario, result);
  }

  return {
    results,
    totalDuration: performance.now() - startTime,
    passed: results.filter(r => r.status === 'pass').length,
    failed: results.filter(r => r.status === 'fail').length,
    errored: results.filter(r => r.status === 'error').length,
  };
}
