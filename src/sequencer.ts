import { withDeadline } from './deadline.js';
import { AttachError, ConfigurationError, errorCode, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { DEFAULT_TRAFFIC_GRACE_MS, TrafficMeasurementPhase } from './measurement.js';
import { TestBedScope } from './testbed-scope.js';
import type {
  AttachInfo,
  Outcome,
  ProvisionalOutcome,
  ScenarioParameters,
  TestBed,
  Verdict,
} from './types.js';

export const DEFAULT_ATTACH_TIMEOUT_MS = 30_000;

export interface SequencerOptions {
  logger: Logger;
  attachTimeoutMs?: number;
  trafficGraceMs?: number;
  // Defaults to the attach timeout
  lateAttachWaitMs?: number;
}

const teardownWarningsByError = new WeakMap<object, string[]>();

/** Teardown warnings of the run that raised `error`, if the sequencer raised it. */
export function teardownWarningsOf(error: unknown): string[] {
  if (typeof error !== 'object' || error === null) {
    return [];
  }
  return teardownWarningsByError.get(error) ?? [];
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

async function settle<T>(fn: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Drives one scenario through configure, attach, measure and teardown.
 *
 * Teardown runs exactly once whatever the first three phases did. A measured
 * failure comes back as a `fail` verdict; configuration, attach and
 * measurement-timeout errors are re-thrown after teardown. Teardown problems
 * never replace the result: they are warnings on the outcome, or reachable
 * through `teardownWarningsOf` for a re-thrown error.
 */
export class OrchestrationSequencer {
  private readonly testBed: TestBed;
  private readonly logger: Logger;
  private readonly attachTimeoutMs: number;
  private readonly lateAttachWaitMs: number;
  private readonly measurement: TrafficMeasurementPhase;

  constructor(testBed: TestBed, options: SequencerOptions) {
    this.testBed = testBed;
    this.logger = options.logger;
    this.attachTimeoutMs = options.attachTimeoutMs ?? DEFAULT_ATTACH_TIMEOUT_MS;
    this.lateAttachWaitMs = options.lateAttachWaitMs ?? this.attachTimeoutMs;
    this.measurement = new TrafficMeasurementPhase({
      trafficTool: testBed.trafficTool,
      logger: options.logger,
      graceMs: options.trafficGraceMs ?? DEFAULT_TRAFFIC_GRACE_MS,
    });
  }

  async run(parameters: ScenarioParameters): Promise<Outcome> {
    const start = performance.now();
    const scope = new TestBedScope(this.testBed.elements, this.logger, {
      lateAttachWaitMs: this.lateAttachWaitMs,
    });

    const settled = await settle(() => this.execute(parameters, scope));

    const provisional: ProvisionalOutcome = settled.ok
      ? settled.value
      : { status: 'error', code: errorCode(settled.error), message: errorMessage(settled.error) };
    const { warnings, artifactsCollected } = await this.teardown(scope, parameters, provisional);

    if (!settled.ok) {
      if (typeof settled.error === 'object' && settled.error !== null) {
        teardownWarningsByError.set(settled.error, warnings);
      }
      throw settled.error;
    }

    return {
      verdict: settled.value,
      teardownWarnings: warnings,
      artifactsCollected,
      duration: performance.now() - start,
    };
  }

  private async execute(parameters: ScenarioParameters, scope: TestBedScope): Promise<Verdict> {
    if (scope.endpoints.length === 0) {
      throw new ConfigurationError('Test bed has no endpoints to attach');
    }
    await this.configure(parameters);
    const attached = await this.attach(scope);
    return this.measurement.measure(parameters, attached);
  }

  private async configure(parameters: ScenarioParameters): Promise<void> {
    try {
      const applied = await this.testBed.configurator.apply(parameters);
      this.logger.info(
        `Configured band ${applied.band}, ${applied.subcarrierSpacingKHz} kHz, ` +
        `${applied.bandwidthMHz} MHz @ ${applied.sampleRateHz / 1e6} Msps`,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(`Test bed rejected configuration: ${errorMessage(error)}`, { cause: error });
    }
  }

  // Endpoints attach one at a time so a failure leaves a known prefix attached.
  private async attach(scope: TestBedScope): Promise<AttachInfo[]> {
    const { baseStation, coreNetwork } = scope;

    await this.startElement(coreNetwork.id, () => scope.startCoreNetwork());
    await this.startElement(baseStation.id, () => scope.startBaseStation());

    const attached: AttachInfo[] = [];
    for (const endpoint of scope.endpoints) {
      try {
        const info = await withDeadline(
          signal => endpoint.attach(baseStation, coreNetwork, signal),
          this.attachTimeoutMs,
          () => new AttachError(endpoint.id, 'timeout', `${endpoint.id} did not attach within ${this.attachTimeoutMs}ms`),
          late => scope.adoptLateAttach(endpoint, late),
        );
        scope.markAttached(endpoint);
        attached.push(info);
        this.logger.debug(`${endpoint.id} attached with ${info.ipv4}`);
      } catch (error) {
        if (error instanceof AttachError) {
          throw error;
        }
        throw new AttachError(endpoint.id, 'rejected', `${endpoint.id} failed to attach: ${errorMessage(error)}`, { cause: error });
      }
    }

    this.logger.info(`${attached.length} endpoint(s) attached`);
    return attached;
  }

  private async startElement(id: string, start: () => Promise<void>): Promise<void> {
    try {
      await start();
    } catch (error) {
      throw new AttachError(id, 'rejected', `${id} failed to start: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async teardown(
    scope: TestBedScope,
    parameters: ScenarioParameters,
    provisional: ProvisionalOutcome,
  ): Promise<{ warnings: string[]; artifactsCollected: boolean }> {
    const warnings = await scope.release();

    const policy = parameters.artifactPolicy;
    const wanted = policy.alwaysDownload || (provisional.status !== 'pass' && policy.searchLogs);
    if (!wanted) {
      return { warnings, artifactsCollected: false };
    }

    try {
      await this.testBed.artifacts.collectArtifacts(policy, provisional);
      return { warnings, artifactsCollected: true };
    } catch (error) {
      const warning = `artifact collection failed: ${errorMessage(error)}`;
      this.logger.warn(warning);
      return { warnings: [...warnings, warning], artifactsCollected: false };
    }
  }
}
