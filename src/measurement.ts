import { withDeadline } from './deadline.js';
import { MeasurementTimeoutError, TransportError } from './errors.js';
import type { Logger } from './logger.js';
import { formatBitrate } from './metrics.js';
import { linkDirections } from './scenario.js';
import type {
  AttachInfo,
  LinkDirection,
  MeasurementResult,
  ScenarioParameters,
  ShortfallRecord,
  TrafficTool,
  TransportFailure,
  Verdict,
} from './types.js';

export const DEFAULT_TRAFFIC_GRACE_MS = 30_000;

export interface MeasurementOptions {
  trafficTool: TrafficTool;
  logger: Logger;
  graceMs?: number;
}

type SessionResult =
  | { ok: true; result: MeasurementResult }
  | { ok: false; failure: TransportFailure };

export function relativeShortfall(targetBitrateBps: number, measuredBitrateBps: number): number {
  return (targetBitrateBps - measuredBitrateBps) / targetBitrateBps;
}

/**
 * Runs one traffic session per exercised direction and reduces the results to
 * a verdict.
 *
 * Sessions for a bidirectional scenario share the window and are awaited
 * together. The whole phase gets `durationSeconds` plus a grace margin; going
 * past it aborts the sessions and raises `MeasurementTimeoutError`. A
 * `TransportError` from the tool is a failed verdict, any other rejection
 * propagates.
 */
export class TrafficMeasurementPhase {
  private readonly trafficTool: TrafficTool;
  private readonly logger: Logger;
  private readonly graceMs: number;

  constructor(options: MeasurementOptions) {
    this.trafficTool = options.trafficTool;
    this.logger = options.logger;
    this.graceMs = options.graceMs ?? DEFAULT_TRAFFIC_GRACE_MS;
  }

  async measure(parameters: ScenarioParameters, attached: readonly AttachInfo[]): Promise<Verdict> {
    const directions = linkDirections(parameters.direction);
    const budgetMs = parameters.durationSeconds * 1000 + this.graceMs;

    this.logger.info(
      `Traffic ${parameters.protocol.toUpperCase()} ${directions.join('+')} ` +
      `@ ${formatBitrate(parameters.targetBitrateBps)} for ${parameters.durationSeconds}s ` +
      `on ${attached.length} endpoint(s)`,
    );

    const sessions = await withDeadline(
      signal => Promise.all(directions.map(direction => this.runSession(parameters, direction, attached, signal))),
      budgetMs,
      () => new MeasurementTimeoutError(budgetMs, directions),
    );

    return this.evaluate(parameters, attached, sessions);
  }

  private async runSession(
    parameters: ScenarioParameters,
    direction: LinkDirection,
    attached: readonly AttachInfo[],
    signal: AbortSignal,
  ): Promise<SessionResult> {
    try {
      const result = await this.trafficTool.run({
        direction,
        protocol: parameters.protocol,
        targetBitrateBps: parameters.targetBitrateBps,
        durationSeconds: parameters.durationSeconds,
        endpoints: attached,
        signal,
      });
      return { ok: true, result };
    } catch (error) {
      if (error instanceof TransportError) {
        return {
          ok: false,
          failure: { direction: error.direction ?? direction, endpointId: error.endpointId, message: error.message },
        };
      }
      throw error;
    }
  }

  private evaluate(
    parameters: ScenarioParameters,
    attached: readonly AttachInfo[],
    sessions: SessionResult[],
  ): Verdict {
    const thresholdChecked = parameters.bitrateToleranceFraction > 0;
    const measurements: MeasurementResult[] = [];
    const transportFailures: TransportFailure[] = [];
    const violations: ShortfallRecord[] = [];

    for (const session of sessions) {
      if (!session.ok) {
        transportFailures.push(session.failure);
        continue;
      }

      const { result } = session;
      measurements.push(result);

      if (!result.transportOk) {
        transportFailures.push({
          direction: result.direction,
          message: result.transportError ?? 'traffic tool reported a transport failure',
        });
      }

      for (const endpoint of attached) {
        const sample = result.samples.find(s => s.endpointId === endpoint.endpointId);
        if (!sample) {
          transportFailures.push({
            direction: result.direction,
            endpointId: endpoint.endpointId,
            message: `no ${result.direction} measurement reported for ${endpoint.endpointId}`,
          });
          continue;
        }
        if (!Number.isFinite(sample.bitrateBps) || sample.bitrateBps < 0) {
          transportFailures.push({
            direction: result.direction,
            endpointId: endpoint.endpointId,
            message: `${endpoint.endpointId} reported an unusable ${result.direction} bitrate (${sample.bitrateBps})`,
          });
          continue;
        }

        const shortfall = relativeShortfall(parameters.targetBitrateBps, sample.bitrateBps);
        this.logger.debug(
          `${endpoint.endpointId} ${result.direction}: ${formatBitrate(sample.bitrateBps)} ` +
          `(shortfall ${shortfall.toFixed(3)})`,
        );

        // Closed bound: exactly at the tolerance passes
        if (thresholdChecked && !(shortfall <= parameters.bitrateToleranceFraction)) {
          violations.push({
            endpointId: endpoint.endpointId,
            direction: result.direction,
            targetBitrateBps: parameters.targetBitrateBps,
            measuredBitrateBps: sample.bitrateBps,
            shortfall,
          });
        }
      }
    }

    for (const failure of transportFailures) {
      this.logger.warn(`transport failure (${failure.direction}): ${failure.message}`);
    }
    for (const violation of violations) {
      this.logger.warn(
        `${violation.endpointId} ${violation.direction} below target: ` +
        `${formatBitrate(violation.measuredBitrateBps)} of ${formatBitrate(violation.targetBitrateBps)}`,
      );
    }

    if (transportFailures.length === 0 && violations.length === 0) {
      return { status: 'pass', thresholdChecked, measurements };
    }
    return { status: 'fail', thresholdChecked, measurements, violations, transportFailures };
  }
}

export function describeVerdictFailure(verdict: Verdict): string {
  if (verdict.status === 'pass') {
    return '';
  }
  const parts = [
    ...verdict.transportFailures.map(f => `${f.direction}: ${f.message}`),
    ...verdict.violations.map(v =>
      `${v.endpointId} ${v.direction} shortfall ${formatShortfall(v.shortfall)} ` +
      `(${formatBitrate(v.measuredBitrateBps)} of ${formatBitrate(v.targetBitrateBps)})`,
    ),
  ];
  return parts.join('; ');
}

export function formatShortfall(shortfall: number): string {
  return Number(shortfall.toFixed(4)).toString();
}
