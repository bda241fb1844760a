/**
 * Unit Tests: verdict reduction, tolerance boundary, threshold bypass,
 * bidirectional concurrency and the measurement timeout.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { TrafficMeasurementPhase, describeVerdictFailure, relativeShortfall } from '../../src/measurement.js';
import { MeasurementTimeoutError, TransportError } from '../../src/errors.js';
import type { AttachInfo, MeasurementResult, TrafficSessionRequest } from '../../src/types.js';
import { createCapturingLogger, measurement, scenarioParams, untilAborted } from '../helpers/fake-testbed.js';

const ONE_UE: AttachInfo[] = [{ endpointId: 'ue-1', ipv4: '10.45.1.2' }];
const TWO_UES: AttachInfo[] = [
  { endpointId: 'ue-1', ipv4: '10.45.1.2' },
  { endpointId: 'ue-2', ipv4: '10.45.1.3' },
];

function phaseWith(run: (request: TrafficSessionRequest) => Promise<MeasurementResult>, graceMs = 1000) {
  const { logger, lines } = createCapturingLogger();
  const tool = { run: vi.fn(run) };
  return { phase: new TrafficMeasurementPhase({ trafficTool: tool, logger, graceMs }), tool, lines };
}

describe('relativeShortfall', () => {
  it('is the fraction of the target not reached', () => {
    expect(relativeShortfall(15_000_000, 12_000_000)).toBe(0.2);
  });

  it('is negative when the target is exceeded', () => {
    expect(relativeShortfall(1_000_000, 1_500_000)).toBe(-0.5);
  });
});

describe('TrafficMeasurementPhase threshold bypass', () => {
  it('passes a liveness scenario at 0.2 Mbps of 1 Mbps', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 200_000 }));
    const parameters = scenarioParams({
      band: 3,
      subcarrierSpacingKHz: 15,
      bandwidthMHz: 20,
      protocol: 'udp',
      direction: 'downlink',
      targetBitrateBps: 1_000_000,
      bitrateToleranceFraction: 0,
    });

    const verdict = await phase.measure(parameters, ONE_UE);

    expect(verdict.status).toBe('pass');
    expect(verdict.thresholdChecked).toBe(false);
  });

  it('passes even with zero throughput', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 0 }));

    const verdict = await phase.measure(scenarioParams({ bitrateToleranceFraction: 0 }), ONE_UE);

    expect(verdict.status).toBe('pass');
  });

  it('keeps the measured bitrate on the verdict', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 200_000 }));

    const verdict = await phase.measure(scenarioParams({ bitrateToleranceFraction: 0 }), ONE_UE);

    expect(verdict.measurements[0].samples).toEqual([{ endpointId: 'ue-1', bitrateBps: 200_000 }]);
  });

  it('still fails when the transport reports an error', async () => {
    const { phase } = phaseWith(async () =>
      measurement('downlink', { 'ue-1': 1_000_000 }, { transportOk: false, transportError: 'connection reset' }),
    );

    const verdict = await phase.measure(scenarioParams({ bitrateToleranceFraction: 0 }), ONE_UE);

    expect(verdict).toMatchObject({
      status: 'fail',
      violations: [],
      transportFailures: [{ direction: 'downlink', message: 'connection reset' }],
    });
  });
});

describe('TrafficMeasurementPhase tolerance', () => {
  it('fails a TCP uplink at 12 of 15 Mbps with shortfall 0.2', async () => {
    const { phase } = phaseWith(async () => measurement('uplink', { 'ue-1': 12_000_000 }));
    const parameters = scenarioParams({
      band: 3,
      subcarrierSpacingKHz: 15,
      bandwidthMHz: 5,
      protocol: 'tcp',
      direction: 'uplink',
      targetBitrateBps: 15_000_000,
      bitrateToleranceFraction: 0.1,
      durationSeconds: 20,
    });

    const verdict = await phase.measure(parameters, ONE_UE);

    expect(verdict.status).toBe('fail');
    if (verdict.status !== 'fail') return;
    expect(verdict.violations).toEqual([
      {
        endpointId: 'ue-1',
        direction: 'uplink',
        targetBitrateBps: 15_000_000,
        measuredBitrateBps: 12_000_000,
        shortfall: 0.2,
      },
    ]);
    expect(verdict.transportFailures).toEqual([]);
  });

  it('passes a shortfall exactly at the tolerance', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 9_000_000 }));

    const verdict = await phase.measure(
      scenarioParams({ targetBitrateBps: 10_000_000, bitrateToleranceFraction: 0.1 }),
      ONE_UE,
    );

    expect(verdict.status).toBe('pass');
    expect(verdict.thresholdChecked).toBe(true);
  });

  it('fails a shortfall just above the tolerance', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 8_999_999 }));

    const verdict = await phase.measure(
      scenarioParams({ targetBitrateBps: 10_000_000, bitrateToleranceFraction: 0.1 }),
      ONE_UE,
    );

    expect(verdict.status).toBe('fail');
  });

  it('records only the endpoints below tolerance', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 1_000_000, 'ue-2': 500_000 }));

    const verdict = await phase.measure(scenarioParams(), TWO_UES);

    if (verdict.status !== 'fail') throw new Error('expected a failed verdict');
    expect(verdict.violations.map(v => v.endpointId)).toEqual(['ue-2']);
    expect(verdict.violations[0].shortfall).toBe(0.5);
  });

  it('logs each violation as a warning', async () => {
    const { phase, lines } = phaseWith(async () => measurement('uplink', { 'ue-1': 12_000_000 }));

    await phase.measure(
      scenarioParams({ direction: 'uplink', targetBitrateBps: 15_000_000 }),
      ONE_UE,
    );

    expect(lines.warn).toEqual(['ue-1 uplink below target: 12.00 Mbps of 15.00 Mbps']);
  });

  it.each([
    ['not a number', Number.NaN],
    ['infinite', Number.POSITIVE_INFINITY],
    ['negative', -1],
  ])('fails a bitrate that is %s', async (_, bitrateBps) => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': bitrateBps }));

    const verdict = await phase.measure(scenarioParams({ bitrateToleranceFraction: 0.1 }), ONE_UE);

    expect(verdict).toMatchObject({
      status: 'fail',
      violations: [],
      transportFailures: [
        {
          direction: 'downlink',
          endpointId: 'ue-1',
          message: `ue-1 reported an unusable downlink bitrate (${bitrateBps})`,
        },
      ],
    });
  });

  it('fails an unusable bitrate even when the bitrate check is off', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': Number.NaN }));

    const verdict = await phase.measure(scenarioParams({ bitrateToleranceFraction: 0 }), ONE_UE);

    expect(verdict.status).toBe('fail');
  });

  it('treats a missing endpoint sample as a transport failure', async () => {
    const { phase } = phaseWith(async () => measurement('downlink', { 'ue-1': 1_000_000 }));

    const verdict = await phase.measure(scenarioParams(), TWO_UES);

    expect(verdict).toMatchObject({
      status: 'fail',
      transportFailures: [
        { direction: 'downlink', endpointId: 'ue-2', message: 'no downlink measurement reported for ue-2' },
      ],
    });
  });
});

describe('TrafficMeasurementPhase sessions', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs one session with the scenario settings', async () => {
    const { phase, tool } = phaseWith(async () => measurement('uplink', { 'ue-1': 1_000_000 }));

    await phase.measure(
      scenarioParams({ direction: 'uplink', protocol: 'tcp', durationSeconds: 5, targetBitrateBps: 1_000_000 }),
      ONE_UE,
    );

    expect(tool.run).toHaveBeenCalledTimes(1);
    expect(tool.run.mock.calls[0][0]).toMatchObject({
      direction: 'uplink',
      protocol: 'tcp',
      durationSeconds: 5,
      targetBitrateBps: 1_000_000,
      endpoints: ONE_UE,
    });
  });

  it('starts downlink and uplink together for bidirectional traffic', async () => {
    const pending: Array<{ request: TrafficSessionRequest; resolve: (r: MeasurementResult) => void }> = [];
    const { phase } = phaseWith(request =>
      new Promise(resolve => {
        pending.push({ request, resolve });
      }),
    );

    const verdictPromise = phase.measure(scenarioParams({ direction: 'bidirectional' }), ONE_UE);
    await vi.waitFor(() => expect(pending).toHaveLength(2));

    expect(pending.map(p => p.request.direction)).toEqual(['downlink', 'uplink']);

    pending[1].resolve(measurement('uplink', { 'ue-1': 1_000_000 }));
    pending[0].resolve(measurement('downlink', { 'ue-1': 1_000_000 }));
    const verdict = await verdictPromise;

    expect(verdict.status).toBe('pass');
    expect(verdict.measurements.map(m => m.direction)).toEqual(['downlink', 'uplink']);
  });

  it('fails bidirectional traffic on the short direction only', async () => {
    const { phase } = phaseWith(async request =>
      measurement(request.direction, { 'ue-1': request.direction === 'uplink' ? 700_000 : 1_000_000 }),
    );

    const verdict = await phase.measure(scenarioParams({ direction: 'bidirectional' }), ONE_UE);

    if (verdict.status !== 'fail') throw new Error('expected a failed verdict');
    expect(verdict.violations.map(v => v.direction)).toEqual(['uplink']);
  });

  it('turns a TransportError into a transport failure', async () => {
    const { phase } = phaseWith(async request => {
      if (request.direction === 'uplink') {
        throw new TransportError('iperf client exited', { endpointId: 'ue-1' });
      }
      return measurement('downlink', { 'ue-1': 1_000_000 });
    });

    const verdict = await phase.measure(scenarioParams({ direction: 'bidirectional' }), ONE_UE);

    expect(verdict).toMatchObject({
      status: 'fail',
      transportFailures: [{ direction: 'uplink', endpointId: 'ue-1', message: 'iperf client exited' }],
    });
    expect(describeVerdictFailure(verdict)).toBe('uplink: iperf client exited');
  });

  it('propagates errors other than TransportError', async () => {
    const { phase } = phaseWith(async () => {
      throw new Error('traffic generator binary missing');
    });

    await expect(phase.measure(scenarioParams(), ONE_UE)).rejects.toThrow('traffic generator binary missing');
  });

  it('times out after the duration plus the grace margin', async () => {
    vi.useFakeTimers();
    const { phase, tool } = phaseWith(request => untilAborted(request.signal), 2_000);

    const verdict = phase.measure(scenarioParams({ durationSeconds: 5 }), ONE_UE);
    const assertion = expect(verdict).rejects.toThrow('Traffic sessions (downlink) did not finish within 7000ms');
    await vi.advanceTimersByTimeAsync(7_000);
    await assertion;

    expect(tool.run.mock.calls[0][0].signal.aborted).toBe(true);
  });

  it('raises MeasurementTimeoutError even when the tool ignores cancellation', async () => {
    vi.useFakeTimers();
    const { phase } = phaseWith(() => new Promise<MeasurementResult>(() => undefined), 0);

    const verdict = phase.measure(scenarioParams({ durationSeconds: 1, direction: 'bidirectional' }), ONE_UE);
    const assertion = expect(verdict).rejects.toBeInstanceOf(MeasurementTimeoutError);
    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;
  });

  it('does not time out before the budget is spent', async () => {
    vi.useFakeTimers();
    let settled = false;
    const { phase } = phaseWith(request => untilAborted(request.signal), 2_000);

    const done = phase
      .measure(scenarioParams({ durationSeconds: 5 }), ONE_UE)
      .catch(() => 'timed out')
      .finally(() => {
        settled = true;
      });
    await vi.advanceTimersByTimeAsync(6_999);

    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await expect(done).resolves.toBe('timed out');
  });
});

describe('describeVerdictFailure', () => {
  it('lists shortfalls with measured and target bitrates', async () => {
    const { phase } = phaseWith(async () => measurement('uplink', { 'ue-1': 12_000_000 }));

    const verdict = await phase.measure(
      scenarioParams({ direction: 'uplink', targetBitrateBps: 15_000_000 }),
      ONE_UE,
    );

    expect(describeVerdictFailure(verdict)).toBe('ue-1 uplink shortfall 0.2 (12.00 Mbps of 15.00 Mbps)');
  });
});
