/**
 * Integration Tests: every scenario in the table against the in-process test bed
 */
import { describe, it, expect, vi } from 'vitest';
import { AttachError } from '../../src/errors.js';
import { runScenarios } from '../../src/runner.js';
import { allScenarios, selectScenarios } from '../../src/scenarios/index.js';
import type { ScenarioDefinition } from '../../src/scenarios/index.js';
import { OrchestrationSequencer } from '../../src/sequencer.js';
import { createSimulatedTestBed } from '../../src/simulated/index.js';
import type { SimulatedTestBedOptions } from '../../src/simulated/index.js';
import { createCapturingLogger } from '../helpers/fake-testbed.js';

function bedFor(scenario: ScenarioDefinition, options: Partial<SimulatedTestBedOptions> = {}) {
  const collectArtifacts = vi.fn(async () => undefined);
  const bed = createSimulatedTestBed(scenario, {
    artifactsDir: 'unused',
    artifacts: { collectArtifacts },
    ...options,
  });
  return { bed, collectArtifacts };
}

function findScenario(id: string): ScenarioDefinition {
  const scenario = allScenarios.find(s => s.id === id);
  if (!scenario) {
    throw new Error(`no scenario ${id}`);
  }
  return scenario;
}

describe('scenario table on the simulated test bed', () => {
  it.each(allScenarios.map((s): [string, ScenarioDefinition] => [s.id, s]))('%s passes and tears down', async (_, scenario) => {
    const { logger } = createCapturingLogger();
    const { bed, collectArtifacts } = bedFor(scenario);

    const outcome = await new OrchestrationSequencer(bed, { logger }).run(scenario.parameters);

    expect(outcome.verdict.status).toBe('pass');
    expect(outcome.teardownWarnings).toEqual([]);
    expect(outcome.artifactsCollected).toBe(scenario.parameters.artifactPolicy.alwaysDownload);
    expect(collectArtifacts).toHaveBeenCalledTimes(scenario.parameters.artifactPolicy.alwaysDownload ? 1 : 0);
    expect(bed.coreNetwork.isRunning).toBe(false);
    expect(bed.baseStation.isRunning).toBe(false);
    expect(bed.userEquipments.every(ue => ue.ipv4 === null)).toBe(true);
    expect(bed.userEquipments).toHaveLength(scenario.ueCount);
  });
});

describe('degraded simulated test bed', () => {
  it('fails a zmq scenario for every UE when throughput halves', async () => {
    const scenario = findScenario('zmq[band:3-scs:15-bandwidth:10-bitrate:15000000-artifacts:false-udp-downlink]');
    const { logger } = createCapturingLogger();
    const { bed, collectArtifacts } = bedFor(scenario, { efficiency: 0.5 });

    const outcome = await new OrchestrationSequencer(bed, { logger }).run(scenario.parameters);

    expect(outcome.verdict.status).toBe('fail');
    if (outcome.verdict.status !== 'fail') return;
    expect(outcome.verdict.violations.map(v => v.endpointId)).toEqual(['ue-1', 'ue-2', 'ue-3', 'ue-4']);
    expect(outcome.verdict.violations[0].shortfall).toBe(0.5);
    // searchLogs is set for zmq, so a failure pulls the logs
    expect(outcome.artifactsCollected).toBe(true);
    expect(collectArtifacts).toHaveBeenCalledWith(
      { alwaysDownload: false, searchLogs: true },
      expect.objectContaining({ status: 'fail' }),
    );
  });

  it('still passes smoke scenarios at a fifth of the target', async () => {
    const { logger } = createCapturingLogger();

    const run = await runScenarios({
      scenarios: selectScenarios({ marks: ['smoke'] }),
      createTestBed: scenario => bedFor(scenario, { efficiency: 0.2 }).bed,
      logger,
    });

    expect(run.passed).toBe(12);
    expect(run.results.every(r => r.message.endsWith('(bitrate not checked)'))).toBe(true);
  });

  it('tears everything down when a UE is slower than the attach deadline', async () => {
    const scenario = findScenario('rf[band:41-scs:30-bandwidth:10-udp-bidirectional]');
    const { logger } = createCapturingLogger();
    const { bed, collectArtifacts } = bedFor(scenario, { attachDelayMs: 1_000 });

    const run = new OrchestrationSequencer(bed, { logger, attachTimeoutMs: 10 }).run(scenario.parameters);

    await expect(run).rejects.toBeInstanceOf(AttachError);
    await expect(run).rejects.toThrow('ue-1 did not attach within 10ms');
    expect(bed.coreNetwork.isRunning).toBe(false);
    expect(bed.baseStation.isRunning).toBe(false);
    expect(bed.userEquipments.every(ue => ue.ipv4 === null)).toBe(true);
    // rf always downloads artifacts
    expect(collectArtifacts).toHaveBeenCalledWith(
      { alwaysDownload: true, searchLogs: false },
      { status: 'error', code: 'ATTACH_TIMEOUT', message: 'ue-1 did not attach within 10ms' },
    );
  });
});
