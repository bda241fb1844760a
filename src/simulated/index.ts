import type { ScenarioDefinition } from '../scenarios/index.js';
import type { ArtifactReporter, TestBed } from '../types.js';
import { FileArtifactCollector } from './artifacts.js';
import { SimulatedConfigurator } from './configurator.js';
import { SimulatedBaseStation, SimulatedCoreNetwork, SimulatedUserEquipment } from './elements.js';
import { SimulatedTrafficTool } from './traffic.js';

export * from './artifacts.js';
export * from './configurator.js';
export * from './elements.js';
export * from './traffic.js';

export interface SimulatedTestBedOptions {
  artifactsDir: string;
  efficiency?: number;
  timeScale?: number;
  attachDelayMs?: number;
  // Replaces the file collector, e.g. to keep artifacts in memory
  artifacts?: ArtifactReporter;
}

export interface SimulatedTestBed extends TestBed {
  coreNetwork: SimulatedCoreNetwork;
  baseStation: SimulatedBaseStation;
  userEquipments: SimulatedUserEquipment[];
}

/** Builds a fresh in-process test bed sized for the scenario. */
export function createSimulatedTestBed(
  scenario: ScenarioDefinition,
  options: SimulatedTestBedOptions,
): SimulatedTestBed {
  const coreNetwork = new SimulatedCoreNetwork();
  const baseStation = new SimulatedBaseStation();
  const userEquipments = Array.from(
    { length: scenario.ueCount },
    (_, i) => new SimulatedUserEquipment(`ue-${i + 1}`, coreNetwork, { attachDelayMs: options.attachDelayMs }),
  );

  return {
    coreNetwork,
    baseStation,
    userEquipments,
    elements: { endpoints: userEquipments, baseStation, coreNetwork },
    configurator: new SimulatedConfigurator(baseStation),
    trafficTool: new SimulatedTrafficTool(coreNetwork, {
      efficiency: options.efficiency,
      timeScale: options.timeScale,
    }),
    artifacts: options.artifacts ?? new FileArtifactCollector(
      options.artifactsDir,
      scenario.id,
      [coreNetwork, baseStation, ...userEquipments],
    ),
  };
}
