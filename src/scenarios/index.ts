import { defineScenario, minimumSampleRateForBandwidth } from '../scenario.js';
import { allFamilies } from './families.js';
import type { RadioRow, ScenarioDefinition, ScenarioFamily } from './types.js';

export * from './constants.js';
export * from './families.js';
export type { FamilyName, RadioRow, ScenarioDefinition, ScenarioFamily } from './types.js';

function rowId(family: ScenarioFamily, row: RadioRow, targetBitrateBps: number, alwaysDownload: boolean): string {
  const radio = `band:${row.band}-scs:${row.subcarrierSpacingKHz}-bandwidth:${row.bandwidthMHz}`;
  if (family.idFormat === 'zmq') {
    return `${radio}-bitrate:${targetBitrateBps}-artifacts:${alwaysDownload}`;
  }
  return radio;
}

/**
 * Crosses every radio row of a family with its protocols and directions.
 * Row values override the family defaults.
 */
export function expandFamily(family: ScenarioFamily): ScenarioDefinition[] {
  const scenarios: ScenarioDefinition[] = [];

  for (const row of family.rows) {
    const targetBitrateBps = row.targetBitrateBps ?? family.targetBitrateBps;
    const alwaysDownload = row.alwaysDownload ?? family.alwaysDownload;
    const sampleRateHz = family.sampleRate === 'minimum'
      ? minimumSampleRateForBandwidth(row.bandwidthMHz)
      : null;

    for (const protocol of family.protocols) {
      for (const direction of family.directions) {
        const parameters = defineScenario({
          band: row.band,
          subcarrierSpacingKHz: row.subcarrierSpacingKHz,
          bandwidthMHz: row.bandwidthMHz,
          sampleRateHz,
          protocol,
          direction,
          durationSeconds: family.durationSeconds,
          targetBitrateBps,
          bitrateToleranceFraction: family.bitrateToleranceFraction,
          timingAdvance: family.timingAdvance,
          timeAlignmentCalibration: family.timeAlignmentCalibration,
          artifactPolicy: { alwaysDownload, searchLogs: family.searchLogs },
        });

        scenarios.push({
          id: `${family.name}[${rowId(family, row, targetBitrateBps, alwaysDownload)}-${protocol}-${direction}]`,
          family: family.name,
          marks: [...family.marks, protocol, direction],
          ueCount: family.ueCount,
          parameters,
        });
      }
    }
  }

  return scenarios;
}

export const allScenarios: ScenarioDefinition[] = allFamilies.flatMap(expandFamily);

export interface ScenarioSelection {
  marks?: string[];
  only?: string[];
}

/**
 * Keeps scenarios carrying every requested mark and, when `only` is given,
 * whose id contains one of its entries (case-insensitive).
 */
export function selectScenarios(
  selection: ScenarioSelection,
  scenarios: ScenarioDefinition[] = allScenarios,
): ScenarioDefinition[] {
  const marks = (selection.marks ?? []).map(m => m.toLowerCase());
  const only = (selection.only ?? []).map(n => n.toLowerCase());

  return scenarios.filter(scenario =>
    marks.every(mark => scenario.marks.includes(mark)) &&
    (only.length === 0 || only.some(n => scenario.id.toLowerCase().includes(n)))
  );
}

export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}
