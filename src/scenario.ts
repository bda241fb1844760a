import { z } from 'zod';
import { ScenarioValidationError } from './errors.js';
import type { LinkDirection, ScenarioParameters, TrafficDirection } from './types.js';

export const DEFAULT_BITRATE_TOLERANCE = 0.1;

// One day; the whole traffic window has to fit in a single timer
export const MAX_DURATION_SECONDS = 86_400;

// Subcarrier spacings each supported band may run with
const BAND_SUBCARRIER_SPACINGS = new Map<number, readonly number[]>([
  [3, [15]],
  [7, [15]],
  [41, [15, 30]],
  [78, [30]],
]);

// Lowest sample rate that fits the FFT for a channel bandwidth
const MINIMUM_SAMPLE_RATES_HZ = new Map<number, number>([
  [5, 7_680_000],
  [10, 15_360_000],
  [15, 23_040_000],
  [20, 30_720_000],
  [25, 38_400_000],
  [30, 46_080_000],
  [40, 61_440_000],
  [50, 61_440_000],
]);

export function minimumSampleRateForBandwidth(bandwidthMHz: number): number {
  const rate = MINIMUM_SAMPLE_RATES_HZ.get(bandwidthMHz);
  if (rate === undefined) {
    throw new ScenarioValidationError([`no sample rate known for a ${bandwidthMHz} MHz channel`]);
  }
  return rate;
}

export function isSupportedBandwidth(bandwidthMHz: number): boolean {
  return MINIMUM_SAMPLE_RATES_HZ.has(bandwidthMHz);
}

const scenarioSchema = z
  .object({
    band: z.number().int().positive(),
    subcarrierSpacingKHz: z.number().int().positive(),
    bandwidthMHz: z.number().int().positive(),
    sampleRateHz: z.number().int().positive().nullable().default(null),
    protocol: z.enum(['udp', 'tcp']),
    direction: z.enum(['downlink', 'uplink', 'bidirectional']),
    durationSeconds: z.number().int().positive().max(MAX_DURATION_SECONDS),
    targetBitrateBps: z.number().int().positive(),
    bitrateToleranceFraction: z.number().min(0).max(1).default(DEFAULT_BITRATE_TOLERANCE),
    timingAdvance: z.number().int().min(-1).default(-1),
    timeAlignmentCalibration: z.union([z.number().int(), z.literal('auto')]).default('auto'),
    artifactPolicy: z
      .object({
        alwaysDownload: z.boolean().default(false),
        searchLogs: z.boolean().default(false),
      })
      .default({}),
  })
  .superRefine((value, ctx) => {
    const spacings = BAND_SUBCARRIER_SPACINGS.get(value.band);
    if (!spacings) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['band'],
        message: `band ${value.band} is not supported`,
      });
    } else if (!spacings.includes(value.subcarrierSpacingKHz)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['subcarrierSpacingKHz'],
        message: `band ${value.band} does not run with ${value.subcarrierSpacingKHz} kHz subcarrier spacing`,
      });
    }

    if (!isSupportedBandwidth(value.bandwidthMHz)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bandwidthMHz'],
        message: `${value.bandwidthMHz} MHz is not a supported channel bandwidth`,
      });
    }
  });

export type ScenarioInput = z.input<typeof scenarioSchema>;

/**
 * Validates and freezes a scenario. Nothing downstream may change it, so it
 * is built completely here, before any test bed element is touched.
 */
export function defineScenario(input: ScenarioInput): ScenarioParameters {
  const parsed = scenarioSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScenarioValidationError(
      parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }

  const { artifactPolicy, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    artifactPolicy: Object.freeze({ ...artifactPolicy }),
  });
}

export function linkDirections(direction: TrafficDirection): LinkDirection[] {
  switch (direction) {
    case 'downlink':
      return ['downlink'];
    case 'uplink':
      return ['uplink'];
    case 'bidirectional':
      return ['downlink', 'uplink'];
  }
}
