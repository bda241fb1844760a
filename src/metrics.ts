import type { LinkDirection, MeasurementResult } from './types.js';

export interface BitrateStats {
  min: number;
  max: number;
  avg: number;
  total: number;
}

export interface DirectionSummary extends BitrateStats {
  direction: LinkDirection;
  endpoints: number;
  elapsedMs: number;
}

export function calculateBitrateStats(bitrates: number[]): BitrateStats {
  if (bitrates.length === 0) {
    return { min: 0, max: 0, avg: 0, total: 0 };
  }

  const sorted = [...bitrates].sort((a, b) => a - b);
  const total = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: total / sorted.length,
    total,
  };
}

export function summarizeMeasurements(results: MeasurementResult[]): DirectionSummary[] {
  return results.map(result => ({
    direction: result.direction,
    endpoints: result.samples.length,
    elapsedMs: result.elapsedMs,
    ...calculateBitrateStats(result.samples.map(s => s.bitrateBps)),
  }));
}

export function formatBitrate(bps: number): string {
  if (bps >= 1e9) return `${(bps / 1e9).toFixed(2)} Gbps`;
  if (bps >= 1e6) return `${(bps / 1e6).toFixed(2)} Mbps`;
  if (bps >= 1e3) return `${(bps / 1e3).toFixed(1)} kbps`;
  return `${Math.round(bps)} bps`;
}

export function formatDuration(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}
