import { config } from 'dotenv';
import { MAX_TIMEOUT_MS } from './deadline.js';
import { MAX_DURATION_SECONDS } from './scenario.js';

config();

// Leaves room for the longest traffic window inside one timer
export const MAX_TRAFFIC_GRACE_MS = MAX_TIMEOUT_MS - MAX_DURATION_SECONDS * 1000;

export interface RanConfig {
  attachTimeoutMs: number;
  trafficGraceMs: number;
  artifactsDir: string;
  simEfficiency: number;
  simTimeScale: number;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, max = Infinity): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number (got "${raw}")`);
  }
  if (value > max) {
    throw new Error(`${name} must be at most ${max} (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RanConfig {
  const simEfficiency = readNumber(env, 'RAN_SIM_EFFICIENCY', 0.95);
  if (simEfficiency > 1) {
    throw new Error(`RAN_SIM_EFFICIENCY must be between 0 and 1 (got "${simEfficiency}")`);
  }

  return {
    attachTimeoutMs: readNumber(env, 'RAN_ATTACH_TIMEOUT_MS', 30000, MAX_TIMEOUT_MS),
    trafficGraceMs: readNumber(env, 'RAN_TRAFFIC_GRACE_MS', 30000, MAX_TRAFFIC_GRACE_MS),
    artifactsDir: env.RAN_ARTIFACTS_DIR || './artifacts',
    simEfficiency,
    simTimeScale: readNumber(env, 'RAN_SIM_TIME_SCALE', 0),
  };
}
