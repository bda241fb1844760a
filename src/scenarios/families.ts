import { ALL_DIRECTIONS, ALL_PROTOCOLS, HIGH_BITRATE, LONG_DURATION, LOW_BITRATE, SHORT_DURATION } from './constants.js';
import type { ScenarioFamily } from './types.js';

export const androidFamily: ScenarioFamily = {
  name: 'android',
  description: 'Single commercial handset over a real radio',
  marks: ['android'],
  ueCount: 1,
  protocols: ALL_PROTOCOLS,
  directions: ALL_DIRECTIONS,
  idFormat: 'radio',
  rows: [
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 10 },
    { band: 78, subcarrierSpacingKHz: 30, bandwidthMHz: 20 },
  ],
  durationSeconds: SHORT_DURATION,
  targetBitrateBps: HIGH_BITRATE,
  sampleRate: 'minimum',
  timingAdvance: -1,
  timeAlignmentCalibration: 'auto',
  searchLogs: false,
  alwaysDownload: true,
};

// Liveness only: any throughput passes as long as traffic flows
export const zmqSmokeFamily: ScenarioFamily = {
  name: 'zmq-smoke',
  description: 'Four simulated UEs over a simulated radio, liveness only',
  marks: ['smoke', 'zmq'],
  ueCount: 4,
  protocols: ALL_PROTOCOLS,
  directions: ALL_DIRECTIONS,
  idFormat: 'zmq',
  rows: [
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 20, targetBitrateBps: LOW_BITRATE, alwaysDownload: true },
    { band: 41, subcarrierSpacingKHz: 30, bandwidthMHz: 20, targetBitrateBps: LOW_BITRATE, alwaysDownload: true },
  ],
  durationSeconds: SHORT_DURATION,
  targetBitrateBps: LOW_BITRATE,
  sampleRate: 'testbed',
  timingAdvance: 0,
  timeAlignmentCalibration: 0,
  searchLogs: true,
  alwaysDownload: true,
  bitrateToleranceFraction: 0,
};

export const zmqFamily: ScenarioFamily = {
  name: 'zmq',
  description: 'Four simulated UEs over a simulated radio',
  marks: ['zmq'],
  ueCount: 4,
  protocols: ALL_PROTOCOLS,
  directions: ALL_DIRECTIONS,
  idFormat: 'zmq',
  rows: [
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 5, alwaysDownload: false },
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 10, alwaysDownload: false },
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 20, alwaysDownload: false },
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 50, alwaysDownload: true },
    { band: 41, subcarrierSpacingKHz: 30, bandwidthMHz: 10, alwaysDownload: false },
    { band: 41, subcarrierSpacingKHz: 30, bandwidthMHz: 20, alwaysDownload: false },
    { band: 41, subcarrierSpacingKHz: 30, bandwidthMHz: 50, alwaysDownload: true },
  ],
  durationSeconds: SHORT_DURATION,
  targetBitrateBps: HIGH_BITRATE,
  sampleRate: 'testbed',
  timingAdvance: 0,
  timeAlignmentCalibration: 0,
  searchLogs: true,
  alwaysDownload: false,
};

export const rfFamily: ScenarioFamily = {
  name: 'rf',
  description: 'Four UEs over a real radio, UDP soak',
  marks: ['rf'],
  ueCount: 4,
  protocols: ['udp'],
  directions: ALL_DIRECTIONS,
  idFormat: 'radio',
  rows: [
    { band: 3, subcarrierSpacingKHz: 15, bandwidthMHz: 10 },
    { band: 41, subcarrierSpacingKHz: 30, bandwidthMHz: 10 },
  ],
  durationSeconds: LONG_DURATION,
  targetBitrateBps: HIGH_BITRATE,
  sampleRate: 'testbed',
  timingAdvance: -1,
  timeAlignmentCalibration: 'auto',
  searchLogs: false,
  alwaysDownload: true,
};

export const allFamilies: ScenarioFamily[] = [
  androidFamily,
  zmqSmokeFamily,
  zmqFamily,
  rfFamily,
];
