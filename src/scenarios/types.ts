import type { ScenarioParameters, TimeAlignmentCalibration, TrafficDirection, TrafficProtocol } from '../types.js';

export type FamilyName = 'android' | 'zmq-smoke' | 'zmq' | 'rf';

export interface RadioRow {
  band: number;
  subcarrierSpacingKHz: number;
  bandwidthMHz: number;
  targetBitrateBps?: number;
  alwaysDownload?: boolean;
}

export interface ScenarioFamily {
  name: FamilyName;
  description: string;
  marks: string[];
  ueCount: number;
  protocols: readonly TrafficProtocol[];
  directions: readonly TrafficDirection[];
  // 'radio' ids carry band/scs/bandwidth, 'zmq' ids add bitrate and artifact policy
  idFormat: 'radio' | 'zmq';
  rows: RadioRow[];
  durationSeconds: number;
  targetBitrateBps: number;
  sampleRate: 'minimum' | 'testbed';
  timingAdvance: number;
  timeAlignmentCalibration: TimeAlignmentCalibration;
  searchLogs: boolean;
  alwaysDownload: boolean;
  bitrateToleranceFraction?: number;
}

export interface ScenarioDefinition {
  id: string;
  family: FamilyName;
  marks: string[];
  ueCount: number;
  parameters: ScenarioParameters;
}
