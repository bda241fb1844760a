export type TrafficProtocol = 'udp' | 'tcp';

export type TrafficDirection = 'downlink' | 'uplink' | 'bidirectional';

// A single traffic leg; bidirectional runs one of each.
export type LinkDirection = Exclude<TrafficDirection, 'bidirectional'>;

export type TimeAlignmentCalibration = number | 'auto';

export interface ArtifactPolicy {
  alwaysDownload: boolean;
  searchLogs: boolean;
}

/**
 * One throughput test case. Built once through `defineScenario` and frozen;
 * every phase reads it, none writes it.
 */
export interface ScenarioParameters {
  readonly band: number;
  readonly subcarrierSpacingKHz: number;
  readonly bandwidthMHz: number;
  /** `null` lets the test bed pick its default rate. */
  readonly sampleRateHz: number | null;
  readonly protocol: TrafficProtocol;
  readonly direction: TrafficDirection;
  readonly durationSeconds: number;
  readonly targetBitrateBps: number;
  /** Maximum relative shortfall allowed per leg. `0` turns the bitrate check off. */
  readonly bitrateToleranceFraction: number;
  /** `-1` means automatic. */
  readonly timingAdvance: number;
  readonly timeAlignmentCalibration: TimeAlignmentCalibration;
  readonly artifactPolicy: Readonly<ArtifactPolicy>;
}

export interface TestBedConfiguration {
  band: number;
  subcarrierSpacingKHz: number;
  bandwidthMHz: number;
  sampleRateHz: number;
  timingAdvance: number;
  timeAlignmentCalibration: TimeAlignmentCalibration;
  pcap: boolean;
}

// ============================================================================
// Capability handles supplied by the test bed
// ============================================================================

export interface CoreNetwork {
  readonly id: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface BaseStation {
  readonly id: string;
  start(coreNetwork: CoreNetwork): Promise<void>;
  stop(): Promise<void>;
}

export interface AttachInfo {
  endpointId: string;
  ipv4: string;
}

export interface Endpoint {
  readonly id: string;
  attach(baseStation: BaseStation, coreNetwork: CoreNetwork, signal: AbortSignal): Promise<AttachInfo>;
  detach(): Promise<void>;
}

export interface EndpointSet {
  endpoints: readonly Endpoint[];
  baseStation: BaseStation;
  coreNetwork: CoreNetwork;
}

export interface Configurator {
  apply(parameters: ScenarioParameters): Promise<TestBedConfiguration>;
}

export interface TrafficSessionRequest {
  direction: LinkDirection;
  protocol: TrafficProtocol;
  targetBitrateBps: number;
  durationSeconds: number;
  endpoints: readonly AttachInfo[];
  signal: AbortSignal;
}

export interface EndpointThroughput {
  endpointId: string;
  bitrateBps: number;
}

export interface MeasurementResult {
  direction: LinkDirection;
  samples: EndpointThroughput[];
  elapsedMs: number;
  transportOk: boolean;
  transportError?: string;
}

export interface TrafficTool {
  run(request: TrafficSessionRequest): Promise<MeasurementResult>;
}

export interface ArtifactReporter {
  collectArtifacts(policy: Readonly<ArtifactPolicy>, outcome: ProvisionalOutcome): Promise<void>;
}

export interface TestBed {
  elements: EndpointSet;
  configurator: Configurator;
  trafficTool: TrafficTool;
  artifacts: ArtifactReporter;
}

// ============================================================================
// Verdicts and outcomes
// ============================================================================

export interface ShortfallRecord {
  endpointId: string;
  direction: LinkDirection;
  targetBitrateBps: number;
  measuredBitrateBps: number;
  shortfall: number;
}

export interface TransportFailure {
  direction: LinkDirection;
  endpointId?: string;
  message: string;
}

export interface PassVerdict {
  status: 'pass';
  thresholdChecked: boolean;
  measurements: MeasurementResult[];
}

export interface FailVerdict {
  status: 'fail';
  thresholdChecked: boolean;
  measurements: MeasurementResult[];
  violations: ShortfallRecord[];
  transportFailures: TransportFailure[];
}

export type Verdict = PassVerdict | FailVerdict;

export interface ErrorOutcome {
  status: 'error';
  code: string;
  message: string;
}

/** What teardown sees: a verdict, or the error that cut the sequence short. */
export type ProvisionalOutcome = Verdict | ErrorOutcome;

export interface Outcome {
  verdict: Verdict;
  teardownWarnings: string[];
  artifactsCollected: boolean;
  duration: number;
}
