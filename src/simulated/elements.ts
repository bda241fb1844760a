import { sleep } from '../deadline.js';
import type {
  AttachInfo,
  BaseStation,
  CoreNetwork,
  Endpoint,
  TestBedConfiguration,
} from '../types.js';

export class SimulatedElementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatedElementError';
  }
}

abstract class SimulatedElement {
  readonly id: string;
  readonly log: string[] = [];

  protected constructor(id: string) {
    this.id = id;
  }

  protected record(line: string): void {
    this.log.push(`[${this.id}] ${line}`);
  }
}

export class SimulatedCoreNetwork extends SimulatedElement implements CoreNetwork {
  private running = false;
  private nextHost = 2;
  private readonly sessions = new Map<string, string>();

  constructor(id = 'core') {
    super(id);
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    this.running = true;
    this.nextHost = 2;
    this.record('started');
  }

  async stop(): Promise<void> {
    this.running = false;
    this.sessions.clear();
    this.record('stopped');
  }

  /** Opens a PDU session for an endpoint and returns its address. */
  openSession(endpointId: string): string {
    if (!this.running) {
      throw new SimulatedElementError(`${this.id} is not running`);
    }
    const ipv4 = `10.45.1.${this.nextHost++}`;
    this.sessions.set(endpointId, ipv4);
    this.record(`session opened for ${endpointId} (${ipv4})`);
    return ipv4;
  }

  closeSession(endpointId: string): void {
    if (this.sessions.delete(endpointId)) {
      this.record(`session closed for ${endpointId}`);
    }
  }

  hasSession(endpointId: string, ipv4: string): boolean {
    return this.sessions.get(endpointId) === ipv4;
  }
}

export class SimulatedBaseStation extends SimulatedElement implements BaseStation {
  private running = false;
  private configuration: TestBedConfiguration | null = null;

  constructor(id = 'gnb') {
    super(id);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get appliedConfiguration(): TestBedConfiguration | null {
    return this.configuration;
  }

  configure(configuration: TestBedConfiguration): void {
    this.configuration = { ...configuration };
    this.record(
      `configured band ${configuration.band} scs ${configuration.subcarrierSpacingKHz} ` +
      `bw ${configuration.bandwidthMHz} srate ${configuration.sampleRateHz}`,
    );
  }

  async start(coreNetwork: CoreNetwork): Promise<void> {
    if (!this.configuration) {
      throw new SimulatedElementError(`${this.id} started without a configuration`);
    }
    this.running = true;
    this.record(`started, connected to ${coreNetwork.id}`);
  }

  async stop(): Promise<void> {
    this.running = false;
    this.record('stopped');
  }
}

export interface SimulatedUserEquipmentOptions {
  attachDelayMs?: number;
}

export class SimulatedUserEquipment extends SimulatedElement implements Endpoint {
  private readonly attachDelayMs: number;
  private readonly core: SimulatedCoreNetwork;
  private address: string | null = null;

  constructor(id: string, core: SimulatedCoreNetwork, options: SimulatedUserEquipmentOptions = {}) {
    super(id);
    this.core = core;
    this.attachDelayMs = options.attachDelayMs ?? 0;
  }

  get ipv4(): string | null {
    return this.address;
  }

  async attach(baseStation: BaseStation, coreNetwork: CoreNetwork, signal: AbortSignal): Promise<AttachInfo> {
    if (this.attachDelayMs > 0) {
      await sleep(this.attachDelayMs, signal);
    }
    if (coreNetwork.id !== this.core.id) {
      throw new SimulatedElementError(`${this.id} cannot reach ${coreNetwork.id}`);
    }
    if (baseStation instanceof SimulatedBaseStation && !baseStation.isRunning) {
      throw new SimulatedElementError(`${baseStation.id} is not radiating`);
    }

    this.address = this.core.openSession(this.id);
    this.record(`attached via ${baseStation.id}`);
    return { endpointId: this.id, ipv4: this.address };
  }

  async detach(): Promise<void> {
    this.core.closeSession(this.id);
    this.address = null;
    this.record('detached');
  }
}
