import { sleep } from '../deadline.js';
import { TransportError } from '../errors.js';
import type { MeasurementResult, TrafficSessionRequest, TrafficTool } from '../types.js';
import type { SimulatedCoreNetwork } from './elements.js';

export interface SimulatedTrafficOptions {
  /** Fraction of the target bitrate each endpoint achieves. */
  efficiency?: number;
  // Real milliseconds spent per simulated second; 0 completes at once
  timeScale?: number;
}

// UDP keeps the offered load; TCP loses a little to acknowledgements
const PROTOCOL_FACTOR = { udp: 1, tcp: 0.98 } as const;

export class SimulatedTrafficTool implements TrafficTool {
  private readonly core: SimulatedCoreNetwork;
  private readonly efficiency: number;
  private readonly timeScale: number;

  constructor(core: SimulatedCoreNetwork, options: SimulatedTrafficOptions = {}) {
    this.core = core;
    this.efficiency = options.efficiency ?? 0.95;
    this.timeScale = options.timeScale ?? 0;
  }

  async run(request: TrafficSessionRequest): Promise<MeasurementResult> {
    const start = performance.now();

    for (const endpoint of request.endpoints) {
      if (!this.core.hasSession(endpoint.endpointId, endpoint.ipv4)) {
        throw new TransportError(`no route to ${endpoint.endpointId} (${endpoint.ipv4})`, {
          direction: request.direction,
          endpointId: endpoint.endpointId,
        });
      }
    }

    if (this.timeScale > 0) {
      await sleep(request.durationSeconds * this.timeScale, request.signal);
    }

    const bitrateBps = Math.round(request.targetBitrateBps * this.efficiency * PROTOCOL_FACTOR[request.protocol]);
    return {
      direction: request.direction,
      samples: request.endpoints.map(endpoint => ({ endpointId: endpoint.endpointId, bitrateBps })),
      elapsedMs: performance.now() - start,
      transportOk: true,
    };
  }
}
