import { withDeadline } from './deadline.js';
import { TeardownError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { BaseStation, CoreNetwork, Endpoint, EndpointSet } from './types.js';

interface StartedElement {
  id: string;
  stop(): Promise<void>;
}

interface LateAttach {
  endpoint: Endpoint;
  attach: Promise<unknown>;
}

export interface TestBedScopeOptions {
  // How long release() waits for an attach that outlived its deadline
  lateAttachWaitMs: number;
}

/**
 * Tracks what a run has brought up on the test bed. `release()` undoes it:
 * attached endpoints are detached, then started elements are stopped in
 * reverse order. Release failures come back as warnings and never throw.
 */
export class TestBedScope {
  private readonly elements: EndpointSet;
  private readonly logger: Logger;
  private readonly lateAttachWaitMs: number;
  private started: StartedElement[] = [];
  private attached: Endpoint[] = [];
  private late: LateAttach[] = [];
  private released = false;

  constructor(elements: EndpointSet, logger: Logger, options: TestBedScopeOptions) {
    this.elements = elements;
    this.logger = logger;
    this.lateAttachWaitMs = options.lateAttachWaitMs;
  }

  get baseStation(): BaseStation {
    return this.elements.baseStation;
  }

  get coreNetwork(): CoreNetwork {
    return this.elements.coreNetwork;
  }

  get endpoints(): readonly Endpoint[] {
    return this.elements.endpoints;
  }

  async startCoreNetwork(): Promise<void> {
    const core = this.elements.coreNetwork;
    await core.start();
    this.started.push(core);
  }

  async startBaseStation(): Promise<void> {
    const { baseStation, coreNetwork } = this.elements;
    await baseStation.start(coreNetwork);
    this.started.push(baseStation);
  }

  markAttached(endpoint: Endpoint): void {
    this.attached.push(endpoint);
  }

  /**
   * Takes over an attach that missed its deadline. If it still completes
   * before release gives up waiting, the endpoint is detached like any other.
   */
  adoptLateAttach(endpoint: Endpoint, attach: Promise<unknown>): void {
    this.late.push({ endpoint, attach });
  }

  async release(): Promise<string[]> {
    if (this.released) {
      return [];
    }
    this.released = true;

    const endpoints = this.attached;
    const late = this.late;
    this.attached = [];
    this.late = [];

    const detaches = await Promise.allSettled([
      ...endpoints.map(endpoint => this.detach(endpoint)),
      ...late.map(entry => this.settleLateAttach(entry)),
    ]);
    const failures: TeardownError[] = [];
    for (const result of detaches) {
      if (result.status === 'fulfilled' && result.value) {
        failures.push(result.value);
      }
    }

    const elements = this.started.reverse();
    this.started = [];
    for (const element of elements) {
      try {
        await element.stop();
      } catch (error) {
        failures.push(new TeardownError(element.id, `stop ${element.id} failed: ${errorMessage(error)}`, { cause: error }));
      }
    }

    for (const failure of failures) {
      this.logger.warn(failure.message);
    }
    return failures.map(failure => failure.message);
  }

  private async detach(endpoint: Endpoint): Promise<TeardownError | null> {
    try {
      await endpoint.detach();
      return null;
    } catch (error) {
      return new TeardownError(endpoint.id, `detach ${endpoint.id} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async settleLateAttach({ endpoint, attach }: LateAttach): Promise<TeardownError | null> {
    const outcome = await withDeadline(
      () => attach.then(() => 'attached' as const, () => 'failed' as const),
      this.lateAttachWaitMs,
      () => new Error('late attach still pending'),
    ).catch(() => 'pending' as const);

    switch (outcome) {
      case 'failed':
        return null;
      case 'attached':
        this.logger.debug(`${endpoint.id} attached after its deadline, detaching`);
        return this.detach(endpoint);
      case 'pending':
        return new TeardownError(
          endpoint.id,
          `${endpoint.id} was still attaching ${this.lateAttachWaitMs}ms after its deadline`,
        );
    }
  }
}
