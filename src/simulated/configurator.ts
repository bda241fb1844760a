import { ConfigurationError } from '../errors.js';
import { isSupportedBandwidth, minimumSampleRateForBandwidth } from '../scenario.js';
import type { Configurator, ScenarioParameters, TestBedConfiguration } from '../types.js';
import type { SimulatedBaseStation } from './elements.js';

export interface SimulatedConfiguratorOptions {
  // Widest channel the simulated radio can carry
  maxBandwidthMHz?: number;
}

/**
 * Builds the base station configuration from a scenario and replaces whatever
 * was applied before, so applying the same scenario twice leaves the same
 * configuration behind.
 */
export class SimulatedConfigurator implements Configurator {
  private readonly baseStation: SimulatedBaseStation;
  private readonly maxBandwidthMHz: number;

  constructor(baseStation: SimulatedBaseStation, options: SimulatedConfiguratorOptions = {}) {
    this.baseStation = baseStation;
    this.maxBandwidthMHz = options.maxBandwidthMHz ?? 50;
  }

  async apply(parameters: ScenarioParameters): Promise<TestBedConfiguration> {
    if (!isSupportedBandwidth(parameters.bandwidthMHz) || parameters.bandwidthMHz > this.maxBandwidthMHz) {
      throw new ConfigurationError(
        `${parameters.bandwidthMHz} MHz exceeds what ${this.baseStation.id} can radiate (max ${this.maxBandwidthMHz} MHz)`,
      );
    }

    const configuration: TestBedConfiguration = {
      band: parameters.band,
      subcarrierSpacingKHz: parameters.subcarrierSpacingKHz,
      bandwidthMHz: parameters.bandwidthMHz,
      sampleRateHz: parameters.sampleRateHz ?? minimumSampleRateForBandwidth(parameters.bandwidthMHz),
      timingAdvance: parameters.timingAdvance,
      timeAlignmentCalibration: parameters.timeAlignmentCalibration,
      pcap: false,
    };

    this.baseStation.configure(configuration);
    return configuration;
  }
}
