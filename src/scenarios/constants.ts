export const SHORT_DURATION = 20;
export const LONG_DURATION = 5 * 60;

export const LOW_BITRATE = 1_000_000;
export const HIGH_BITRATE = 15_000_000;

export const ALL_PROTOCOLS = ['udp', 'tcp'] as const;
export const ALL_DIRECTIONS = ['downlink', 'uplink', 'bidirectional'] as const;
