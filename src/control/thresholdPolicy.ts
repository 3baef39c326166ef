import type { Command, Destination, SignalKind, ThresholdBounds } from '../types.js';

export interface SignalPolicy {
  signal: SignalKind;
  destination: Destination;
  bounds: ThresholdBounds;
}

export interface Decision {
  destination: Destination;
  command: Command;
}

export const DEFAULT_BRIGHTNESS_BOUNDS: ThresholdBounds = { low: 80, high: 180 };
export const DEFAULT_VOLUME_BOUNDS: ThresholdBounds = { low: -40, high: -20 };

export function assertBounds(bounds: ThresholdBounds, label = 'bounds') {
  if (!Number.isFinite(bounds.low) || !Number.isFinite(bounds.high)) {
    throw new RangeError(`${label} must be finite numbers`);
  }
  if (bounds.low > bounds.high) {
    throw new RangeError(`${label}.low (${bounds.low}) must be <= ${label}.high (${bounds.high})`);
  }
}

/**
 * Below `low` asks for more, above `high` asks for less. Values on a bound,
 * or inside the band, produce no command.
 */
export function evaluateThreshold(value: number | null, bounds: ThresholdBounds): Command | null {
  if (value === null) {
    return null;
  }
  if (value < bounds.low) {
    return 'raise';
  }
  if (value > bounds.high) {
    return 'lower';
  }
  return null;
}

export function decide(policy: SignalPolicy, value: number | null): Decision | null {
  const command = evaluateThreshold(value, policy.bounds);
  if (!command) {
    return null;
  }
  return { destination: policy.destination, command };
}

export function createDefaultPolicies(
  brightness: ThresholdBounds = DEFAULT_BRIGHTNESS_BOUNDS,
  volume: ThresholdBounds = DEFAULT_VOLUME_BOUNDS
): Record<SignalKind, SignalPolicy> {
  assertBounds(brightness, 'brightness');
  assertBounds(volume, 'volume');
  return {
    brightness: { signal: 'brightness', destination: 'light', bounds: { ...brightness } },
    volume: { signal: 'volume', destination: 'speaker', bounds: { ...volume } }
  };
}
