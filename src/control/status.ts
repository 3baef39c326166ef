import type { RssiSnapshot, SignalReading } from '../types.js';

const PLACEHOLDER = 'N/A';

function formatValue(value: number | null) {
  return value === null ? PLACEHOLDER : value.toFixed(1);
}

function formatRssi(snapshot: RssiSnapshot | null) {
  const value = snapshot ? `${snapshot.rssi.toFixed(1)} dBm` : PLACEHOLDER;
  return `${value} (ts=${snapshot?.timestamp ?? PLACEHOLDER})`;
}

export interface StatusLineInput {
  at: number;
  brightness: SignalReading;
  volume: SignalReading;
  rssi: RssiSnapshot | null;
}

/**
 * `2025-01-01T00:00:00.000Z | Brightness: current=60.0 avg=60.0 | Volume: current=-30.0 dB avg=-30.0 | RSSI: N/A (ts=N/A)`
 */
export function formatStatusLine(input: StatusLineInput): string {
  const { brightness, volume } = input;
  return [
    new Date(input.at).toISOString(),
    `Brightness: current=${formatValue(brightness.raw)} avg=${formatValue(brightness.smoothed)}`,
    `Volume: current=${formatValue(volume.raw)} dB avg=${formatValue(volume.smoothed)}`,
    `RSSI: ${formatRssi(input.rssi)}`
  ].join(' | ');
}
