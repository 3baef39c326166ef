import { describe, expect, it } from 'vitest';
import { formatStatusLine } from '../src/control/status.js';

const AT = Date.parse('2025-01-01T00:00:00.000Z');

describe('formatStatusLine', () => {
  it('StatusLineValues formats readings with one decimal place', () => {
    const line = formatStatusLine({
      at: AT,
      brightness: { raw: 61.25, smoothed: 60 },
      volume: { raw: -31.04, smoothed: -30.5 },
      rssi: { rssi: -70, timestamp: '2025-01-01T00:00:00.000Z', rawPayload: '{}', receivedAt: AT }
    });
    expect(line).toBe(
      '2025-01-01T00:00:00.000Z | Brightness: current=61.3 avg=60.0 | ' +
        'Volume: current=-31.0 dB avg=-30.5 | RSSI: -70.0 dBm (ts=2025-01-01T00:00:00.000Z)'
    );
  });

  it('StatusLinePlaceholders prints N/A for missing readings', () => {
    const line = formatStatusLine({
      at: AT,
      brightness: { raw: null, smoothed: null, error: 'No camera frame available' },
      volume: { raw: null, smoothed: null },
      rssi: null
    });
    expect(line).toBe(
      '2025-01-01T00:00:00.000Z | Brightness: current=N/A avg=N/A | ' +
        'Volume: current=N/A dB avg=N/A | RSSI: N/A (ts=N/A)'
    );
  });

  it('StatusLineRssiWithoutTimestamp shows a placeholder timestamp', () => {
    const line = formatStatusLine({
      at: AT,
      brightness: { raw: 100, smoothed: 100 },
      volume: { raw: -25, smoothed: -25 },
      rssi: { rssi: -64.5, timestamp: null, rawPayload: '{"rssi":-64.5}', receivedAt: AT }
    });
    expect(line.endsWith('| RSSI: -64.5 dBm (ts=N/A)')).toBe(true);
  });
});
