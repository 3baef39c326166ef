import { describe, expect, it, vi, type Mock } from 'vitest';
import { PublishThrottle, type SendCommand } from '../src/control/throttle.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { createTestLogger } from './helpers/logger.js';

function createThrottle(send: Mock<SendCommand> = vi.fn<SendCommand>(async () => {})) {
  const metrics = new MetricsRegistry();
  const logger = createTestLogger();
  const throttle = new PublishThrottle({ send, minIntervalMs: 5000, logger, metrics });
  return { throttle, send, metrics, logger };
}

describe('PublishThrottle', () => {
  it('ThrottleInterval suppresses a repeat inside the interval and allows it after', async () => {
    const { throttle, send } = createThrottle();
    const t0 = 1_000_000;

    await expect(throttle.tryEmit('light', 'raise', t0)).resolves.toBe(true);
    await expect(throttle.tryEmit('light', 'raise', t0 + 4900)).resolves.toBe(false);
    await expect(throttle.tryEmit('light', 'raise', t0 + 5100)).resolves.toBe(true);

    expect(send).toHaveBeenCalledTimes(2);
    expect(throttle.lastSentAt('light')).toBe(t0 + 5100);
  });

  it('ThrottleFirstEmission lets the first command through', async () => {
    const { throttle } = createThrottle();
    expect(throttle.isSuppressed('speaker', 0)).toBe(false);
    await expect(throttle.tryEmit('speaker', 'lower', 0)).resolves.toBe(true);
  });

  it('ThrottleIndependence keeps a separate ledger per destination', async () => {
    const { throttle, send } = createThrottle();
    await expect(throttle.tryEmit('light', 'raise', 10)).resolves.toBe(true);
    await expect(throttle.tryEmit('speaker', 'raise', 10)).resolves.toBe(true);
    expect(send.mock.calls).toEqual([
      ['light', 'raise'],
      ['speaker', 'raise']
    ]);
  });

  it('ThrottleFailure leaves the ledger unchanged so the same instant can retry', async () => {
    const send = vi
      .fn<SendCommand>()
      .mockRejectedValueOnce(new Error('broker unavailable'))
      .mockResolvedValueOnce(undefined);
    const { throttle, metrics, logger } = createThrottle(send);

    await expect(throttle.tryEmit('light', 'raise', 500)).resolves.toBe(false);
    expect(throttle.lastSentAt('light')).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ destination: 'light', command: 'raise' }),
      'Failed to publish command'
    );

    await expect(throttle.tryEmit('light', 'raise', 500)).resolves.toBe(true);
    expect(throttle.lastSentAt('light')).toBe(500);
    expect(metrics.snapshot().publishes.light).toEqual({
      sent: 1,
      suppressed: 0,
      failed: 1,
      lastSentAt: new Date(500).toISOString()
    });
  });

  it('ThrottleMetrics counts suppressed commands', async () => {
    const { throttle, metrics } = createThrottle();
    await throttle.tryEmit('speaker', 'lower', 0);
    await throttle.tryEmit('speaker', 'lower', 1000);
    await throttle.tryEmit('speaker', 'lower', 2000);
    expect(metrics.snapshot().publishes.speaker).toMatchObject({ sent: 1, suppressed: 2, failed: 0 });
  });

  it('ThrottleReconfigure applies a new minimum interval', async () => {
    const { throttle } = createThrottle();
    await throttle.tryEmit('light', 'lower', 0);
    throttle.setMinInterval(1000);
    expect(throttle.minInterval).toBe(1000);
    await expect(throttle.tryEmit('light', 'lower', 1000)).resolves.toBe(true);
    expect(() => throttle.setMinInterval(-1)).toThrow(
      'Minimum command interval must be >= 0 (received -1)'
    );
  });

  it('ThrottleReset forgets every destination', async () => {
    const { throttle } = createThrottle();
    await throttle.tryEmit('light', 'raise', 0);
    throttle.reset();
    expect(throttle.lastSentAt('light')).toBeNull();
    expect(throttle.isSuppressed('light', 1)).toBe(false);
  });
});
