import { afterEach, describe, expect, it, vi, type Mock } from 'vitest';
import { once } from 'node:events';
import { ControlLoop, type ControllerState } from '../src/control/loop.js';
import { PublishThrottle, type SendCommand } from '../src/control/throttle.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { LogBuffer } from '../src/server/logBuffer.js';
import { CaptureError } from '../src/errors.js';
import type { RssiSnapshot, TickReport } from '../src/types.js';
import { createTestLogger } from './helpers/logger.js';

const T0 = Date.parse('2025-01-01T00:00:00.000Z');

function createHarness(
  options: {
    brightness?: () => Promise<number>;
    volume?: () => Promise<number>;
    send?: Mock<SendCommand>;
    rssi?: RssiSnapshot | null;
    tickPeriodMs?: number;
    clock?: { value: number };
  } = {}
) {
  const logger = createTestLogger();
  const metrics = new MetricsRegistry();
  const send = options.send ?? vi.fn<SendCommand>(async () => {});
  const throttle = new PublishThrottle({ send, minIntervalMs: 5000, logger, metrics });
  const logBuffer = new LogBuffer(5);
  const camera = { readBrightness: vi.fn(options.brightness ?? (async () => 130)) };
  const microphone = { measureVolumeDb: vi.fn(options.volume ?? (async () => -30)) };
  const onShutdown = vi.fn(async () => {});
  const clock = options.clock;
  const loop = new ControlLoop({
    camera,
    microphone,
    throttle,
    rssi: { snapshot: () => options.rssi ?? null },
    logBuffer,
    historyLength: 10,
    tickPeriodMs: options.tickPeriodMs ?? 2000,
    onShutdown,
    logger,
    metrics,
    now: clock ? () => clock.value : undefined
  });
  return { loop, logger, metrics, send, throttle, logBuffer, camera, microphone, onShutdown };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('ControlLoop', () => {
  it('ControlLoopTick publishes commands for out-of-band readings', async () => {
    const clock = { value: T0 };
    const { loop, send, logBuffer, logger } = createHarness({
      brightness: async () => 60,
      volume: async () => -15,
      clock
    });

    const report = await loop.runTick();

    expect(report.publishes).toEqual({
      light: { command: 'raise', outcome: 'sent' },
      speaker: { command: 'lower', outcome: 'sent' }
    });
    expect(send.mock.calls).toEqual([
      ['light', 'raise'],
      ['speaker', 'lower']
    ]);
    expect(report.line).toBe(
      '2025-01-01T00:00:00.000Z | Brightness: current=60.0 avg=60.0 | ' +
        'Volume: current=-15.0 dB avg=-15.0 | RSSI: N/A (ts=N/A)'
    );
    expect(logBuffer.snapshot()).toEqual([report.line]);
    expect(logger.info).toHaveBeenCalledWith(report.line);
  });

  it('ControlLoopInBand sends nothing while readings stay inside their bands', async () => {
    const { loop, send } = createHarness();
    const report = await loop.runTick();
    expect(report.publishes).toEqual({});
    expect(send).not.toHaveBeenCalled();
  });

  it('ControlLoopSmoothing decides on the moving average rather than the raw reading', async () => {
    const readings = [100, 100, 10];
    const clock = { value: T0 };
    const { loop, send } = createHarness({
      brightness: async () => readings.shift() ?? 100,
      clock
    });

    await loop.runTick();
    await loop.runTick();
    const report = await loop.runTick();

    expect(report.brightness).toEqual({ raw: 10, smoothed: 70 });
    expect(report.publishes.light).toEqual({ command: 'raise', outcome: 'sent' });
    expect(send).toHaveBeenCalledTimes(1);
    expect(loop.getTracker('brightness').values()).toEqual([100, 100, 10]);
  });

  it('ControlLoopSensorFailure logs the error and keeps the other signal running', async () => {
    const clock = { value: T0 };
    const { loop, logger, send, metrics } = createHarness({
      brightness: async () => {
        throw new CaptureError('No camera frame available');
      },
      volume: async () => -50,
      clock
    });

    const report = await loop.runTick();

    expect(report.brightness).toEqual({ raw: null, smoothed: null, error: 'No camera frame available' });
    expect(report.line).toContain('Brightness: current=N/A avg=N/A');
    expect(report.publishes).toEqual({ speaker: { command: 'raise', outcome: 'sent' } });
    expect(send.mock.calls).toEqual([['speaker', 'raise']]);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ signal: 'brightness' }),
      'Sensor read failed'
    );
    expect(metrics.snapshot().sensors.brightness).toMatchObject({
      reads: 0,
      failures: 1,
      lastErrorMessage: 'No camera frame available'
    });
    expect(loop.getTracker('brightness').size).toBe(0);
  });

  it('ControlLoopThrottle reports suppressed commands on later ticks', async () => {
    const clock = { value: T0 };
    const { loop, send } = createHarness({ brightness: async () => 40, clock });

    await loop.runTick();
    clock.value += 2000;
    const second = await loop.runTick();
    clock.value += 3100;
    const third = await loop.runTick();

    expect(second.publishes.light).toEqual({ command: 'raise', outcome: 'suppressed' });
    expect(third.publishes.light).toEqual({ command: 'raise', outcome: 'sent' });
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('ControlLoopPublishFailure reports a failed publish and retries next tick', async () => {
    const clock = { value: T0 };
    const send = vi
      .fn<SendCommand>()
      .mockRejectedValueOnce(new Error('not connected'))
      .mockResolvedValue(undefined);
    const { loop, throttle } = createHarness({ volume: async () => -10, send, clock });

    const first = await loop.runTick();
    expect(first.publishes.speaker).toEqual({ command: 'lower', outcome: 'failed' });
    expect(throttle.lastSentAt('speaker')).toBeNull();

    const second = await loop.runTick();
    expect(second.publishes.speaker).toEqual({ command: 'lower', outcome: 'sent' });
  });

  it('ControlLoopRssi includes the latest RSSI snapshot in the status line', async () => {
    const clock = { value: T0 };
    const snapshot: RssiSnapshot = {
      rssi: -70,
      timestamp: '2025-01-01T00:00:00.000Z',
      rawPayload: '{"rssi": -70, "timestamp": "2025-01-01T00:00:00.000Z"}',
      receivedAt: T0
    };
    const { loop } = createHarness({ rssi: snapshot, clock });
    const report = await loop.runTick();
    expect(report.rssi).toBe(snapshot);
    expect(report.line.endsWith('RSSI: -70.0 dBm (ts=2025-01-01T00:00:00.000Z)')).toBe(true);
  });

  it('ControlLoopUpdateOptions applies new bounds and validates them', async () => {
    const { loop, send } = createHarness({ brightness: async () => 60 });
    loop.updateOptions({ brightness: { low: 50, high: 70 } });
    const report = await loop.runTick();
    expect(report.publishes).toEqual({});
    expect(send).not.toHaveBeenCalled();

    expect(() => loop.updateOptions({ volume: { low: 0, high: -10 } })).toThrow(
      'volume.low (0) must be <= volume.high (-10)'
    );
    expect(() => loop.updateOptions({ tickPeriodMs: 0 })).toThrow('Tick period must be > 0 (received 0)');
  });

  it('ControlLoopRun ticks on a fixed period and shuts down on stop', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    const { loop, onShutdown } = createHarness({ tickPeriodMs: 2000 });
    const states: ControllerState[] = [];
    const ticks: number[] = [];
    loop.on('state', (state: ControllerState) => states.push(state));
    loop.on('tick', (report: TickReport) => ticks.push(report.startedAt));

    const firstTick = once(loop, 'tick');
    const done = loop.run();
    await firstTick;
    expect(loop.state).toBe('running');
    expect(ticks).toEqual([T0]);

    await vi.advanceTimersByTimeAsync(1999);
    expect(ticks).toHaveLength(1);

    const secondTick = once(loop, 'tick');
    await vi.advanceTimersByTimeAsync(1);
    await secondTick;
    expect(ticks).toEqual([T0, T0 + 2000]);

    loop.stop();
    await done;

    expect(states).toEqual(['running', 'shutting-down', 'stopped']);
    expect(onShutdown).toHaveBeenCalledTimes(1);
    expect(ticks).toHaveLength(2);
  });

  it('ControlLoopRunOnce rejects a second run', async () => {
    const { loop } = createHarness();
    const firstTick = once(loop, 'tick');
    const done = loop.run();
    await firstTick;
    await expect(loop.run()).rejects.toThrow('Control loop can only be run once');
    loop.stop();
    await done;
  });

  it('ControlLoopStopBeforeRun returns without ticking', async () => {
    const { loop, camera, onShutdown } = createHarness();
    loop.stop();
    expect(loop.state).toBe('stopped');
    await loop.run();
    expect(camera.readBrightness).not.toHaveBeenCalled();
    expect(onShutdown).not.toHaveBeenCalled();
  });

  it('ControlLoopShutdownError propagates from run after the loop stops', async () => {
    const { loop, onShutdown } = createHarness();
    onShutdown.mockRejectedValueOnce(new Error('release failed'));
    const firstTick = once(loop, 'tick');
    const done = loop.run();
    await firstTick;
    loop.stop();
    await expect(done).rejects.toThrow('release failed');
    expect(loop.state).toBe('stopped');
  });
});
