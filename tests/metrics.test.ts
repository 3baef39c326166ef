import { afterEach, describe, expect, it } from 'vitest';
import metrics, { MetricsRegistry } from '../src/metrics/index.js';
import logger, { getLogLevel, setLogLevel } from '../src/logger.js';

const T0 = Date.parse('2025-01-01T00:00:00.000Z');

describe('MetricsRegistry', () => {
  it('MetricsSensors counts reads and failures per signal', () => {
    const registry = new MetricsRegistry();

    registry.recordSensorRead('brightness', 120);
    registry.recordSensorRead('brightness', 125.5);
    registry.recordSensorFailure('volume', new Error('Microphone recording timed out after 3000ms'));

    const snapshot = registry.snapshot();
    expect(snapshot.sensors.brightness).toEqual({
      reads: 2,
      failures: 0,
      lastValue: 125.5,
      lastErrorAt: null,
      lastErrorMessage: null
    });
    expect(snapshot.sensors.volume).toMatchObject({
      reads: 0,
      failures: 1,
      lastValue: null,
      lastErrorMessage: 'Microphone recording timed out after 3000ms'
    });
    expect(snapshot.sensors.volume.lastErrorAt).not.toBeNull();
  });

  it('MetricsPublishes tracks outcomes per destination', () => {
    const registry = new MetricsRegistry();

    registry.recordPublish('light', 'sent', T0);
    registry.recordPublish('light', 'suppressed', T0 + 1000);
    registry.recordPublish('speaker', 'failed', T0 + 2000);

    expect(registry.snapshot().publishes).toEqual({
      light: { sent: 1, suppressed: 1, failed: 0, lastSentAt: '2025-01-01T00:00:00.000Z' },
      speaker: { sent: 0, suppressed: 0, failed: 1, lastSentAt: null }
    });
  });

  it('MetricsTicksAndRssi records tick and RSSI counters', () => {
    const registry = new MetricsRegistry();

    registry.recordTick(T0);
    registry.recordTick(T0 + 2000);
    registry.recordRssiUpdate(T0 + 500);
    registry.recordRssiRejected();
    registry.recordRssiRejected();

    const snapshot = registry.snapshot();
    expect(snapshot.ticks).toEqual({ total: 2, lastTickAt: '2025-01-01T00:00:02.000Z' });
    expect(snapshot.rssi).toEqual({
      updates: 1,
      rejected: 2,
      lastUpdateAt: '2025-01-01T00:00:00.500Z'
    });
  });

  it('MetricsLatency aggregates observations and ignores non-finite values', () => {
    const registry = new MetricsRegistry();

    registry.observeLatency('tick.duration', 10);
    registry.observeLatency('tick.duration', 30);
    registry.observeLatency('tick.duration', Number.NaN);

    expect(registry.snapshot().latencies['tick.duration']).toEqual({
      count: 2,
      averageMs: 20,
      minMs: 10,
      maxMs: 30
    });
  });

  it('MetricsLogLevels counts levels and remembers the last error', () => {
    const registry = new MetricsRegistry();

    registry.incrementLogLevel('WARN', { message: 'Publish suppressed' });
    registry.incrementLogLevel('error', { message: 'Sensor read failed' });
    registry.incrementLogLevel('info');

    const snapshot = registry.snapshot();
    expect(snapshot.logs.byLevel).toEqual({ warn: 1, error: 1, info: 1 });
    expect(snapshot.logs.lastErrorMessage).toBe('Sensor read failed');
    expect(snapshot.logs.lastErrorAt).not.toBeNull();
  });

  it('MetricsReset clears every counter', () => {
    const registry = new MetricsRegistry();
    registry.recordTick(T0);
    registry.recordPublish('light', 'sent', T0);
    registry.observeLatency('tick.duration', 5);
    registry.incrementLogLevel('error', { message: 'boom' });

    registry.reset();

    const snapshot = registry.snapshot();
    expect(snapshot.ticks).toEqual({ total: 0, lastTickAt: null });
    expect(snapshot.publishes).toEqual({});
    expect(snapshot.latencies).toEqual({});
    expect(snapshot.logs).toEqual({ byLevel: {}, lastErrorAt: null, lastErrorMessage: null });
  });
});

describe('Logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    metrics.reset();
  });

  it('LoggerLevels switches levels and rejects unknown ones', () => {
    expect(setLogLevel(' DEBUG ')).toBe('debug');
    expect(getLogLevel()).toBe('debug');
    expect(() => setLogLevel('verbose')).toThrow('Unknown log level "verbose"');
    expect(getLogLevel()).toBe('debug');
  });

  it('LoggerMetrics feeds log levels into the default registry', () => {
    metrics.reset();
    setLogLevel('warn');

    logger.warn({ destination: 'light' }, 'Publish failed');
    logger.error('Controller startup failed');
    logger.info('Controller started');

    const snapshot = metrics.snapshot();
    expect(snapshot.logs.byLevel).toEqual({ warn: 1, error: 1 });
    expect(snapshot.logs.lastErrorMessage).toBe('Controller startup failed');
  });
});
