import pino from 'pino';
import type { Destination, PublishOutcome, SignalKind } from '../types.js';

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type SensorState = {
  reads: number;
  failures: number;
  lastValue: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

type PublishState = Record<PublishOutcome, number> & {
  lastSentAt: number | null;
};

type LatencySnapshot = {
  count: number;
  averageMs: number;
  minMs: number;
  maxMs: number;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: Record<string, number>;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  ticks: {
    total: number;
    lastTickAt: string | null;
  };
  sensors: Record<SignalKind, {
    reads: number;
    failures: number;
    lastValue: number | null;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  }>;
  publishes: Record<string, {
    sent: number;
    suppressed: number;
    failed: number;
    lastSentAt: string | null;
  }>;
  rssi: {
    updates: number;
    rejected: number;
    lastUpdateAt: string | null;
  };
  latencies: Record<string, LatencySnapshot>;
};

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private totalTicks = 0;
  private lastTickAt: number | null = null;
  private readonly sensors = new Map<SignalKind, SensorState>();
  private readonly publishes = new Map<string, PublishState>();
  private rssiUpdates = 0;
  private rssiRejected = 0;
  private lastRssiUpdateAt: number | null = null;
  private readonly latencyStats = new Map<string, LatencyStats>();

  reset() {
    this.logLevelCounters.clear();
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.totalTicks = 0;
    this.lastTickAt = null;
    this.sensors.clear();
    this.publishes.clear();
    this.rssiUpdates = 0;
    this.rssiRejected = 0;
    this.lastRssiUpdateAt = null;
    this.latencyStats.clear();
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    const levelValue = pino.levels.values[normalized];
    if (typeof levelValue === 'number' && levelValue >= pino.levels.values.error) {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordTick(at: number) {
    this.totalTicks += 1;
    this.lastTickAt = at;
  }

  recordSensorRead(signal: SignalKind, value: number) {
    const state = this.getSensorState(signal);
    state.reads += 1;
    state.lastValue = value;
  }

  recordSensorFailure(signal: SignalKind, error: unknown) {
    const state = this.getSensorState(signal);
    state.failures += 1;
    state.lastErrorAt = Date.now();
    state.lastErrorMessage = error instanceof Error ? error.message : String(error);
  }

  recordPublish(destination: Destination, outcome: PublishOutcome, at = Date.now()) {
    const state = this.publishes.get(destination) ?? {
      sent: 0,
      suppressed: 0,
      failed: 0,
      lastSentAt: null
    };
    state[outcome] += 1;
    if (outcome === 'sent') {
      state.lastSentAt = at;
    }
    this.publishes.set(destination, state);
  }

  recordRssiUpdate(at = Date.now()) {
    this.rssiUpdates += 1;
    this.lastRssiUpdateAt = at;
  }

  recordRssiRejected() {
    this.rssiRejected += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }

    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  snapshot(): MetricsSnapshot {
    const sensors: MetricsSnapshot['sensors'] = {
      brightness: this.sensorSnapshot('brightness'),
      volume: this.sensorSnapshot('volume')
    };

    const publishes: MetricsSnapshot['publishes'] = {};
    for (const [destination, state] of this.publishes) {
      publishes[destination] = {
        sent: state.sent,
        suppressed: state.suppressed,
        failed: state.failed,
        lastSentAt: toIso(state.lastSentAt)
      };
    }

    const latencies: MetricsSnapshot['latencies'] = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        count: stats.count,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0,
        minMs: stats.count > 0 ? stats.minMs : 0,
        maxMs: stats.maxMs
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: Object.fromEntries(this.logLevelCounters),
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      ticks: {
        total: this.totalTicks,
        lastTickAt: toIso(this.lastTickAt)
      },
      sensors,
      publishes,
      rssi: {
        updates: this.rssiUpdates,
        rejected: this.rssiRejected,
        lastUpdateAt: toIso(this.lastRssiUpdateAt)
      },
      latencies
    };
  }

  private sensorSnapshot(signal: SignalKind): MetricsSnapshot['sensors'][SignalKind] {
    const state = this.sensors.get(signal);
    return {
      reads: state?.reads ?? 0,
      failures: state?.failures ?? 0,
      lastValue: state?.lastValue ?? null,
      lastErrorAt: toIso(state?.lastErrorAt ?? null),
      lastErrorMessage: state?.lastErrorMessage ?? null
    };
  }

  private getSensorState(signal: SignalKind): SensorState {
    const existing = this.sensors.get(signal);
    if (existing) {
      return existing;
    }
    const created: SensorState = {
      reads: 0,
      failures: 0,
      lastValue: null,
      lastErrorAt: null,
      lastErrorMessage: null
    };
    this.sensors.set(signal, created);
    return created;
  }
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

const defaultRegistry = new MetricsRegistry();

export type { MetricsSnapshot, LatencySnapshot };
export { MetricsRegistry };
export default defaultRegistry;
