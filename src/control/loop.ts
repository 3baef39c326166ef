import { EventEmitter } from 'node:events';
import defaultLogger, { type ComponentLogger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { LogBuffer } from '../server/logBuffer.js';
import type {
  PublishOutcome,
  RssiSnapshot,
  SignalKind,
  SignalReading,
  ThresholdBounds,
  TickReport
} from '../types.js';
import { toError } from '../errors.js';
import { DEFAULT_HISTORY_LENGTH, MovingAverage } from './movingAverage.js';
import { formatStatusLine } from './status.js';
import {
  assertBounds,
  createDefaultPolicies,
  decide,
  type Decision,
  type SignalPolicy
} from './thresholdPolicy.js';
import type { PublishThrottle } from './throttle.js';

export const DEFAULT_TICK_PERIOD_MS = 2000;

export type ControllerState = 'initializing' | 'running' | 'shutting-down' | 'stopped';

export interface BrightnessSensor {
  readBrightness(): Promise<number>;
}

export interface VolumeSensor {
  measureVolumeDb(): Promise<number>;
}

export interface RssiReader {
  snapshot(): RssiSnapshot | null;
}

export type CommandThrottle = Pick<PublishThrottle, 'tryEmit' | 'isSuppressed' | 'setMinInterval'>;

export interface ControlLoopOptions {
  camera: BrightnessSensor;
  microphone: VolumeSensor;
  throttle: CommandThrottle;
  rssi?: RssiReader | null;
  logBuffer?: LogBuffer | null;
  policies?: Record<SignalKind, SignalPolicy>;
  historyLength?: number;
  tickPeriodMs?: number;
  onShutdown?: () => Promise<void>;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export interface ControlLoopUpdate {
  tickPeriodMs?: number;
  minCommandIntervalMs?: number;
  brightness?: ThresholdBounds;
  volume?: ThresholdBounds;
}

const SIGNALS: readonly SignalKind[] = ['brightness', 'volume'];

export class ControlLoop extends EventEmitter {
  private readonly trackers: Record<SignalKind, MovingAverage>;
  private readonly policies: Record<SignalKind, SignalPolicy>;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private tickPeriodMs: number;
  private currentState: ControllerState = 'initializing';
  private stopRequested = false;
  private runPromise: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(private readonly options: ControlLoopOptions) {
    super();
    const historyLength = options.historyLength ?? DEFAULT_HISTORY_LENGTH;
    this.trackers = {
      brightness: new MovingAverage(historyLength),
      volume: new MovingAverage(historyLength)
    };
    this.policies = options.policies ?? createDefaultPolicies();
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
    this.tickPeriodMs = DEFAULT_TICK_PERIOD_MS;
    this.setTickPeriod(options.tickPeriodMs ?? DEFAULT_TICK_PERIOD_MS);
  }

  get state(): ControllerState {
    return this.currentState;
  }

  getTracker(signal: SignalKind): MovingAverage {
    return this.trackers[signal];
  }

  updateOptions(update: ControlLoopUpdate) {
    if (update.brightness) {
      assertBounds(update.brightness, 'brightness');
    }
    if (update.volume) {
      assertBounds(update.volume, 'volume');
    }
    if (typeof update.tickPeriodMs === 'number') {
      this.setTickPeriod(update.tickPeriodMs);
    }
    if (typeof update.minCommandIntervalMs === 'number') {
      this.options.throttle.setMinInterval(update.minCommandIntervalMs);
    }
    if (update.brightness) {
      this.policies.brightness = { ...this.policies.brightness, bounds: { ...update.brightness } };
    }
    if (update.volume) {
      this.policies.volume = { ...this.policies.volume, bounds: { ...update.volume } };
    }
    this.logger.info({ update }, 'Control loop options updated');
  }

  run(): Promise<void> {
    if (this.runPromise) {
      return Promise.reject(new Error('Control loop can only be run once'));
    }
    this.runPromise = this.loop();
    return this.runPromise;
  }

  stop() {
    this.stopRequested = true;
    this.cancelSleep();
    if (!this.runPromise && this.currentState === 'initializing') {
      this.setState('stopped');
    }
  }

  async runTick(): Promise<TickReport> {
    const startedAt = this.now();
    const brightness = await this.sample('brightness', () => this.options.camera.readBrightness());
    const volume = await this.sample('volume', () => this.options.microphone.measureVolumeDb());
    const rssi = this.options.rssi?.snapshot() ?? null;

    const line = formatStatusLine({ at: startedAt, brightness, volume, rssi });
    this.logger.info(line);
    this.options.logBuffer?.append(line);

    const publishes: TickReport['publishes'] = {};
    const readings: Record<SignalKind, SignalReading> = { brightness, volume };
    for (const signal of SIGNALS) {
      const reading = readings[signal];
      if (reading.error !== undefined) {
        continue;
      }
      const decision = decide(this.policies[signal], reading.smoothed);
      if (!decision) {
        continue;
      }
      const outcome = await this.publish(decision);
      publishes[decision.destination] = { command: decision.command, outcome };
    }

    const report: TickReport = { startedAt, brightness, volume, rssi, line, publishes };
    this.metrics.recordTick(startedAt);
    this.metrics.observeLatency('tick', this.now() - startedAt);
    this.emit('tick', report);
    return report;
  }

  private async loop() {
    if (this.currentState === 'stopped') {
      return;
    }
    this.setState('running');
    try {
      while (!this.stopRequested) {
        const startedAt = this.now();
        try {
          await this.runTick();
        } catch (err) {
          this.logger.error({ err }, 'Control tick failed');
        }
        if (this.stopRequested) {
          break;
        }
        const elapsed = this.now() - startedAt;
        await this.sleep(Math.max(0, this.tickPeriodMs - elapsed));
      }
    } finally {
      this.setState('shutting-down');
      try {
        await this.options.onShutdown?.();
      } finally {
        this.setState('stopped');
      }
    }
  }

  private async sample(signal: SignalKind, read: () => Promise<number>): Promise<SignalReading> {
    const tracker = this.trackers[signal];
    try {
      const raw = await read();
      tracker.push(raw);
      this.metrics.recordSensorRead(signal, raw);
      return { raw, smoothed: tracker.current() };
    } catch (err) {
      const error = toError(err);
      this.metrics.recordSensorFailure(signal, error);
      this.logger.error({ err: error, signal }, 'Sensor read failed');
      return { raw: null, smoothed: null, error: error.message };
    }
  }

  private async publish(decision: Decision): Promise<PublishOutcome> {
    const { destination, command } = decision;
    const now = this.now();
    const suppressed = this.options.throttle.isSuppressed(destination, now);
    const sent = await this.options.throttle.tryEmit(destination, command, now);
    if (sent) {
      return 'sent';
    }
    return suppressed ? 'suppressed' : 'failed';
  }

  private setTickPeriod(tickPeriodMs: number) {
    if (!Number.isFinite(tickPeriodMs) || tickPeriodMs <= 0) {
      throw new RangeError(`Tick period must be > 0 (received ${tickPeriodMs})`);
    }
    this.tickPeriodMs = tickPeriodMs;
  }

  private setState(next: ControllerState) {
    if (this.currentState === next) {
      return;
    }
    const previous = this.currentState;
    this.currentState = next;
    this.logger.debug({ state: next, previous }, 'Control loop state changed');
    this.emit('state', next, previous);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0 || this.stopRequested) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private cancelSleep() {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
