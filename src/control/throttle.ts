import defaultLogger, { type ComponentLogger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Command, Destination } from '../types.js';

export const DEFAULT_MIN_COMMAND_INTERVAL_MS = 5000;

export type SendCommand = (destination: Destination, command: Command) => Promise<void>;

export interface PublishThrottleOptions {
  send: SendCommand;
  minIntervalMs?: number;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
}

export class PublishThrottle {
  private readonly ledger = new Map<Destination, number>();
  private readonly send: SendCommand;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private minIntervalMs: number;

  constructor(options: PublishThrottleOptions) {
    this.send = options.send;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? metrics;
    this.minIntervalMs = DEFAULT_MIN_COMMAND_INTERVAL_MS;
    this.setMinInterval(options.minIntervalMs ?? DEFAULT_MIN_COMMAND_INTERVAL_MS);
  }

  get minInterval() {
    return this.minIntervalMs;
  }

  setMinInterval(intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`Minimum command interval must be >= 0 (received ${intervalMs})`);
    }
    this.minIntervalMs = intervalMs;
  }

  lastSentAt(destination: Destination): number | null {
    return this.ledger.get(destination) ?? null;
  }

  isSuppressed(destination: Destination, now: number): boolean {
    const last = this.ledger.get(destination);
    return last !== undefined && now - last < this.minIntervalMs;
  }

  /**
   * Resolves `true` only when the command went out. The ledger moves only on a
   * successful send, so a failed publish can be retried on the next tick.
   */
  async tryEmit(destination: Destination, command: Command, now: number): Promise<boolean> {
    if (this.isSuppressed(destination, now)) {
      this.metrics.recordPublish(destination, 'suppressed', now);
      this.logger.debug(
        { destination, command, lastSentAt: this.ledger.get(destination), minIntervalMs: this.minIntervalMs },
        'Command suppressed by throttle'
      );
      return false;
    }

    try {
      await this.send(destination, command);
    } catch (err) {
      this.metrics.recordPublish(destination, 'failed', now);
      this.logger.warn({ err, destination, command }, 'Failed to publish command');
      return false;
    }

    this.ledger.set(destination, now);
    this.metrics.recordPublish(destination, 'sent', now);
    this.logger.info({ destination, command }, 'Command published');
    return true;
  }

  reset() {
    this.ledger.clear();
  }
}
