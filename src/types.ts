export type SignalKind = 'brightness' | 'volume';

export type Destination = 'light' | 'speaker';

export type Command = 'raise' | 'lower';

export const COMMAND_PAYLOADS: Record<Command, string> = {
  raise: 'UP',
  lower: 'DOWN'
};

export interface ThresholdBounds {
  low: number;
  high: number;
}

export interface RssiSnapshot {
  rssi: number;
  timestamp: string | null;
  rawPayload: string;
  receivedAt: number;
}

export type PublishOutcome = 'sent' | 'suppressed' | 'failed';

export interface SignalReading {
  raw: number | null;
  smoothed: number | null;
  error?: string;
}

export interface TickReport {
  startedAt: number;
  brightness: SignalReading;
  volume: SignalReading;
  rssi: RssiSnapshot | null;
  line: string;
  publishes: Partial<Record<Destination, { command: Command; outcome: PublishOutcome }>>;
}
