import { RssiPayloadError } from '../errors.js';
import type { RssiSnapshot } from '../types.js';

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Parses `{"rssi": -70, "timestamp": "..."}`. A numeric string is accepted for
 * `rssi`; anything else that is not a finite number is rejected.
 */
export function parseRssiPayload(rawPayload: string, receivedAt = Date.now()): RssiSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawPayload);
  } catch {
    throw new RssiPayloadError('RSSI payload is not valid JSON', rawPayload);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RssiPayloadError('RSSI payload must be a JSON object', rawPayload);
  }

  if (!('rssi' in parsed)) {
    throw new RssiPayloadError('RSSI payload is missing "rssi"', rawPayload);
  }

  const rssi = toFiniteNumber(parsed.rssi);
  if (rssi === null) {
    throw new RssiPayloadError(`RSSI value ${JSON.stringify(parsed.rssi)} is not a number`, rawPayload);
  }

  const rawTimestamp = 'timestamp' in parsed ? parsed.timestamp : undefined;
  let timestamp: string | null = null;
  if (typeof rawTimestamp === 'string') {
    timestamp = rawTimestamp;
  } else if (rawTimestamp !== undefined && rawTimestamp !== null) {
    timestamp = String(rawTimestamp);
  }

  return { rssi, timestamp, rawPayload, receivedAt };
}

/**
 * Single-slot mailbox for the latest RSSI reading. Snapshots are frozen and
 * swapped whole, so a reader never sees a half-written value.
 */
export class RssiCache {
  private current: RssiSnapshot | null = null;

  snapshot(): RssiSnapshot | null {
    return this.current;
  }

  replace(snapshot: RssiSnapshot): RssiSnapshot {
    const frozen = Object.freeze({ ...snapshot });
    this.current = frozen;
    return frozen;
  }

  /** Parses and stores `rawPayload`; on error the previous snapshot is kept. */
  update(rawPayload: string, receivedAt = Date.now()): RssiSnapshot {
    return this.replace(parseRssiPayload(rawPayload, receivedAt));
  }

  clear() {
    this.current = null;
  }
}
