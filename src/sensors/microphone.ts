import { spawn } from 'node:child_process';
import defaultLogger, { type ComponentLogger } from '../logger.js';
import { CaptureError, MicrophoneError, toError } from '../errors.js';

const DEFAULT_SAMPLE_RATE = 16000;
const DEFAULT_CHANNELS = 1;
const DEFAULT_BLOCK_DURATION_MS = 500;
const DB_FLOOR_EPSILON = 1e-12;

export type MicrophoneFormat = 'alsa' | 'avfoundation' | 'dshow' | 'pulse';

export type MicrophoneSourceOptions = {
  sampleRate?: number;
  channels?: number;
  blockDurationMs?: number;
  device?: string;
  format?: string;
  platform?: NodeJS.Platform;
  /** Extra time allowed past the recording length before the process is killed. */
  graceMs?: number;
  logger?: ComponentLogger;
};

function buildFfmpegCandidates(): string[] {
  const candidates = new Set<string>();
  const fromEnv = process.env.FFMPEG_PATH?.trim();
  if (fromEnv) {
    candidates.add(fromEnv);
  }
  candidates.add('ffmpeg');
  candidates.add('avconv');
  return Array.from(candidates);
}

function defaultMicFormat(platform: NodeJS.Platform): MicrophoneFormat {
  switch (platform) {
    case 'darwin':
      return 'avfoundation';
    case 'win32':
      return 'dshow';
    default:
      return 'alsa';
  }
}

function defaultMicDevice(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return ':0';
    case 'win32':
      return 'audio="default"';
    default:
      return 'default';
  }
}

export function buildMicrophoneArgs(options: MicrophoneSourceOptions): string[] {
  const platform = options.platform ?? process.platform;
  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const channels = options.channels ?? DEFAULT_CHANNELS;
  const durationSeconds = (options.blockDurationMs ?? DEFAULT_BLOCK_DURATION_MS) / 1000;

  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-f',
    options.format ?? defaultMicFormat(platform),
    '-i',
    options.device ?? defaultMicDevice(platform),
    '-t',
    String(durationSeconds),
    '-ac',
    String(channels),
    '-ar',
    String(sampleRate),
    '-f',
    's16le',
    '-acodec',
    'pcm_s16le',
    'pipe:1'
  ];
}

/**
 * Root mean square of signed 16-bit little-endian PCM, scaled to [0, 1].
 * Interleaved channels are averaged per frame first.
 */
export function pcmRms(buffer: Buffer, channels = 1): number {
  const width = Math.max(1, Math.floor(channels));
  const frames = Math.floor(buffer.length / (2 * width));
  if (frames === 0) {
    return 0;
  }

  let sumSquares = 0;
  for (let frame = 0; frame < frames; frame += 1) {
    let sum = 0;
    for (let channel = 0; channel < width; channel += 1) {
      sum += buffer.readInt16LE((frame * width + channel) * 2);
    }
    const value = sum / width / 32768;
    sumSquares += value * value;
  }

  return Math.sqrt(sumSquares / frames);
}

export function rmsToDb(rms: number): number {
  return 20 * Math.log10(rms + DB_FLOOR_EPSILON);
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Records one short block per measurement. There is no long-lived process, so a
 * failed read leaves nothing behind to recover.
 */
export class MicrophoneSource {
  private readonly candidates = buildFfmpegCandidates();
  private binaryIndex = 0;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: MicrophoneSourceOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  get binary(): string | null {
    return this.candidates[this.binaryIndex] ?? null;
  }

  async open(): Promise<void> {
    try {
      const db = await this.measureVolumeDb();
      this.logger.info({ binary: this.binary, db }, 'Microphone ready');
    } catch (error) {
      const err = toError(error);
      throw new MicrophoneError(`Microphone is unavailable: ${err.message}`, { cause: err });
    }
  }

  async measureVolumeDb(): Promise<number> {
    const pcm = await this.record();
    if (pcm.length < 2) {
      throw new CaptureError('Microphone returned no audio');
    }
    return rmsToDb(pcmRms(pcm, this.options.channels ?? DEFAULT_CHANNELS));
  }

  private async record(): Promise<Buffer> {
    const args = buildMicrophoneArgs(this.options);

    for (let index = this.binaryIndex; index < this.candidates.length; index += 1) {
      const binary = this.candidates[index];
      try {
        const pcm = await this.recordWith(binary, args);
        this.binaryIndex = index;
        return pcm;
      } catch (error) {
        if (isMissingBinary(error)) {
          this.logger.debug({ binary }, 'ffmpeg binary not found, trying next candidate');
          continue;
        }
        throw error;
      }
    }

    this.binaryIndex = 0;
    throw new CaptureError(`ffmpeg binary not found (tried: ${this.candidates.join(', ')})`);
  }

  private recordWith(binary: string, args: string[]): Promise<Buffer> {
    const blockDurationMs = this.options.blockDurationMs ?? DEFAULT_BLOCK_DURATION_MS;
    const timeoutMs = blockDurationMs + (this.options.graceMs ?? 5000);

    return new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const proc = spawn(binary, args);

      const settle = (error: Error | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve(Buffer.concat(chunks));
        }
      };

      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        settle(new CaptureError(`Microphone recording timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
      });

      proc.once('error', (error: Error) => {
        if (isMissingBinary(error)) {
          settle(error);
          return;
        }
        settle(new CaptureError(`Failed to run ${binary}: ${error.message}`, { cause: error }));
      });

      proc.once('close', (code: number | null) => {
        if (code === 0) {
          settle(null);
          return;
        }
        const detail = Buffer.concat(stderr).toString('utf8').trim();
        settle(
          new CaptureError(
            `${binary} exited with code ${code ?? 'null'}${detail ? `: ${detail}` : ''}`
          )
        );
      });
    });
  }
}
