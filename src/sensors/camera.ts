import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { PassThrough, type Writable } from 'node:stream';
import defaultLogger, { type ComponentLogger } from '../logger.js';
import { CameraError, CaptureError, toError } from '../errors.js';
import { averageLuminance, extractFrames, readFrameAsGrayscale } from './frame.js';

const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;

export type CameraInput = {
  input: string;
  format: string | null;
  inputOptions: string[];
};

export interface FrameCommand extends EventEmitter {
  pipe(stream: Writable, options?: { end?: boolean }): unknown;
  kill(signal: string): unknown;
}

export type CameraSourceOptions = {
  index: number;
  input?: string;
  format?: string;
  framesPerSecond: number;
  startTimeoutMs: number;
  staleFrameMs: number;
  restartDelayMs: number;
  maxBufferBytes?: number;
  platform?: NodeJS.Platform;
  commandFactory?: (input: CameraInput, framesPerSecond: number) => FrameCommand;
  logger?: ComponentLogger;
  now?: () => number;
};

export type CameraRecoverEvent = {
  reason: 'ffmpeg-error' | 'ffmpeg-ended';
  attempt: number;
  delayMs: number;
  error?: Error;
};

export function resolveCameraInput(
  options: Pick<CameraSourceOptions, 'index' | 'input' | 'format'>,
  platform: NodeJS.Platform = process.platform
): CameraInput {
  if (options.input) {
    return {
      input: options.input,
      format: options.format ?? null,
      inputOptions: options.format ? ['-f', options.format] : []
    };
  }

  switch (platform) {
    case 'linux': {
      const format = options.format ?? 'v4l2';
      return { input: `/dev/video${options.index}`, format, inputOptions: ['-f', format] };
    }
    case 'darwin': {
      const format = options.format ?? 'avfoundation';
      return {
        input: String(options.index),
        format,
        inputOptions: ['-f', format, '-framerate', '30']
      };
    }
    default:
      throw new CameraError(
        `No default camera device for platform "${platform}"; set camera.input (for example "video=Integrated Camera")`
      );
  }
}

function createFfmpegCommand(input: CameraInput, framesPerSecond: number): FrameCommand {
  const command = ffmpeg(input.input);
  if (input.inputOptions.length > 0) {
    command.inputOptions(input.inputOptions);
  }
  return command
    .outputOptions('-vf', `fps=${framesPerSecond}`)
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');
}

/**
 * Streams PNG frames from ffmpeg and keeps only the most recent one. Brightness
 * is computed lazily from that frame when the control loop asks for it.
 */
export class CameraSource extends EventEmitter {
  private command: FrameCommand | null = null;
  private stream: PassThrough | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private latestFrame: Buffer | null = null;
  private latestFrameAt: number | null = null;
  private generation = 0;
  private restartAttempts = 0;
  private restartTimer: NodeJS.Timeout | null = null;
  private startTimer: NodeJS.Timeout | null = null;
  private opening: Promise<void> | null = null;
  private released = false;
  private readonly logger: ComponentLogger;
  private readonly now: () => number;

  constructor(private readonly options: CameraSourceOptions) {
    super();
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  get hasFrame() {
    return this.latestFrame !== null;
  }

  open(): Promise<void> {
    if (this.released) {
      return Promise.reject(new CameraError('Camera has been released'));
    }
    if (this.opening) {
      return this.opening;
    }

    this.opening = new Promise<void>((resolve, reject) => {
      const onFrame = () => {
        cleanup();
        resolve();
      };
      const onStartFailure = (error: Error) => {
        cleanup();
        this.stopCapture();
        reject(error);
      };
      const cleanup = () => {
        this.off('frame', onFrame);
        this.off('start-failure', onStartFailure);
        if (this.startTimer) {
          clearTimeout(this.startTimer);
          this.startTimer = null;
        }
      };

      this.once('frame', onFrame);
      this.once('start-failure', onStartFailure);
      this.startTimer = setTimeout(() => {
        this.startTimer = null;
        onStartFailure(
          new CameraError(`Camera produced no frame within ${this.options.startTimeoutMs}ms`)
        );
      }, this.options.startTimeoutMs);

      try {
        this.startCommand();
      } catch (error) {
        const err = toError(error);
        onStartFailure(
          err instanceof CameraError
            ? err
            : new CameraError(`Failed to start camera: ${err.message}`, { cause: err })
        );
      }
    });

    return this.opening;
  }

  async readBrightness(): Promise<number> {
    const frame = this.latestFrame;
    const frameAt = this.latestFrameAt;
    if (!frame || frameAt === null) {
      throw new CaptureError('No camera frame available');
    }

    const age = this.now() - frameAt;
    if (age > this.options.staleFrameMs) {
      throw new CaptureError(`Latest camera frame is stale (${age}ms old)`);
    }

    try {
      return averageLuminance(readFrameAsGrayscale(frame));
    } catch (error) {
      throw new CaptureError('Failed to decode camera frame', { cause: toError(error) });
    }
  }

  async release(): Promise<void> {
    this.stopCapture();
  }

  private stopCapture() {
    if (this.released) {
      return;
    }
    this.released = true;

    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    this.teardownCommand();
    this.latestFrame = null;
    this.latestFrameAt = null;
    this.logger.info('Camera released');
  }

  private startCommand() {
    const generation = ++this.generation;
    const input = resolveCameraInput(this.options, this.options.platform ?? process.platform);
    const factory = this.options.commandFactory ?? createFfmpegCommand;
    const command = factory(input, this.options.framesPerSecond);
    const stream = new PassThrough();

    this.command = command;
    this.stream = stream;
    this.buffer = Buffer.alloc(0);

    const maxBufferBytes = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    stream.on('error', err => {
      if (generation === this.generation) {
        this.logger.warn({ err }, 'Camera frame stream failed');
      }
    });

    stream.on('data', (chunk: Buffer) => {
      if (generation !== this.generation) {
        return;
      }
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, overflowed } = extractFrames(this.buffer, maxBufferBytes);
      this.buffer = remainder;

      if (overflowed) {
        this.logger.warn({ maxBufferBytes }, 'Discarded camera buffer without a complete frame');
      }

      const latest = frames[frames.length - 1];
      if (latest) {
        this.latestFrame = latest;
        this.latestFrameAt = this.now();
        this.restartAttempts = 0;
        this.emit('frame', latest);
      }
    });

    command.on('error', (err: Error) => {
      this.handleExit(generation, 'ffmpeg-error', err);
    });
    command.on('end', () => {
      this.handleExit(generation, 'ffmpeg-ended');
    });

    command.pipe(stream, { end: true });
    this.logger.debug({ input: input.input, format: input.format }, 'Camera capture started');
  }

  private handleExit(generation: number, reason: CameraRecoverEvent['reason'], error?: Error) {
    if (generation !== this.generation || this.released) {
      return;
    }

    if (!this.latestFrame && this.startTimer) {
      this.emit(
        'start-failure',
        new CameraError(`Camera failed to start: ${error?.message ?? 'ffmpeg exited'}`, { cause: error })
      );
      return;
    }

    this.teardownCommand();
    this.restartAttempts += 1;
    const event: CameraRecoverEvent = {
      reason,
      attempt: this.restartAttempts,
      delayMs: this.options.restartDelayMs,
      error
    };
    this.logger.warn({ err: error, reason, attempt: event.attempt }, 'Camera capture stopped, restarting');
    this.emit('recover', event);

    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.released) {
        return;
      }
      try {
        this.startCommand();
      } catch (restartError) {
        this.logger.error({ err: restartError }, 'Camera restart failed');
      }
    }, this.options.restartDelayMs);
  }

  private teardownCommand() {
    this.generation += 1;
    const command = this.command;
    const stream = this.stream;
    this.command = null;
    this.stream = null;
    this.buffer = Buffer.alloc(0);

    if (stream && !stream.destroyed) {
      stream.destroy();
    }
    if (command) {
      // The error fluent-ffmpeg reports for the kill is dropped by the generation check.
      command.kill('SIGKILL');
    }
  }
}
