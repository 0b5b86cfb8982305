import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { PassThrough, type Readable, type Writable } from 'node:stream';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_START_TIMEOUT_MS = 4000;
const DEFAULT_IDLE_TIMEOUT_MS = 5000;
const DEFAULT_RESTART_DELAY_MS = 500;
const DEFAULT_RESTART_MAX_DELAY_MS = 5000;
const DEFAULT_RESTART_JITTER_FACTOR = 0.2;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;

export type CommandFactoryOptions = {
  file: string;
  framesPerSecond: number;
  inputArgs?: string[];
  rtspTransport?: string;
  binaryPath?: string;
};

/** The slice of a fluent-ffmpeg command the source drives. */
export interface FrameCommand {
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'start' | 'end', listener: () => void): unknown;
  pipe(stream: Writable, options: { end: boolean }): unknown;
  kill(signal: string): unknown;
}

export type VideoSourceOptions = CommandFactoryOptions & {
  channel?: string;
  idleTimeoutMs?: number;
  watchdogTimeoutMs?: number;
  startTimeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  restartJitterFactor?: number;
  maxBufferBytes?: number;
  forceKillTimeoutMs?: number;
  commandFactory?: (options: CommandFactoryOptions) => FrameCommand;
  random?: () => number;
  metrics?: MetricsRegistry;
};

export type RecoverEvent = {
  reason: string;
  attempt: number;
  delayMs: number;
  channel: string;
};

/**
 * Decodes a stream into PNG frames through ffmpeg's image2pipe output. Any
 * failure, stall or end of stream schedules a restart with exponential backoff.
 */
export class VideoSource extends EventEmitter {
  private command: FrameCommand | null = null;
  private stream: Readable | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private shouldStop = false;
  private recovering = false;
  private hasReceivedFrame = false;
  private restartCount = 0;
  private restartTimer: NodeJS.Timeout | null = null;
  private startTimer: NodeJS.Timeout | null = null;
  private watchdogTimer: NodeJS.Timeout | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private killTimer: NodeJS.Timeout | null = null;
  private readonly channel: string;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: VideoSourceOptions) {
    super();
    this.channel = options.channel ?? 'video:main';
    this.metrics = options.metrics ?? metrics;
  }

  start() {
    this.shouldStop = false;
    this.restartCount = 0;
    this.startCommand();
  }

  stop() {
    this.shouldStop = true;
    this.recovering = false;
    this.clearTimer('restartTimer');
    this.clearTimer('startTimer');
    this.clearTimer('watchdogTimer');
    this.clearTimer('idleTimer');
    this.cleanupStream();
    this.terminateCommand();
  }

  /** Reads PNG frames from an already running stream. */
  consume(stream: Readable) {
    this.cleanupStream();
    this.stream = stream;
    this.buffer = Buffer.alloc(0);

    const onData = (chunk: Buffer) => {
      if (!this.hasReceivedFrame) {
        this.hasReceivedFrame = true;
        this.clearTimer('startTimer');
        this.restartCount = 0;
      }

      this.resetIdleTimer();
      this.resetWatchdogTimer();
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = this.extractFrames(this.buffer);
      this.buffer = remainder;

      for (const frame of frames) {
        this.emit('frame', frame);
      }

      if (corrupted) {
        this.buffer = Buffer.alloc(0);
        this.reportError(new Error('Corrupted frame encountered'));
        this.scheduleRecovery('corrupted-frame');
      }
    };

    const onError = (err: Error) => {
      this.reportError(err);
      this.scheduleRecovery('stream-error');
    };

    const onClose = () => {
      if (this.shouldStop) {
        return;
      }
      this.scheduleRecovery('stream-closed');
    };

    stream.on('data', onData);
    stream.once('error', onError);
    stream.once('end', onClose);
    stream.once('close', onClose);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      stream.off('end', onClose);
      stream.off('close', onClose);
    };

    this.resetWatchdogTimer();
  }

  private startCommand() {
    if (this.shouldStop) {
      return;
    }

    this.recovering = false;
    this.hasReceivedFrame = false;
    this.resetStartTimer();

    let command: FrameCommand;
    try {
      command = this.createCommand();
    } catch (error) {
      this.reportError(error);
      this.scheduleRecovery(isMissingBinary(error) ? 'ffmpeg-missing' : 'start-error');
      return;
    }
    this.command = command;

    command.once('error', (err: Error) => {
      if (this.shouldStop || this.recovering || command !== this.command) {
        return;
      }
      this.reportError(err);
      this.scheduleRecovery(isMissingBinary(err) ? 'ffmpeg-missing' : 'ffmpeg-error');
    });
    command.once('end', () => {
      if (this.shouldStop || this.recovering || command !== this.command) {
        return;
      }
      this.emit('end');
      this.scheduleRecovery('ffmpeg-ended');
    });
    command.once('start', () => {
      this.clearTimer('startTimer');
    });

    const output = new PassThrough();
    this.consume(output);
    command.pipe(output, { end: true });
  }

  private createCommand(): FrameCommand {
    const factoryOptions: CommandFactoryOptions = {
      file: this.options.file,
      framesPerSecond: this.options.framesPerSecond,
      inputArgs: this.options.inputArgs,
      rtspTransport: this.options.rtspTransport,
      binaryPath: this.options.binaryPath
    };
    if (this.options.commandFactory) {
      return this.options.commandFactory(factoryOptions);
    }
    return buildFfmpegCommand(factoryOptions);
  }

  private extractFrames(buffer: Buffer) {
    let working = buffer;
    const frames: Buffer[] = [];
    let corrupted = false;
    const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    while (true) {
      const pngStart = working.indexOf(PNG_SIGNATURE);
      if (pngStart > 0) {
        working = working.subarray(pngStart);
      }

      const frame = pngStart === -1 ? null : slicePng(working);
      if (!frame) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      frames.push(frame.png);
      working = frame.remainder;
    }

    return { frames, remainder: working, corrupted };
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
    this.stream = null;
    this.buffer = Buffer.alloc(0);
    this.clearTimer('idleTimer');
  }

  private scheduleRecovery(reason: string) {
    if (this.shouldStop || this.recovering || this.restartTimer) {
      return;
    }

    this.recovering = true;
    this.restartCount += 1;
    const attempt = this.restartCount;

    this.clearTimer('startTimer');
    this.clearTimer('watchdogTimer');
    this.cleanupStream();
    this.terminateCommand();

    const delayMs = this.computeRestartDelay(attempt);
    this.metrics.recordPipelineRestart(this.channel, reason, { attempt, delayMs });
    this.emit('recover', { reason, attempt, delayMs, channel: this.channel } satisfies RecoverEvent);

    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.startCommand();
    }, delayMs);
    this.restartTimer.unref?.();
  }

  computeRestartDelay(attempt: number): number {
    const minDelayMs = Math.max(0, this.options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS);
    const maxDelayMs = Math.max(minDelayMs, this.options.restartMaxDelayMs ?? DEFAULT_RESTART_MAX_DELAY_MS);

    const exponential = minDelayMs * 2 ** Math.max(0, attempt - 1);
    const baseDelayMs = Math.min(maxDelayMs, Math.round(exponential));

    const factor = Math.max(0, this.options.restartJitterFactor ?? DEFAULT_RESTART_JITTER_FACTOR);
    const jitterRange = Math.round(baseDelayMs * factor);
    if (jitterRange === 0) {
      return baseDelayMs;
    }
    const random = this.options.random?.() ?? Math.random();
    const jittered = baseDelayMs + Math.round((random * 2 - 1) * jitterRange);
    return Math.min(maxDelayMs, Math.max(minDelayMs, jittered));
  }

  private terminateCommand() {
    const command = this.command;
    if (!command) {
      return;
    }
    this.command = null;
    this.killCommand(command, 'SIGTERM');

    const delay = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    this.clearTimer('killTimer');
    if (delay <= 0) {
      this.killCommand(command, 'SIGKILL');
      return;
    }
    this.killTimer = setTimeout(() => {
      this.killTimer = null;
      this.killCommand(command, 'SIGKILL');
    }, delay);
    this.killTimer.unref?.();
  }

  private killCommand(command: FrameCommand, signal: NodeJS.Signals) {
    try {
      command.kill(signal);
    } catch (error) {
      // already exited
      logger.debug({ err: error, channel: this.channel, signal }, 'ffmpeg kill ignored');
    }
  }

  private resetStartTimer() {
    this.clearTimer('startTimer');
    const timeout = this.options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    if (timeout <= 0) {
      return;
    }
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      if (this.shouldStop || this.hasReceivedFrame) {
        return;
      }
      this.reportError(new Error('Video source start timeout'));
      this.scheduleRecovery('start-timeout');
    }, timeout);
    this.startTimer.unref?.();
  }

  private resetWatchdogTimer() {
    this.clearTimer('watchdogTimer');
    const timeout = this.options.watchdogTimeoutMs ?? 0;
    if (this.shouldStop || timeout <= 0) {
      return;
    }
    this.watchdogTimer = setTimeout(() => {
      this.watchdogTimer = null;
      if (this.shouldStop) {
        return;
      }
      this.reportError(new Error('Video source watchdog timeout'));
      this.scheduleRecovery('watchdog-timeout');
    }, timeout);
    this.watchdogTimer.unref?.();
  }

  private resetIdleTimer() {
    this.clearTimer('idleTimer');
    const timeout = this.options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    if (this.shouldStop || !this.hasReceivedFrame || timeout <= 0) {
      return;
    }
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      if (this.shouldStop) {
        return;
      }
      this.reportError(new Error('Video source stream idle timeout'));
      this.scheduleRecovery('stream-idle');
    }, timeout);
    this.idleTimer.unref?.();
  }

  private clearTimer(name: 'restartTimer' | 'startTimer' | 'watchdogTimer' | 'idleTimer' | 'killTimer') {
    const timer = this[name];
    if (timer) {
      clearTimeout(timer);
      this[name] = null;
    }
  }

  private reportError(error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
      return;
    }
    logger.warn({ err, channel: this.channel }, 'Video source error');
  }
}

export function buildFfmpegCommand(options: CommandFactoryOptions): ffmpeg.FfmpegCommand {
  const command = ffmpeg(options.file);
  if (options.binaryPath) {
    command.setFfmpegPath(options.binaryPath);
  }

  const inputOptions: string[] = [];
  if (options.rtspTransport && options.file.startsWith('rtsp://')) {
    inputOptions.push('-rtsp_transport', options.rtspTransport);
  }
  if (options.inputArgs?.length) {
    inputOptions.push(...options.inputArgs);
  }
  if (inputOptions.length > 0) {
    command.inputOptions(inputOptions);
  }

  return command
    .outputOptions('-vf', `fps=${options.framesPerSecond}`)
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');
}

function isMissingBinary(error: unknown) {
  if (!(error instanceof Error)) {
    return false;
  }
  return Reflect.get(error, 'code') === 'ENOENT' || /cannot find ffmpeg/i.test(error.message);
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

/** Splits the first complete PNG (through its IEND chunk) off the buffer. */
export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}
