/**
 * Process Instrument
 *
 * Drives a long-lived external driver process (Modbus RTU, serial ASCII,
 * USB-TMC or UVC recorder helpers) over JSON lines on stdio.
 *
 * Request:  {"id":3,"op":"acquire","timeout_ms":2000}
 * Replies:  {"id":3,"ok":true,"channels":[{"id":"ch1","values":[...]}],"sample_interval_ms":0.5,"files":[...]}
 *           {"id":3,"ok":false,"error":"transient"|"fatal","message":"..."}
 * Commands: {"op":"set","channel":"ch1","value":5}, {"op":"readback","channel":"ch1"},
 *           {"op":"off"}; success replies carry {"value":n}.
 *
 * One request is in flight at a time, except that an `off` preempts whatever
 * is pending: the pending request fails and `off` goes out at once. Replies
 * whose id does not match the pending request (late answers to a timed-out
 * or preempted request) are discarded.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { z } from 'zod';
import { log, Logger } from '../utils/logger.js';
import { AcquireTimeoutError, FatalError, TransientError } from '../utils/errors.js';
import type {
  AcquiredData,
  Instrument,
  InstrumentCapability,
  InstrumentCommand,
  TransportFamily,
} from '../types/capture-types.js';

/**
 * The part of a ChildProcess this driver uses.
 */
export interface DriverProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnDriver = (command: string, args: string[], env?: Record<string, string>) => DriverProcess;

export interface ProcessInstrumentOptions {
  id: string;
  capability: InstrumentCapability;
  transport: TransportFamily;
  command: string;
  args?: string[];
  env?: Record<string, string>;
  /** Timeout for connect/command/close exchanges */
  commandTimeoutMs?: number;
  spawnFn?: SpawnDriver;
  logger?: Logger;
}

const ReplySchema = z.union([
  z.object({
    id: z.number().int(),
    ok: z.literal(true),
    channels: z
      .array(z.object({ id: z.string(), values: z.array(z.number()) }))
      .optional(),
    sample_interval_ms: z.number().nonnegative().optional(),
    files: z.array(z.string()).optional(),
    value: z.number().optional(),
  }),
  z.object({
    id: z.number().int(),
    ok: z.literal(false),
    error: z.enum(['transient', 'fatal']),
    message: z.string().default('driver error'),
  }),
]);

type Reply = z.infer<typeof ReplySchema>;
type OkReply = Extract<Reply, { ok: true }>;

interface PendingRequest {
  id: number;
  op: string;
  timer: NodeJS.Timeout;
  resolve: (reply: OkReply) => void;
  reject: (error: Error) => void;
}

const defaultSpawn: SpawnDriver = (command, args, env) =>
  spawn(command, args, {
    stdio: ['pipe', 'pipe', 'pipe'],
    env: { ...process.env, ...env },
  });

export class ProcessInstrument implements Instrument {
  readonly id: string;
  readonly capability: InstrumentCapability;
  readonly transport: TransportFamily;

  private readonly options: ProcessInstrumentOptions;
  private readonly logger: Logger;
  private proc: DriverProcess | null = null;
  private pending: PendingRequest | null = null;
  private nextId = 1;
  private exited = false;
  private exitPromise: Promise<void> = Promise.resolve();

  constructor(options: ProcessInstrumentOptions) {
    this.options = options;
    this.id = options.id;
    this.capability = options.capability;
    this.transport = options.transport;
    this.logger = (options.logger ?? log).child({ service: 'process-instrument', instrumentId: options.id });
  }

  async connect(): Promise<void> {
    const spawnFn = this.options.spawnFn ?? defaultSpawn;
    const proc = spawnFn(this.options.command, this.options.args ?? [], this.options.env);
    this.proc = proc;
    this.exited = false;

    this.exitPromise = new Promise((resolve) => {
      proc.on('exit', (code) => {
        this.exited = true;
        this.failPending(new FatalError(`Driver process for ${this.id} exited with code ${code}`, {
          operation: 'driver',
          instrumentId: this.id,
        }));
        resolve();
      });
    });
    proc.on('error', (error) => {
      this.exited = true;
      this.failPending(new FatalError(`Driver process for ${this.id} failed: ${error.message}`, {
        operation: 'driver',
        instrumentId: this.id,
      }));
    });

    proc.stdin?.on('error', (error) => {
      if (this.exited) {
        return;
      }
      this.exited = true;
      this.failPending(new FatalError(`Driver process for ${this.id} stopped reading: ${error.message}`, {
        operation: 'driver',
        instrumentId: this.id,
      }));
      proc.kill('SIGKILL');
    });

    if (proc.stdout) {
      createInterface({ input: proc.stdout }).on('line', (line) => this.handleLine(line));
    }
    if (proc.stderr) {
      createInterface({ input: proc.stderr }).on('line', (line) => this.logger.debug('driver stderr', { line }));
    }

    await this.request({ op: 'connect' }, this.commandTimeout());
  }

  async acquire(timeoutMs: number): Promise<AcquiredData> {
    const reply = await this.request({ op: 'acquire', timeout_ms: timeoutMs }, timeoutMs);
    if (!reply.channels || reply.sample_interval_ms === undefined) {
      throw new TransientError(`Incomplete acquire reply from ${this.id}`, {
        operation: 'acquire',
        instrumentId: this.id,
      });
    }
    return {
      channels: reply.channels.map((channel) => ({ channelId: channel.id, values: channel.values })),
      sampleIntervalMs: reply.sample_interval_ms,
      files: reply.files ?? [],
    };
  }

  async command(cmd: InstrumentCommand): Promise<number> {
    const message =
      cmd.op === 'off'
        ? { op: 'off', channel: cmd.channelId }
        : cmd.op === 'set'
          ? { op: 'set', channel: cmd.channelId, value: cmd.value }
          : { op: 'readback', channel: cmd.channelId };

    const reply = await this.request(message, this.commandTimeout());
    if (reply.value === undefined) {
      if (cmd.op === 'off') {
        return 0;
      }
      throw new TransientError(`Reply to ${cmd.op} from ${this.id} carried no value`, {
        operation: cmd.op,
        instrumentId: this.id,
      });
    }
    return reply.value;
  }

  async close(): Promise<void> {
    const proc = this.proc;
    if (!proc || this.exited) {
      return;
    }

    try {
      await this.request({ op: 'close' }, this.commandTimeout());
    } catch (error) {
      this.logger.warn('Driver did not acknowledge close', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    proc.stdin?.end();

    let timer: NodeJS.Timeout | undefined;
    const gaveUp = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.commandTimeout());
    });
    const timedOut = await Promise.race([this.exitPromise.then(() => false), gaveUp]);
    clearTimeout(timer);

    if (timedOut) {
      this.logger.warn('Driver process did not exit, killing');
      proc.kill('SIGKILL');
    }
  }

  forceClose(): void {
    this.failPending(new FatalError(`Connection to ${this.id} force closed`, {
      operation: 'forceClose',
      instrumentId: this.id,
    }));
    if (this.proc && !this.exited) {
      this.proc.kill('SIGKILL');
    }
  }

  private commandTimeout(): number {
    return this.options.commandTimeoutMs ?? 2000;
  }

  private request(message: Record<string, unknown>, timeoutMs: number): Promise<OkReply> {
    const stdin = this.proc?.stdin;
    if (!stdin || this.exited) {
      return Promise.reject(new FatalError(`Driver process for ${this.id} is not running`, {
        operation: String(message.op),
        instrumentId: this.id,
      }));
    }
    const preempted = this.pending;
    if (preempted && message.op === 'off') {
      this.logger.warn('Preempting pending request with off', { pendingOp: preempted.op });
      this.failPending(new TransientError(`${preempted.op} on ${this.id} preempted by off`, {
        operation: preempted.op,
        instrumentId: this.id,
      }));
    }
    if (this.pending) {
      return Promise.reject(new TransientError(`Request already in flight on ${this.id}`, {
        operation: String(message.op),
        instrumentId: this.id,
      }));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(message.op === 'acquire'
          ? new AcquireTimeoutError(this.id, timeoutMs)
          : new TransientError(`No reply to ${String(message.op)} from ${this.id} within ${timeoutMs}ms`, {
              operation: String(message.op),
              instrumentId: this.id,
            }));
      }, timeoutMs);

      this.pending = { id, op: String(message.op), timer, resolve, reject };
      stdin.write(`${JSON.stringify({ id, ...message })}\n`);
    });
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      this.logger.debug('Ignoring non-JSON driver output', { line: trimmed });
      return;
    }

    const result = ReplySchema.safeParse(parsed);
    const pending = this.pending;
    if (!result.success) {
      this.logger.warn('Malformed driver reply', { line: trimmed });
      if (pending) {
        this.settle(pending);
        pending.reject(new TransientError(`Malformed reply from ${this.id}`, {
          operation: 'reply',
          instrumentId: this.id,
        }));
      }
      return;
    }

    const reply = result.data;
    if (!pending || pending.id !== reply.id) {
      this.logger.debug('Discarding stale driver reply', { replyId: reply.id });
      return;
    }

    this.settle(pending);
    if (reply.ok) {
      pending.resolve(reply);
    } else if (reply.error === 'transient') {
      pending.reject(new TransientError(reply.message, { operation: 'driver', instrumentId: this.id }));
    } else {
      pending.reject(new FatalError(reply.message, { operation: 'driver', instrumentId: this.id }));
    }
  }

  private settle(pending: PendingRequest): void {
    clearTimeout(pending.timer);
    this.pending = null;
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (pending) {
      this.settle(pending);
      pending.reject(error);
    }
  }
}
