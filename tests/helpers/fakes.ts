/**
 * In-process stand-ins for tart, ssh and the clock.
 */

import { Writable } from 'node:stream';

import type { Clock } from '../../src/lib/clock.js';
import type {
  ImageStore,
  PhaseEvent,
  RemoteExecOptions,
  RemoteTransport,
  RunContext,
  RunDependencies,
  RunObserver,
  TestInvocation,
  VMProcess,
} from '../../src/core/types.js';
import type { ImageInfo } from '../../src/tart/types.js';
import { TartExecutor, type TartExecutorOptions } from '../../src/tart/executor.js';

/**
 * Clock whose sleep() advances time instantly.
 */
export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];
  /** Called after each sleep with the new time */
  onSleep?: (now: number) => void;

  now(): number {
    return this.current;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(this.current);
    return Promise.resolve();
  }
}

export class FakeVMProcess implements VMProcess {
  readonly pid = 4242;
  running = true;
  readonly stopCalls: number[] = [];
  stopError?: Error;

  isRunning(): boolean {
    return this.running;
  }

  async stop(graceMs?: number): Promise<void> {
    this.stopCalls.push(graceMs ?? -1);
    if (this.stopError) {
      throw this.stopError;
    }
    this.running = false;
  }
}

/**
 * Resolve once `signal` aborts. Without a signal this never resolves.
 */
export function untilAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    signal?.addEventListener('abort', () => resolve(), { once: true });
  });
}

export function image(name: string): ImageInfo {
  return { name, source: 'local', state: 'stopped', diskGB: 50 };
}

/**
 * Image store recording every call as a short string, e.g. "clone a b".
 */
export class FakeImageStore implements ImageStore {
  images: ImageInfo[];
  readonly calls: string[] = [];
  readonly vm = new FakeVMProcess();
  /** Successive resolveAddress() results; the last one repeats */
  addresses: Array<string | null> = ['192.168.64.5'];
  cloneError?: Error;
  stopError?: Error;
  deleteError?: Error;
  /** Runs inside clone() before cloneError is thrown */
  onClone?: (target: string) => void;
  /** resolveAddress() never answers; it settles with null once its signal aborts */
  hangResolve = false;

  constructor(names: string[] = ['macos-base']) {
    this.images = names.map(image);
  }

  async list(): Promise<ImageInfo[]> {
    this.calls.push('list');
    return [...this.images];
  }

  async clone(source: string, target: string): Promise<void> {
    this.calls.push(`clone ${source} ${target}`);
    this.onClone?.(target);
    if (this.cloneError) {
      throw this.cloneError;
    }
    this.images.push(image(target));
  }

  start(name: string): VMProcess {
    this.calls.push(`start ${name}`);
    return this.vm;
  }

  async stop(name: string): Promise<void> {
    this.calls.push(`stop ${name}`);
    if (this.stopError) {
      throw this.stopError;
    }
  }

  async delete(name: string): Promise<void> {
    this.calls.push(`delete ${name}`);
    if (this.deleteError) {
      throw this.deleteError;
    }
    this.images = this.images.filter((entry) => entry.name !== name);
  }

  async resolveAddress(name: string, signal?: AbortSignal): Promise<string | null> {
    this.calls.push(`ip ${name}`);
    if (this.hangResolve) {
      await untilAborted(signal);
      return null;
    }
    const next = this.addresses.length > 1 ? this.addresses.shift() : this.addresses[0];
    return next ?? null;
  }
}

export interface RecordedCopy {
  localPath: string;
  remotePath: string;
  recursive: boolean;
}

/**
 * Remote transport that records copies and commands.
 */
export class FakeTransport implements RemoteTransport {
  /** Successive probe() results; the last one repeats */
  probeResults: boolean[] = [true];
  readonly probes: string[] = [];
  readonly copies: RecordedCopy[] = [];
  readonly commands: string[] = [];
  exitStatus = 0;
  /** Written to the exec stdout sink */
  output = '';
  copyError?: Error;
  onExec?: (command: string) => void;
  /** probe() never answers; it settles with false once its signal aborts */
  hangProbe = false;

  async probe(address: string, signal?: AbortSignal): Promise<boolean> {
    this.probes.push(address);
    if (this.hangProbe) {
      await untilAborted(signal);
      return false;
    }
    const next = this.probeResults.length > 1 ? this.probeResults.shift() : this.probeResults[0];
    return next ?? false;
  }

  async copy(
    _address: string,
    localPath: string,
    remotePath: string,
    options: { recursive?: boolean } = {}
  ): Promise<void> {
    if (this.copyError) {
      throw this.copyError;
    }
    this.copies.push({ localPath, remotePath, recursive: options.recursive === true });
  }

  async exec(_address: string, command: string, options: RemoteExecOptions = {}): Promise<number> {
    this.commands.push(command);
    this.onExec?.(command);
    if (this.output !== '') {
      options.stdout?.write(this.output);
    }
    return this.exitStatus;
  }
}

/**
 * Observer that keeps everything it is told.
 */
export function recordingObserver(): {
  observer: RunObserver;
  events: PhaseEvent[];
  warnings: string[];
  debug: string[];
} {
  const events: PhaseEvent[] = [];
  const warnings: string[] = [];
  const debug: string[] = [];
  return {
    events,
    warnings,
    debug,
    observer: {
      onPhase: (event) => events.push(event),
      onWarning: (message) => warnings.push(message),
      onDebug: (message) => debug.push(message),
    },
  };
}

/**
 * Writable that collects everything written to it.
 */
export function collectingStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export function makeContext(
  deps: RunDependencies,
  clock: Clock,
  overrides: Partial<RunContext> = {},
  invocation: TestInvocation = { target: 'echo hello' }
): RunContext {
  return {
    baseImage: 'macos-base',
    instanceName: 'vm-1',
    invocation,
    deps,
    clock,
    cloned: true,
    vm: null,
    address: null,
    cleanedUp: false,
    ...overrides,
  };
}

/**
 * TartExecutor whose execute() answers from a function instead of a child.
 */
export class StubTartExecutor extends TartExecutor {
  readonly invocations: string[][] = [];

  constructor(
    private readonly respond: (args: readonly string[]) => string,
    options?: TartExecutorOptions
  ) {
    super(options);
  }

  override async execute(args: readonly string[]): Promise<string> {
    this.invocations.push([...args]);
    return this.respond(args);
  }
}
