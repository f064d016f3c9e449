/**
 * Core Types for vmtrial
 *
 * Boundaries the orchestrator talks to (image store, remote transport) and
 * the invocation, context and result types of a single run.
 */

import type { Writable } from 'node:stream';

import type { Clock } from '../lib/clock.js';
import type { ImageInfo } from '../tart/types.js';

// =============================================================================
// Boundaries
// =============================================================================

/**
 * Handle on a VM running as a background child process
 */
export interface VMProcess {
  /** OS process id, if the child was spawned */
  readonly pid: number | undefined;
  /** Whether the child is still alive */
  isRunning(): boolean;
  /** Terminate the child, escalating to SIGKILL after `graceMs` */
  stop(graceMs?: number): Promise<void>;
}

/**
 * Registry of VM images: clones, boots, stops and deletes instances
 */
export interface ImageStore {
  list(signal?: AbortSignal): Promise<ImageInfo[]>;
  clone(source: string, target: string, signal?: AbortSignal): Promise<void>;
  /** Boot an instance headlessly in the background */
  start(name: string): VMProcess;
  /** Stop an instance through the store (used when no process handle is alive) */
  stop(name: string): Promise<void>;
  delete(name: string): Promise<void>;
  /** The instance's network address, or null when not yet assigned */
  resolveAddress(name: string, signal?: AbortSignal): Promise<string | null>;
}

/**
 * Options for running a remote command
 */
export interface RemoteExecOptions {
  stdout?: Writable;
  stderr?: Writable;
  signal?: AbortSignal;
}

/**
 * Remote shell and file copy channel to a guest
 */
export interface RemoteTransport {
  /** Attempt a no-op command; true when the guest accepted it */
  probe(address: string, signal?: AbortSignal): Promise<boolean>;
  /** Copy a local path to `remotePath` in the guest */
  copy(
    address: string,
    localPath: string,
    remotePath: string,
    options?: { recursive?: boolean; signal?: AbortSignal }
  ): Promise<void>;
  /** Run a shell command in the guest; resolves to its exit status */
  exec(address: string, command: string, options?: RemoteExecOptions): Promise<number>;
}

// =============================================================================
// Invocation and Result
// =============================================================================

/**
 * A single execution request
 */
export interface TestInvocation {
  /** Local script path or inline shell command */
  target: string;
  /** Arguments appended to the target */
  args?: string[];
  /** NAME=VALUE assignments exported before the target runs */
  env?: string[];
  /** Local paths copied into the guest home directory, in order */
  copyPaths?: string[];
  /** Instance name (default: generated) */
  instanceName?: string;
  /** Keep the instance after the run */
  retain?: boolean;
}

/**
 * Phases of a run, in execution order
 */
export type Phase =
  | 'preflight'
  | 'clone'
  | 'start'
  | 'wait'
  | 'copy'
  | 'execute'
  | 'cleanup';

export type PhaseStatus = 'starting' | 'completed' | 'failed';

/**
 * Progress event emitted by the orchestrator
 */
export interface PhaseEvent {
  phase: Phase;
  status: PhaseStatus;
  /** Human-readable detail, e.g. the instance name or address */
  detail?: string;
  /** Error message for failed phases */
  error?: string;
}

/**
 * Observer for run progress and cleanup warnings
 */
export interface RunObserver {
  onPhase?: (event: PhaseEvent) => void;
  onWarning?: (message: string) => void;
  /** Low-priority diagnostics, e.g. each polling attempt */
  onDebug?: (message: string) => void;
}

/**
 * Collaborators and tuning for one run
 */
export interface RunDependencies {
  imageStore: ImageStore;
  transport: RemoteTransport;
  /** Remote user, used in progress messages */
  user: string;
  /** SSH readiness timeout in milliseconds */
  timeoutMs: number;
  /** Delay between readiness attempts in milliseconds (default: 2000) */
  pollIntervalMs?: number;
  /** Grace period before SIGKILL when stopping the VM process (default: 30000) */
  stopGraceMs?: number;
  clock?: Clock;
  /** External interruption */
  signal?: AbortSignal;
  observer?: RunObserver;
  /** Sinks for guest output (default: process.stdout / process.stderr) */
  stdout?: Writable;
  stderr?: Writable;
  /** Decides whether a target is a local script file (default: fs check) */
  isLocalFile?: (path: string) => Promise<boolean>;
  /** Instance name generator (default: generateInstanceName) */
  generateName?: (baseImage: string) => string;
}

/**
 * Outcome of one invocation
 */
export interface RunResult {
  /** Remote exit status, verbatim */
  exitStatus: number;
  passed: boolean;
  instanceName: string;
  /** Whether the instance was kept */
  retained: boolean;
  /** Guest address used for the run */
  address: string;
  durationMs: number;
}

/**
 * Invocation-scoped mutable state shared by the phase functions
 */
export interface RunContext {
  baseImage: string;
  instanceName: string;
  invocation: TestInvocation;
  deps: RunDependencies;
  clock: Clock;
  /** Set once the clone succeeded; cleanup only touches owned instances */
  cloned: boolean;
  vm: VMProcess | null;
  address: string | null;
  cleanedUp: boolean;
}
