/**
 * Core type definitions for the entrypoint
 */

import type { Readable } from 'node:stream';
import type { LogLevel } from './logger.js';

// ============================================================================
// Settings
// ============================================================================

export type ModuleProbeKind = 'static' | 'import';

/**
 * Validated view of the environment snapshot, built once at startup
 */
export interface EntrypointSettings {
  readonly serviceName: string | undefined;
  readonly explicitModule: string | undefined;
  readonly host: string;
  readonly port: number;
  readonly reload: boolean;
  readonly extraArgs: readonly string[];

  // TLS
  readonly certFile: string | undefined;
  readonly keyFile: string | undefined;
  readonly certRoot: string;
  readonly certPattern: string;
  readonly keyPattern: string;

  // Application discovery
  readonly appRoot: string;
  readonly entryFile: string;
  readonly appAttribute: string;
  readonly searchDepth: number;
  readonly moduleSearchPaths: readonly string[];
  readonly moduleProbe: ModuleProbeKind;
  readonly pythonCommand: string;

  readonly serverCommand: string;
  readonly logLevel: LogLevel;
}

// ============================================================================
// Launch configuration
// ============================================================================

export interface LaunchConfig {
  readonly moduleReference: string;
  readonly host: string;
  readonly port: number;
  readonly certPath: string;
  readonly keyPath: string;
  readonly reloadEnabled: boolean;
  readonly extraArgs: readonly string[];
}

export interface LaunchCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export type ModuleReferenceSource = 'explicit' | 'probe' | 'search';

export interface ModuleResolution {
  reference: string;
  source: ModuleReferenceSource;
}

/**
 * Answers whether a module exposes a named attribute
 */
export interface ModuleProbe {
  hasAttribute(moduleName: string, attribute: string): Promise<boolean>;
}

// ============================================================================
// Child process
// ============================================================================

export type ChildLifecycle =
  | { state: 'idle' }
  | { state: 'starting' }
  | { state: 'running'; pid: number }
  | { state: 'terminating'; pid: number | undefined; signal: NodeJS.Signals; forwarded: readonly NodeJS.Signals[] }
  | { state: 'exited'; code: number };

/**
 * The subset of a spawned ChildProcess the supervisor relies on
 */
export interface ChildHandle {
  readonly pid?: number | undefined;
  /** Set only when stderr is spawned as 'pipe' */
  readonly stderr?: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'exit' | 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error & { code?: string }) => void): unknown;
}

export interface SpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdio: 'inherit' | ['ignore', 'ignore', 'pipe'];
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

/**
 * Where host termination signals come from (normally `process`)
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SupervisorResult {
  exitCode: number;
  reason: 'child-exit' | 'signal';
  signal?: NodeJS.Signals;
}
