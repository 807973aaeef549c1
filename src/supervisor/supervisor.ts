/**
 * Server Process Supervisor
 * Owns the single server child for the life of the container: starts it,
 * forwards termination signals to it and reports its exit status
 */

import { constants } from 'node:os';
import type {
  ChildHandle,
  ChildLifecycle,
  LaunchCommand,
  SignalSource,
  SpawnFn,
  SupervisorResult,
} from '../core/types.js';
import { ChildStartError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { spawnProcess } from '../core/spawn.js';
import { formatCommand } from './command.js';

export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

export interface SupervisorOptions {
  spawn?: SpawnFn;
  signals?: SignalSource;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/**
 * Conventional shell status for a process killed by a signal
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

export class ServerSupervisor {
  private lifecycle: ChildLifecycle = { state: 'idle' };
  private child: ChildHandle | null = null;
  private readonly spawnFn: SpawnFn;
  private readonly signals: SignalSource;

  constructor(private readonly options: SupervisorOptions = {}) {
    this.spawnFn = options.spawn ?? spawnProcess;
    this.signals = options.signals ?? process;
  }

  getState(): ChildLifecycle {
    return this.lifecycle;
  }

  /**
   * Start the server and resolve once it has exited
   *
   * @throws ChildStartError if the process cannot be spawned
   */
  run(launch: LaunchCommand): Promise<SupervisorResult> {
    if (this.lifecycle.state !== 'idle') {
      return Promise.reject(new Error(`Supervisor already used (state: ${this.lifecycle.state})`));
    }

    return new Promise<SupervisorResult>((resolve, reject) => {
      const onSignal = (signal: NodeJS.Signals) => this.handleSignal(signal);
      const detach = () => {
        for (const signal of TERMINATION_SIGNALS) this.signals.off(signal, onSignal);
      };

      // Handlers go in before the spawn so an early signal is never lost
      for (const signal of TERMINATION_SIGNALS) this.signals.on(signal, onSignal);

      this.transition({ state: 'starting' });
      logger.info('Starting server process', { command: formatCommand(launch) });

      let child: ChildHandle;
      try {
        child = this.spawnFn(launch.command, launch.args, {
          cwd: this.options.cwd,
          env: this.options.env,
          stdio: 'inherit',
        });
      } catch (err) {
        detach();
        const startError = new ChildStartError(launch.command, err instanceof Error ? err : new Error(String(err)));
        this.transition({ state: 'exited', code: startError.exitCode });
        reject(startError);
        return;
      }
      this.child = child;

      child.once('spawn', () => {
        if (this.lifecycle.state === 'starting' && child.pid !== undefined) {
          this.transition({ state: 'running', pid: child.pid });
        }
        logger.info('Server process started', { pid: child.pid });
      });

      child.on('error', (err) => {
        if (this.lifecycle.state === 'exited') return;

        if (child.pid === undefined) {
          // Spawn failure: there is no process to wait for
          detach();
          const startError = new ChildStartError(launch.command, err);
          this.transition({ state: 'exited', code: startError.exitCode });
          reject(startError);
          return;
        }

        logger.error('Server process error', { pid: child.pid, error: err.message });
      });

      child.once('exit', (code, signal) => {
        if (this.lifecycle.state === 'exited') return;
        detach();

        const terminating = this.lifecycle.state === 'terminating' ? this.lifecycle : null;
        let exitCode: number;
        if (code !== null) {
          exitCode = code;
        } else if (terminating && signal && terminating.forwarded.includes(signal)) {
          exitCode = 0;
        } else {
          exitCode = signal ? signalExitCode(signal) : 1;
        }

        this.transition({ state: 'exited', code: exitCode });
        logger.info('Server process exited', { pid: child.pid, code, signal, exitCode });

        resolve(
          terminating
            ? { exitCode, reason: 'signal', signal: terminating.signal }
            : { exitCode, reason: 'child-exit' }
        );
      });
    });
  }

  private handleSignal(signal: NodeJS.Signals): void {
    const current = this.lifecycle;

    if (current.state === 'exited' || current.state === 'idle') {
      return;
    }

    if (current.state === 'terminating') {
      logger.warn(`${signal} received while shutting down, forwarding again`, { pid: current.pid });
      if (!current.forwarded.includes(signal)) {
        this.lifecycle = { ...current, forwarded: [...current.forwarded, signal] };
      }
      this.forward(signal);
      return;
    }

    const pid = current.state === 'running' ? current.pid : this.child?.pid;
    logger.info(`${signal} received, shutting down server process`, { pid });
    this.transition({ state: 'terminating', pid, signal, forwarded: [signal] });
    this.forward(signal);
  }

  private forward(signal: NodeJS.Signals): void {
    if (!this.child) return;

    if (!this.child.kill(signal)) {
      logger.warn('Could not deliver signal to server process', { pid: this.child.pid, signal });
    }
  }

  private transition(next: ChildLifecycle): void {
    logger.debug('Server lifecycle transition', { from: this.lifecycle.state, to: next.state });
    this.lifecycle = next;
  }
}
