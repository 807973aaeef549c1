/**
 * Entrypoint orchestration
 * Settings -> launch configuration -> supervised server process
 */

import type {
  EntrypointSettings,
  LaunchCommand,
  ModuleProbe,
  SignalSource,
  SpawnFn,
} from './core/types.js';
import { loadSettings } from './core/config.js';
import { ChildCrashError, ChildStartError, ConfigurationError, EXIT_CODES } from './core/errors.js';
import { detectContainerAddress } from './core/host.js';
import { logger, setLogLevel, setServiceName } from './core/logger.js';
import { createModuleProbe } from './resolver/module-probe.js';
import { resolveLaunchConfig } from './resolver/launch-config.js';
import { buildLaunchCommand } from './supervisor/command.js';
import { ServerSupervisor } from './supervisor/supervisor.js';

export interface EntrypointDeps {
  spawn?: SpawnFn;
  signals?: SignalSource;
  probe?: ModuleProbe;
  detectAddress?: () => string | undefined;
}

/**
 * Resolve the launch configuration, run the server and return the exit code
 * the container should report. Only unexpected failures reject.
 */
export async function runEntrypoint(
  env: NodeJS.ProcessEnv = process.env,
  deps: EntrypointDeps = {}
): Promise<number> {
  let settings: EntrypointSettings;
  let launch: { command: LaunchCommand; env: NodeJS.ProcessEnv };

  try {
    settings = loadSettings(env);
    setLogLevel(settings.logLevel);
    setServiceName(settings.serviceName);

    const address = (deps.detectAddress ?? detectContainerAddress)();
    logger.info('Entrypoint starting', {
      service: settings.serviceName ?? '(unnamed)',
      ip: address,
      nodeVersion: process.version,
    });

    const config = await resolveLaunchConfig(settings, {
      probe: deps.probe ?? createModuleProbe(settings, env),
    });
    logger.info('Launch configuration resolved', { ...config });

    launch = {
      command: buildLaunchCommand(config, settings.serverCommand),
      env: address ? { ...env, IP: address } : { ...env },
    };
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error(`Configuration error: ${err.message}`, { code: err.code, ...err.context });
      return err.exitCode;
    }
    throw err;
  }

  const supervisor = new ServerSupervisor({
    spawn: deps.spawn,
    signals: deps.signals,
    cwd: settings.appRoot,
    env: launch.env,
  });

  try {
    const result = await supervisor.run(launch.command);

    if (result.reason === 'signal') {
      logger.info('Server has been terminated', { signal: result.signal, exitCode: result.exitCode });
    } else if (result.exitCode !== EXIT_CODES.OK) {
      const crash = new ChildCrashError(result.exitCode);
      logger.error(crash.message, { code: crash.code, exitCode: crash.exitCode });
    } else {
      logger.info('Server exited cleanly');
    }

    return result.exitCode;
  } catch (err) {
    if (err instanceof ChildStartError) {
      logger.error(err.message, { code: err.code, ...err.context });
      return err.exitCode;
    }
    throw err;
  }
}

export default runEntrypoint;
