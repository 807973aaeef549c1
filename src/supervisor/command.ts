/**
 * Server launch command
 */

import type { LaunchCommand, LaunchConfig } from '../core/types.js';
import { splitWords } from '../core/config.js';

/**
 * Build the argv for the server runtime. `serverCommand` may carry its own
 * leading arguments, e.g. "python -m uvicorn".
 */
export function buildLaunchCommand(config: LaunchConfig, serverCommand: string): LaunchCommand {
  const [command, ...runtimeArgs] = splitWords(serverCommand);
  if (!command) {
    throw new Error('Server command is empty');
  }

  const args = [
    ...runtimeArgs,
    config.moduleReference,
    '--host', config.host,
    '--port', String(config.port),
    '--ssl-certfile', config.certPath,
    '--ssl-keyfile', config.keyPath,
  ];

  if (config.reloadEnabled) {
    args.push('--reload');
  }

  args.push(...config.extraArgs);

  return { command, args };
}

/**
 * Render a command for logs
 */
export function formatCommand(launch: LaunchCommand): string {
  return [launch.command, ...launch.args].join(' ');
}
