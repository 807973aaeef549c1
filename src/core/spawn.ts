/**
 * Default process spawner
 */

import { spawn } from 'node:child_process';
import type { SpawnFn } from './types.js';

export const spawnProcess: SpawnFn = (command, args, options) => spawn(command, args, options);
