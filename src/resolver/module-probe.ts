/**
 * Module probes
 * Decide whether a dotted module exposes an attribute, either by reading
 * its source (static) or by importing it in a one-shot interpreter (import)
 */

import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import type { EntrypointSettings, ModuleProbe, SpawnFn } from '../core/types.js';
import { ModuleResolutionError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { spawnProcess } from '../core/spawn.js';

const IMPORT_SCRIPT =
  'import importlib, sys\n' +
  'module = importlib.import_module(sys.argv[1])\n' +
  'sys.exit(0 if hasattr(module, sys.argv[2]) else 3)\n';

const STDERR_TAIL = 400;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Check whether source text binds `name` at module level
 */
export function definesTopLevelName(source: string, name: string): boolean {
  const id = escapeRegExp(name);
  const patterns = [
    new RegExp(`^${id}\\s*(:[^=\\n]*)?=(?!=)`),
    new RegExp(`^(async\\s+)?def\\s+${id}\\s*\\(`),
    new RegExp(`^class\\s+${id}\\b`),
  ];
  const boundByImport = new RegExp(`(^|,)\\s*(?:[\\w.]+\\s+as\\s+)?${id}\\s*(,|$)`);

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (patterns.some(p => p.test(line))) return true;

    const fromImport = /^from\s+\S+\s+import\s+(\(?)([^#]*)/.exec(line);
    if (fromImport) {
      let names = fromImport[2];
      // Parenthesised imports may continue over several lines
      if (fromImport[1] === '(') {
        while (!names.includes(')') && i + 1 < lines.length) {
          names += ' ' + lines[++i].replace(/#.*/, '');
        }
        names = names.replace(/\).*/, '');
      }
      const bound = names.split(',').map(entry => entry.trim()).filter(Boolean);
      if (bound.some(entry => boundByImport.test(entry))) return true;
      continue;
    }

    const plainImport = /^import\s+([^#]*)/.exec(line);
    if (plainImport?.[1] !== undefined && boundByImport.test(plainImport[1].trim())) return true;
  }

  return false;
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * Reads module source without executing it
 */
export class StaticModuleProbe implements ModuleProbe {
  private readonly cache = new Map<string, boolean>();

  constructor(private readonly searchPaths: readonly string[]) {}

  /**
   * Locate `a.b` as `<dir>/a/b.py` or `<dir>/a/b/__init__.py` on the search path
   */
  async locate(moduleName: string): Promise<string | null> {
    const parts = moduleName.split('.');
    for (const dir of this.searchPaths) {
      const base = path.join(dir, ...parts);
      for (const candidate of [`${base}.py`, path.join(base, '__init__.py')]) {
        if (await isFile(candidate)) return candidate;
      }
    }
    return null;
  }

  async hasAttribute(moduleName: string, attribute: string): Promise<boolean> {
    const key = `${moduleName}:${attribute}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const file = await this.locate(moduleName);
    let found = false;
    if (file) {
      found = definesTopLevelName(await readFile(file, 'utf8'), attribute);
      logger.debug('Static module probe', { module: moduleName, file, attribute, found });
    } else {
      logger.debug('Static module probe: module not on search path', { module: moduleName });
    }

    this.cache.set(key, found);
    return found;
  }
}

/**
 * Imports the module in a child interpreter. Module-level code runs, so
 * each module is imported at most once per process.
 */
export class ImportModuleProbe implements ModuleProbe {
  private readonly cache = new Map<string, Promise<boolean>>();

  constructor(
    private readonly pythonCommand: string,
    private readonly cwd: string,
    private readonly env: NodeJS.ProcessEnv,
    private readonly spawnFn: SpawnFn = spawnProcess
  ) {}

  hasAttribute(moduleName: string, attribute: string): Promise<boolean> {
    const key = `${moduleName}:${attribute}`;
    let pending = this.cache.get(key);
    if (!pending) {
      pending = this.importOnce(moduleName, attribute);
      this.cache.set(key, pending);
    }
    return pending;
  }

  private importOnce(moduleName: string, attribute: string): Promise<boolean> {
    logger.info('Importing module to probe for application', { module: moduleName, attribute });

    return new Promise((resolve, reject) => {
      const child = this.spawnFn(this.pythonCommand, ['-c', IMPORT_SCRIPT, moduleName, attribute], {
        cwd: this.cwd,
        env: this.env,
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      const stderr: string[] = [];
      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => stderr.push(chunk));

      child.on('error', (err) => {
        reject(
          new ModuleResolutionError(
            `Cannot run ${this.pythonCommand} to probe module "${moduleName}": ${err.message}`,
            { module: moduleName, errno: err.code }
          )
        );
      });

      // 'close' waits for stderr to drain
      child.once('close', (code) => {
        const output = stderr.join('').trim();
        if (code !== 0 && output) {
          // The end of a traceback names the failure
          logger.debug('Import probe failed', { module: moduleName, code, stderr: output.slice(-STDERR_TAIL) });
        } else {
          logger.debug('Import probe finished', { module: moduleName, code });
        }
        resolve(code === 0);
      });
    });
  }
}

export function createModuleProbe(settings: EntrypointSettings, env: NodeJS.ProcessEnv): ModuleProbe {
  if (settings.moduleProbe === 'import') {
    return new ImportModuleProbe(settings.pythonCommand, settings.appRoot, env);
  }
  return new StaticModuleProbe([settings.appRoot, ...settings.moduleSearchPaths]);
}
