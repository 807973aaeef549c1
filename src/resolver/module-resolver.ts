/**
 * Application module resolution
 * Explicit override, then probing the conventional modules, then a
 * bounded search of the application root for the entry-point file
 */

import { glob, escape } from 'glob';
import * as path from 'node:path';
import type { EntrypointSettings, ModuleProbe, ModuleResolution } from '../core/types.js';
import { ModuleResolutionError } from '../core/errors.js';
import { logger } from '../core/logger.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

type ModuleSearchSettings = Pick<
  EntrypointSettings,
  'explicitModule' | 'appRoot' | 'entryFile' | 'appAttribute' | 'searchDepth'
>;

function moduleStem(entryFile: string): string {
  return path.basename(entryFile, path.extname(entryFile));
}

/**
 * Find entry-point files under the application root, relative and sorted
 */
export async function findEntryFiles(root: string, entryFile: string, maxDepth: number): Promise<string[]> {
  const matches = await glob(`**/${escape(entryFile)}`, {
    cwd: root,
    nodir: true,
    posix: true,
    maxDepth,
  });

  return matches.filter(match => match.split('/').length <= maxDepth).sort();
}

/**
 * Turn `billing/main.py` into `billing.main:app`
 */
export function moduleReferenceFromPath(relativePath: string, attribute: string): string {
  const segments = relativePath.split('/');
  const file = segments.pop() ?? relativePath;
  const parts = [...segments, moduleStem(file)];

  const invalid = parts.find(part => !IDENTIFIER.test(part));
  if (invalid !== undefined) {
    throw new ModuleResolutionError(
      `Found ${relativePath} but "${invalid}" is not an importable module name. Set APP_MODULE explicitly.`,
      { path: relativePath }
    );
  }

  return `${parts.join('.')}:${attribute}`;
}

export async function resolveModuleReference(
  settings: ModuleSearchSettings,
  probe: ModuleProbe
): Promise<ModuleResolution> {
  if (settings.explicitModule) {
    logger.info('Using module from APP_MODULE', { module: settings.explicitModule });
    return { reference: settings.explicitModule, source: 'explicit' };
  }

  const attribute = settings.appAttribute;
  const conventional = [...new Set([moduleStem(settings.entryFile), 'app'])];

  for (const moduleName of conventional) {
    if (await probe.hasAttribute(moduleName, attribute)) {
      const reference = `${moduleName}:${attribute}`;
      logger.info('Detected application module', { module: reference, via: 'probe' });
      return { reference, source: 'probe' };
    }
  }

  const matches = await findEntryFiles(settings.appRoot, settings.entryFile, settings.searchDepth);
  logger.debug('Entry-point search finished', { root: settings.appRoot, matches });

  if (matches.length === 0) {
    throw new ModuleResolutionError(
      `Could not detect the application module: no ${settings.entryFile} within ` +
        `${settings.searchDepth} level(s) of ${settings.appRoot}. Set APP_MODULE (e.g. "package.main:app").`,
      { root: settings.appRoot, entryFile: settings.entryFile, depth: settings.searchDepth }
    );
  }

  if (matches.length > 1) {
    const candidates = matches.map(match => path.posix.join(settings.appRoot, match));
    throw new ModuleResolutionError(
      `Could not detect the application module: ${matches.length} ${settings.entryFile} files found ` +
        `(${candidates.join(', ')}). Set APP_MODULE to choose one.`,
      { root: settings.appRoot, candidates }
    );
  }

  const reference = moduleReferenceFromPath(matches[0], attribute);
  logger.info('Detected application module', { module: reference, via: 'search' });
  return { reference, source: 'search' };
}
