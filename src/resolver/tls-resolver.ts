/**
 * TLS material resolution
 */

import { glob } from 'glob';
import { access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import type { EntrypointSettings } from '../core/types.js';
import {
  CertificateAmbiguousError,
  CertificateInvalidError,
  CertificateMissingError,
  type TlsRole,
} from '../core/errors.js';
import { logger } from '../core/logger.js';

export const TLS_OVERRIDE_VARIABLES: Record<TlsRole, string> = {
  certificate: 'TLS_CERT_FILE',
  key: 'TLS_KEY_FILE',
};

export interface TlsLookup {
  role: TlsRole;
  explicitPath: string | undefined;
  searchRoot: string;
  pattern: string;
}

export interface TlsFileResolution {
  path: string;
  source: 'explicit' | 'search';
}

/**
 * Recursively list files under `root` matching `pattern`, sorted
 */
export async function findTlsCandidates(root: string, pattern: string): Promise<string[]> {
  const matches = await glob(`**/${pattern}`, { cwd: root, absolute: true, nodir: true });
  return matches.sort();
}

/**
 * Ensure the path is an existing, readable regular file
 */
export async function verifyTlsFile(role: TlsRole, filePath: string): Promise<void> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new CertificateInvalidError(role, filePath, 'not a regular file');
    }
    await access(filePath, constants.R_OK);
  } catch (err) {
    if (err instanceof CertificateInvalidError) throw err;
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    const reason =
      code === 'ENOENT' ? 'file does not exist'
      : code === 'EACCES' ? 'file is not readable'
      : err instanceof Error ? err.message
      : String(err);
    throw new CertificateInvalidError(role, filePath, reason);
  }
}

export async function resolveTlsFile(lookup: TlsLookup): Promise<TlsFileResolution> {
  const { role, explicitPath, searchRoot, pattern } = lookup;
  const overrideVariable = TLS_OVERRIDE_VARIABLES[role];

  let resolved: TlsFileResolution;

  if (explicitPath) {
    resolved = { path: explicitPath, source: 'explicit' };
  } else {
    const candidates = await findTlsCandidates(searchRoot, pattern);
    logger.debug('TLS search finished', { role, searchRoot, pattern, candidates });

    if (candidates.length === 0) {
      throw new CertificateMissingError(role, searchRoot, pattern, overrideVariable);
    }
    if (candidates.length > 1) {
      throw new CertificateAmbiguousError(role, candidates, overrideVariable);
    }
    resolved = { path: candidates[0], source: 'search' };
  }

  await verifyTlsFile(role, resolved.path);
  logger.info(`Using TLS ${role}`, { path: resolved.path, source: resolved.source });
  return resolved;
}

export function certificateLookup(settings: EntrypointSettings): TlsLookup {
  return {
    role: 'certificate',
    explicitPath: settings.certFile,
    searchRoot: settings.certRoot,
    pattern: settings.certPattern,
  };
}

export function keyLookup(settings: EntrypointSettings): TlsLookup {
  return {
    role: 'key',
    explicitPath: settings.keyFile,
    searchRoot: settings.certRoot,
    pattern: settings.keyPattern,
  };
}
