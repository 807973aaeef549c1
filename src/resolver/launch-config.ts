/**
 * Launch configuration resolver
 * Runs once per container start; either returns a complete, frozen
 * configuration or throws a ConfigurationError
 */

import type { EntrypointSettings, LaunchConfig, ModuleProbe } from '../core/types.js';
import { resolveModuleReference } from './module-resolver.js';
import { certificateLookup, keyLookup, resolveTlsFile } from './tls-resolver.js';

export interface ResolverDeps {
  probe: ModuleProbe;
}

export async function resolveLaunchConfig(
  settings: EntrypointSettings,
  deps: ResolverDeps
): Promise<LaunchConfig> {
  const app = await resolveModuleReference(settings, deps.probe);
  const cert = await resolveTlsFile(certificateLookup(settings));
  const key = await resolveTlsFile(keyLookup(settings));

  return Object.freeze({
    moduleReference: app.reference,
    host: settings.host,
    port: settings.port,
    certPath: cert.path,
    keyPath: key.path,
    reloadEnabled: settings.reload,
    extraArgs: Object.freeze([...settings.extraArgs]),
  });
}
