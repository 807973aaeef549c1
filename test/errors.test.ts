/**
 * Tests for entrypoint error types
 */

import { describe, it, expect } from 'vitest';
import {
  CertificateAmbiguousError,
  ChildCrashError,
  ChildStartError,
  ConfigurationError,
  EXIT_CODES,
  ModuleResolutionError,
} from '../src/core/errors.js';

describe('Entrypoint Errors', () => {
  it('should give resolution errors the configuration exit code', () => {
    const err = new ModuleResolutionError('nothing found', { root: '/app' });

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err.exitCode).toBe(EXIT_CODES.CONFIGURATION);
    expect(err.name).toBe('ModuleResolutionError');
    expect(err.toJSON()).toEqual({
      name: 'ModuleResolutionError',
      code: 'MODULE_UNRESOLVED',
      message: 'nothing found',
      context: { root: '/app' },
    });
  });

  it('should copy ambiguous candidates into the context', () => {
    const err = new CertificateAmbiguousError('key', ['/certs/a-key.pem', '/certs/b-key.pem'], 'TLS_KEY_FILE');

    expect(err.context).toEqual({ role: 'key', candidates: ['/certs/a-key.pem', '/certs/b-key.pem'] });
    expect(err.message).toBe(
      'Ambiguous TLS key: 2 files match (/certs/a-key.pem, /certs/b-key.pem). Set TLS_KEY_FILE to choose one.'
    );
  });

  it('should map spawn errno values to shell exit codes', () => {
    const withCode = (code: string) => Object.assign(new Error(code), { code });

    expect(new ChildStartError('uvicorn', withCode('ENOENT')).exitCode).toBe(127);
    expect(new ChildStartError('uvicorn', withCode('EACCES')).exitCode).toBe(126);
    expect(new ChildStartError('uvicorn', withCode('EMFILE')).exitCode).toBe(1);
  });

  it('should carry the crashed child exit code', () => {
    const err = new ChildCrashError(3);

    expect(err.exitCode).toBe(3);
    expect(err.message).toBe('Server process exited with code 3');
  });
});
