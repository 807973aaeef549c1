/**
 * Tests for TLS material resolution
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import {
  resolveTlsFile,
  findTlsCandidates,
  verifyTlsFile,
  type TlsLookup,
} from '../src/resolver/tls-resolver.js';
import {
  CertificateAmbiguousError,
  CertificateInvalidError,
  CertificateMissingError,
} from '../src/core/errors.js';
import { createTempTree, removeTempTrees, PEM_CERT, PEM_KEY } from './setup.js';

function certLookup(searchRoot: string, explicitPath?: string): TlsLookup {
  return { role: 'certificate', explicitPath, searchRoot, pattern: '*-cert.pem' };
}

function keyLookup(searchRoot: string, explicitPath?: string): TlsLookup {
  return { role: 'key', explicitPath, searchRoot, pattern: '*-key.pem' };
}

describe('TLS Resolution', () => {
  afterEach(async () => {
    await removeTempTrees();
  });

  describe('search', () => {
    it('should resolve a single certificate and key', async () => {
      const root = await createTempTree({ 'auth-cert.pem': PEM_CERT, 'auth-key.pem': PEM_KEY });

      expect(await resolveTlsFile(certLookup(root))).toEqual({
        path: path.join(root, 'auth-cert.pem'),
        source: 'search',
      });
      expect(await resolveTlsFile(keyLookup(root))).toEqual({
        path: path.join(root, 'auth-key.pem'),
        source: 'search',
      });
    });

    it('should search nested directories', async () => {
      const root = await createTempTree({ 'auth/tls/auth-cert.pem': PEM_CERT });

      const result = await resolveTlsFile(certLookup(root));

      expect(result.path).toBe(path.join(root, 'auth', 'tls', 'auth-cert.pem'));
    });

    it('should skip dot-directories such as secret volume internals', async () => {
      const root = await createTempTree({ '..data/auth-cert.pem': PEM_CERT, 'auth-cert.pem': PEM_CERT });

      expect(await findTlsCandidates(root, '*-cert.pem')).toEqual([path.join(root, 'auth-cert.pem')]);
    });

    it('should fail with CertificateMissingError when nothing matches', async () => {
      const root = await createTempTree({ 'auth-key.pem': PEM_KEY });

      const pending = resolveTlsFile(certLookup(root));

      await expect(pending).rejects.toBeInstanceOf(CertificateMissingError);
      await expect(pending).rejects.toThrow(`nothing matching "*-cert.pem" under ${root}`);
    });

    it('should fail with CertificateAmbiguousError listing every match', async () => {
      const root = await createTempTree({ 'auth-cert.pem': PEM_CERT, 'backup-cert.pem': PEM_CERT });

      const err = await resolveTlsFile(certLookup(root)).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CertificateAmbiguousError);
      if (!(err instanceof CertificateAmbiguousError)) return;
      expect(err.candidates).toEqual([path.join(root, 'auth-cert.pem'), path.join(root, 'backup-cert.pem')]);
      expect(err.message).toContain('auth-cert.pem');
      expect(err.message).toContain('backup-cert.pem');
      expect(err.message).toContain('Set TLS_CERT_FILE');
    });

    it('should name the key override for ambiguous keys', async () => {
      const root = await createTempTree({ 'a-key.pem': PEM_KEY, 'b/b-key.pem': PEM_KEY });

      await expect(resolveTlsFile(keyLookup(root))).rejects.toThrow('Set TLS_KEY_FILE');
    });
  });

  describe('explicit paths', () => {
    it('should take precedence over an ambiguous search', async () => {
      const root = await createTempTree({
        'auth-cert.pem': PEM_CERT,
        'backup-cert.pem': PEM_CERT,
        'override/server.crt': PEM_CERT,
      });
      const explicit = path.join(root, 'override', 'server.crt');

      expect(await resolveTlsFile(certLookup(root, explicit))).toEqual({ path: explicit, source: 'explicit' });
    });

    it('should reject an explicit path that does not exist', async () => {
      const root = await createTempTree({ 'auth-key.pem': PEM_KEY });
      const missing = path.join(root, 'missing-key.pem');

      const pending = resolveTlsFile(keyLookup(root, missing));

      await expect(pending).rejects.toBeInstanceOf(CertificateInvalidError);
      await expect(pending).rejects.toThrow(`TLS key at ${missing} is unusable: file does not exist`);
    });
  });

  describe('verifyTlsFile', () => {
    it('should accept a readable regular file', async () => {
      const root = await createTempTree({ 'auth-cert.pem': PEM_CERT });

      await expect(verifyTlsFile('certificate', path.join(root, 'auth-cert.pem'))).resolves.toBeUndefined();
    });

    it('should reject a directory', async () => {
      const root = await createTempTree({ 'certs/auth-cert.pem': PEM_CERT });

      await expect(verifyTlsFile('certificate', path.join(root, 'certs'))).rejects.toThrow('not a regular file');
    });
  });
});
