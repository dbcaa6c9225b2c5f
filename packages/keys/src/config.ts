/**
 * @sshkit/keys - Configuration
 *
 * Package defaults read from the environment.
 *
 * - SSHKIT_LOG_LEVEL: pino level (default 'warn')
 * - SSHKIT_ECDSA_DIGEST: 'sha1' | 'curve' (default 'sha1')
 */

import type { LevelWithSilent } from 'pino';

/**
 * Digest used by ECDSA sign/verify.
 *
 * - 'sha1': SHA-1 for every curve (wire-compatible with peers that expect it)
 * - 'curve': SHA-256 / SHA-384 / SHA-512 matched to P-256 / P-384 / P-521
 */
export type DigestPolicy = 'sha1' | 'curve';

export type KeysConfig = {
  logLevel: LevelWithSilent;
  digest: DigestPolicy;
};

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const DIGEST_POLICIES: readonly DigestPolicy[] = ['sha1', 'curve'];

export const DEFAULT_CONFIG: KeysConfig = {
  logLevel: 'warn',
  digest: 'sha1',
};

function isLogLevel(value: string): value is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isDigestPolicy(value: string): value is DigestPolicy {
  return (DIGEST_POLICIES as readonly string[]).includes(value);
}

/**
 * Build the package configuration from environment variables.
 * Unrecognized values fall back to the defaults.
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KeysConfig {
  const logLevel = env.SSHKIT_LOG_LEVEL?.trim().toLowerCase() ?? '';
  const digest = env.SSHKIT_ECDSA_DIGEST?.trim().toLowerCase() ?? '';

  return {
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
    digest: isDigestPolicy(digest) ? digest : DEFAULT_CONFIG.digest,
  };
}

export const config: KeysConfig = loadConfig();
