/**
 * @fileoverview Committer identity and commit signing settings.
 *
 * @module git/identity
 */

export type SigningFormat = 'openpgp' | 'ssh' | 'x509' | 'unknown';

export interface SigningStatus {
  enabled: boolean;
  format: SigningFormat;
  signingKey?: string;
  program?: string;
}

export interface GitIdentity {
  userName?: string;
  userEmail?: string;
  signing: SigningStatus;
  /** First line of `git --version`. */
  version?: string;
}

/**
 * Interpret `commit.gpgsign`, `gpg.format`, `user.signingkey` and
 * `gpg.program`. Missing values are undefined.
 */
export function signingStatusFrom(
  gpgSign: string | undefined,
  gpgFormat: string | undefined,
  signingKey: string | undefined,
  program: string | undefined,
): SigningStatus {
  const enabled = ['true', 'always', 'yes', 'on', '1'].includes((gpgSign ?? '').trim().toLowerCase());
  const formatValue = (gpgFormat ?? 'openpgp').trim().toLowerCase();
  const format: SigningFormat = formatValue === 'openpgp' || formatValue === 'ssh' || formatValue === 'x509'
    ? formatValue
    : 'unknown';
  return {
    enabled,
    format,
    ...(signingKey?.trim() ? { signingKey: signingKey.trim() } : {}),
    ...(program?.trim() ? { program: program.trim() } : {}),
  };
}

/**
 * One-line summary such as `Enabled (ssh, key: ~/.ssh/id.pub)`.
 */
export function describeSigning(status: SigningStatus): string {
  if (!status.enabled) {
    return 'Disabled';
  }
  return `Enabled (${status.format}, key: ${status.signingKey ?? 'not set'})`;
}
