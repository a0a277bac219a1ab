/**
 * @fileoverview Parsing of `git remote -v` output.
 *
 * @module git/remoteParser
 */

export type RemoteProtocol = 'https' | 'ssh' | 'git' | 'file' | 'unknown';

export interface GitRemote {
  name: string;
  fetchUrl: string;
  pushUrl: string;
  protocol: RemoteProtocol;
}

export interface GitUpstream {
  remote: string;
  branch: string;
}

export function protocolOf(url: string): RemoteProtocol {
  if (url.startsWith('https://') || url.startsWith('http://')) {
    return 'https';
  }
  if (url.startsWith('ssh://') || url.includes('@')) {
    return 'ssh';
  }
  if (url.startsWith('git://')) {
    return 'git';
  }
  if (url.startsWith('file://') || url.startsWith('/')) {
    return 'file';
  }
  return 'unknown';
}

/**
 * Pair each `(fetch)` line with the `(push)` line that follows it.
 *
 * ```
 * origin  git@example.com:team/app.git (fetch)
 * origin  git@example.com:team/app.git (push)
 * ```
 *
 * A remote without a push line pushes to its fetch URL.
 */
export function parseRemotes(lines: readonly string[]): GitRemote[] {
  const remotes: GitRemote[] = [];
  for (let i = 0; i < lines.length; i++) {
    const parts = lines[i].trim().split(/\s+/);
    if (parts.length < 2) {
      continue;
    }
    const [name, fetchUrl] = parts;
    let pushUrl = fetchUrl;
    const next = lines[i + 1];
    if (next !== undefined && next.trim().endsWith('(push)')) {
      const pushParts = next.trim().split(/\s+/);
      if (pushParts.length >= 2) {
        pushUrl = pushParts[1];
      }
      i++;
    }
    remotes.push({ name, fetchUrl, pushUrl, protocol: protocolOf(fetchUrl) });
  }
  return remotes;
}

/**
 * Split `origin/feature/x` into remote and branch. A ref without a slash
 * is taken as a branch of `origin`.
 */
export function parseUpstream(ref: string): GitUpstream | undefined {
  const trimmed = ref.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  const slash = trimmed.indexOf('/');
  if (slash < 0) {
    return { remote: 'origin', branch: trimmed };
  }
  return { remote: trimmed.slice(0, slash), branch: trimmed.slice(slash + 1) };
}
