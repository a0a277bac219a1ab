/**
 * @fileoverview Progress recognition for git network commands.
 *
 * Git reports progress on stderr with lines such as
 *
 * ```
 * remote: Counting objects: 100% (12/12), done.
 * Receiving objects:  42% (1234/5678), 1.23 MiB | 4.56 MiB/s
 * Resolving deltas:  90% (111/123)
 * ```
 *
 * Each line becomes a percentage, a phase, or a plain message. Percentages
 * of known phases are weighted into one overall fraction per operation.
 *
 * @module git/progressParser
 */

import type { ProgressMarker, ProgressParser } from '../tasks/types';

export type GitProgressEvent =
  | { kind: 'message'; text: string }
  | { kind: 'phase'; phase: string }
  | { kind: 'percentage'; phase: string; percent: number };

export type GitNetworkOperation = 'fetch' | 'pull' | 'push';

interface PhaseWeight {
  phase: string;
  weight: number;
}

const TRANSFER_IN: readonly PhaseWeight[] = [
  { phase: 'Counting objects', weight: 0.1 },
  { phase: 'Compressing objects', weight: 0.1 },
  { phase: 'Receiving objects', weight: 0.6 },
  { phase: 'Resolving deltas', weight: 0.2 },
];

const TRANSFER_OUT: readonly PhaseWeight[] = [
  { phase: 'Enumerating objects', weight: 0.05 },
  { phase: 'Counting objects', weight: 0.05 },
  { phase: 'Compressing objects', weight: 0.2 },
  { phase: 'Writing objects', weight: 0.7 },
];

export const PHASE_WEIGHTS: Readonly<Record<GitNetworkOperation, readonly PhaseWeight[]>> = {
  fetch: TRANSFER_IN,
  pull: TRANSFER_IN,
  push: TRANSFER_OUT,
};

const PERCENT_LINE = /^([A-Za-z ][A-Za-z ]+?):\s*(\d{1,3})%/;
const PHASE_PREFIX = /^([A-Za-z ][A-Za-z ]+?):/;
const REMOTE_PREFIX = /^remote:\s*(.*)$/;
const MESSAGE_PREFIXES = ['From ', '* ', '+ ', '= ', 'To '];

function normalizePhase(phase: string): string {
  const normalized = phase.trim().replace(/\s+/g, ' ');
  return normalized || '(unknown)';
}

/**
 * Classify one line of git output.
 *
 * @returns undefined for blank lines
 */
export function parseGitProgressLine(line: string): GitProgressEvent | undefined {
  const normalized = line.trim();
  if (normalized.length === 0) {
    return undefined;
  }
  if (MESSAGE_PREFIXES.some(prefix => normalized.startsWith(prefix))) {
    return { kind: 'message', text: normalized };
  }

  const remote = REMOTE_PREFIX.exec(normalized);
  if (remote) {
    const message = remote[1].trim();
    const nested = message.length > 0 ? parseGitProgressLine(message) : undefined;
    return nested ?? { kind: 'message', text: message };
  }

  const percent = PERCENT_LINE.exec(normalized);
  if (percent) {
    return {
      kind: 'percentage',
      phase: normalizePhase(percent[1]),
      percent: Math.min(100, Math.max(0, Number(percent[2]))),
    };
  }

  const phase = PHASE_PREFIX.exec(normalized);
  if (phase) {
    return { kind: 'phase', phase: normalizePhase(phase[1]) };
  }
  return { kind: 'message', text: normalized };
}

/**
 * Overall fraction for a phase at the given percentage, or undefined when
 * the phase does not belong to the operation.
 */
export function overallFraction(operation: GitNetworkOperation, phase: string, percent: number): number | undefined {
  const weights = PHASE_WEIGHTS[operation];
  const index = weights.findIndex(entry => entry.phase === phase);
  if (index < 0) {
    return undefined;
  }
  const done = weights.slice(0, index).reduce((sum, entry) => sum + entry.weight, 0);
  const total = weights.reduce((sum, entry) => sum + entry.weight, 0);
  return (done + weights[index].weight * (percent / 100)) / total;
}

function toMarker(operation: GitNetworkOperation, event: GitProgressEvent): ProgressMarker {
  switch (event.kind) {
    case 'percentage': {
      const fraction = overallFraction(operation, event.phase, event.percent);
      return {
        messageKey: 'git.progress.percentage',
        args: [event.phase, String(event.percent)],
        ...(fraction !== undefined ? { fraction } : {}),
      };
    }
    case 'phase': {
      const fraction = overallFraction(operation, event.phase, 0);
      return {
        messageKey: 'git.progress.phase',
        args: [event.phase],
        ...(fraction !== undefined ? { fraction } : {}),
      };
    }
    case 'message':
      return { messageKey: 'git.progress.message', args: [event.text] };
  }
}

/**
 * Progress parser for a fetch, pull or push task.
 */
export function createGitProgressParser(operation: GitNetworkOperation): ProgressParser {
  return (line) => {
    const event = parseGitProgressLine(line);
    return event ? toMarker(operation, event) : undefined;
  };
}
