/**
 * @fileoverview Progress recognition for build output.
 *
 * The rich console writes a status line such as
 * `<=====--------> 42% EXECUTING [3s]`; every console mode logs
 * `> Task :app:compileJava UP-TO-DATE` as tasks run and ends with
 * `BUILD SUCCESSFUL` or `BUILD FAILED`.
 *
 * @module build/progressParser
 */

import type { ProgressMarker, ProgressParser } from '../tasks/types';

// eslint-disable-next-line no-control-regex
const ANSI_ESCAPE = /\u001b\[[0-9;?]*[A-Za-z]/g;
const STATUS_LINE = /(\d{1,3})% (INITIALIZING|CONFIGURING|EXECUTING|WAITING)/;
const TASK_LINE = /^> Task (:\S*)(?: (.+))?$/;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

/**
 * Recognise one line of build output.
 */
export function parseBuildProgressLine(line: string): ProgressMarker | undefined {
  const text = stripAnsi(line).trim();
  if (text.length === 0) {
    return undefined;
  }

  const status = STATUS_LINE.exec(text);
  if (status) {
    const percent = Math.min(100, Number(status[1]));
    return {
      messageKey: 'build.progress.phase',
      args: [status[2].toLowerCase(), String(percent)],
      fraction: percent / 100,
    };
  }

  const task = TASK_LINE.exec(text);
  if (task) {
    return {
      messageKey: 'build.progress.task',
      args: task[2] ? [task[1], task[2].trim()] : [task[1]],
    };
  }

  if (text.startsWith('BUILD SUCCESSFUL')) {
    return { messageKey: 'build.progress.succeeded', args: [], fraction: 1 };
  }
  if (text.startsWith('BUILD FAILED')) {
    return { messageKey: 'build.progress.failed', args: [] };
  }
  return undefined;
}

export const buildProgressParser: ProgressParser = (line) => parseBuildProgressLine(line);
