/**
 * @fileoverview Command-line arguments for a build task.
 *
 * @module build/buildArguments
 */

import type { BuildTaskDescriptor, ConsoleMode } from './types';

const CONSOLE_FLAGS: Record<ConsoleMode, string> = {
  rich: '--console=rich',
  plain: '--console=plain',
  quiet: '--quiet',
};

/**
 * Arguments for running a descriptor, task path first.
 *
 * ```
 * :app:run --args=x --offline --console=plain -Dfoo=bar -Dorg.gradle.debug=true -Dorg.gradle.debug.port=5005
 * ```
 *
 * @param debugPort - Port the build waits on for a debugger; required when
 * the descriptor asks for debugging
 */
export function buildArguments(descriptor: BuildTaskDescriptor, debugPort?: number): string[] {
  const args = [descriptor.taskPath, ...descriptor.additionalArgs];
  if (descriptor.offline) {
    args.push('--offline');
  }
  if (descriptor.refreshDependencies) {
    args.push('--refresh-dependencies');
  }
  args.push(CONSOLE_FLAGS[descriptor.consoleMode]);
  for (const [key, value] of Object.entries(descriptor.systemProperties)) {
    args.push(`-D${key}=${value}`);
  }
  if (descriptor.debug) {
    if (debugPort === undefined) {
      throw new RangeError(`A debug port is required to debug ${descriptor.taskPath}`);
    }
    args.push('-Dorg.gradle.debug=true', `-Dorg.gradle.debug.port=${debugPort}`);
  }
  return args;
}
