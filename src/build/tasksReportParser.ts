/**
 * @fileoverview Parsing of the `tasks --all` report.
 *
 * The report lists tasks under group headings underlined with dashes:
 *
 * ```
 * Tasks runnable from root project 'demo'
 * ------------------------------------------------------------
 *
 * Build tasks
 * -----------
 * assemble - Assembles the outputs of this project.
 * app:jar - Assembles a jar archive containing the classes of the 'main' feature.
 * ```
 *
 * A `sub:task` entry belongs to project `:sub`. The `Rules` section lists
 * patterns rather than tasks and is skipped.
 *
 * @module build/tasksReportParser
 */

import type { BuildProjectModel, BuildTaskModel } from './types';

const ROOT_PROJECT_PATH = ':';
const HEADING_RULE = /^-{3,}$/;
const ROOT_HEADER = /^(?:All )?[Tt]asks runnable from (?:root )?project '([^']*)'/;
const TASK_LINE = /^([A-Za-z0-9_.\-:]+)(?: - (.*))?$/;
const GROUP_SUFFIX = / tasks$/;
const SKIPPED_GROUPS = new Set(['Rules']);

interface ProjectDraft {
  path: string;
  name: string;
  tasks: BuildTaskModel[];
}

/**
 * Split `sub:nested:compileJava` into project path and task name.
 */
export function splitTaskEntry(entry: string): { projectPath: string; name: string } {
  const trimmed = entry.replace(/^:/, '');
  const colon = trimmed.lastIndexOf(':');
  if (colon < 0) {
    return { projectPath: ROOT_PROJECT_PATH, name: trimmed };
  }
  return { projectPath: `:${trimmed.slice(0, colon)}`, name: trimmed.slice(colon + 1) };
}

function taskPath(projectPath: string, name: string): string {
  return projectPath === ROOT_PROJECT_PATH ? `:${name}` : `${projectPath}:${name}`;
}

/**
 * Parse the report into projects, root project first.
 *
 * @param lines - Output lines of `tasks --all --console=plain`
 * @param rootName - Name used when the report carries no root header
 */
export function parseTasksReport(lines: readonly string[], rootName = 'root'): BuildProjectModel[] {
  const projects = new Map<string, ProjectDraft>();
  const projectFor = (path: string): ProjectDraft => {
    let project = projects.get(path);
    if (!project) {
      project = { path, name: path === ROOT_PROJECT_PATH ? rootName : path.slice(path.lastIndexOf(':') + 1), tasks: [] };
      projects.set(path, project);
    }
    return project;
  };
  const root = projectFor(ROOT_PROJECT_PATH);

  let group: string | undefined;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trimEnd();
    const header = ROOT_HEADER.exec(line);
    if (header) {
      root.name = header[1] || rootName;
      group = undefined;
      continue;
    }
    const next = i + 1 < lines.length ? lines[i + 1].trim() : '';
    if (line.length > 0 && HEADING_RULE.test(next) && !HEADING_RULE.test(line)) {
      const heading = line.trim();
      group = SKIPPED_GROUPS.has(heading) ? undefined : heading.replace(GROUP_SUFFIX, '');
      i++;
      continue;
    }
    if (line.trim().length === 0) {
      group = undefined;
      continue;
    }
    if (!group) {
      continue;
    }
    const match = TASK_LINE.exec(line.trim());
    if (!match) {
      continue;
    }
    const { projectPath, name } = splitTaskEntry(match[1]);
    projectFor(projectPath).tasks.push(Object.freeze({
      path: taskPath(projectPath, name),
      name,
      group,
      description: (match[2] ?? '').trim(),
    }));
  }

  return [...projects.values()].map(project => Object.freeze({
    path: project.path,
    name: project.name,
    tasks: Object.freeze(project.tasks),
  }));
}

/**
 * Read the version from `--version` output (`Gradle 8.5`).
 */
export function parseGradleVersion(lines: readonly string[]): string | undefined {
  for (const line of lines) {
    const match = /^Gradle (\S+)/.exec(line.trim());
    if (match) {
      return match[1];
    }
  }
  return undefined;
}
