/**
 * @module
 * Task-tree introspection for diagnostics.
 */

import type { Task } from './task';

/** One-line description: `Task#3 (running) transient: fetch users`. */
export function describeTask(task: Task<unknown>): string {
  const flags = task.transient ? ' transient' : '';
  const annotation = task.annotation === undefined ? '' : `: ${task.annotation}`;
  return `Task#${task.id} (${task.status})${flags}${annotation}`;
}

/**
 * Renders `task` and its unfinished descendants as an indented tree, one
 * task per line, two spaces per level.
 */
export function formatHierarchy(task: Task<unknown>): string {
  const lines: string[] = [];
  const visit = (node: Task<unknown>, depth: number): void => {
    lines.push(`${'  '.repeat(depth)}${describeTask(node)}`);
    for (const child of node.children) visit(child, depth + 1);
  };
  visit(task, 0);
  return lines.join('\n');
}
