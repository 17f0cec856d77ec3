/**
 * Hierarchical execution identifiers.
 *
 * A child execution's id is its parent's id plus one more segment, joined
 * by EXECUTION_ID_INFIX ("E_01H.3.0" is a grandchild of "E_01H").
 */

import { generateColor } from './color';

export type ExecutionId = string;

export const EXECUTION_ID_INFIX = '.';

/** Parent id, or `undefined` for a root execution. */
export function parentExecutionId(executionId: ExecutionId): ExecutionId | undefined {
  const idx = executionId.lastIndexOf(EXECUTION_ID_INFIX);
  if (idx === -1) return undefined;
  return executionId.slice(0, idx);
}

/** One segment of an execution id together with the id it ends. */
export interface ExecutionIdSegment {
  segment: string;
  executionId: ExecutionId;
}

/**
 * Split an id into cumulative prefixes, root first:
 * `"E_1.2.0"` → `[("E_1", "E_1"), ("2", "E_1.2"), ("0", "E_1.2.0")]`.
 */
export function executionIdHierarchy(executionId: ExecutionId): ExecutionIdSegment[] {
  const result: ExecutionIdSegment[] = [];
  let prefix = '';
  for (const segment of executionId.split(EXECUTION_ID_INFIX)) {
    prefix = prefix === '' ? segment : `${prefix}${EXECUTION_ID_INFIX}${segment}`;
    result.push({ segment, executionId: prefix });
  }
  return result;
}

export function lastExecutionIdSegment(executionId: ExecutionId): string {
  const hierarchy = executionIdHierarchy(executionId);
  return hierarchy[hierarchy.length - 1].segment;
}

/**
 * Child id relative to its parent ("E_1.2" under "E_1" is "2"). Falls back
 * to the full child id when it is not nested under `parentId`.
 */
export function childExecutionSuffix(parentId: ExecutionId, childId: ExecutionId): string {
  const prefix = `${parentId}${EXECUTION_ID_INFIX}`;
  return childId.startsWith(prefix) ? childId.slice(prefix.length) : childId;
}

export function executionIdColor(executionId: ExecutionId): string {
  return generateColor(executionId);
}
