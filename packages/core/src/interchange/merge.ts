import type { Task } from '../types/task.js';

export const MERGE_STRATEGIES = ['append', 'replace', 'skip_duplicates'] as const;

export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const DEFAULT_MERGE_STRATEGY: MergeStrategy = 'append';

export function isMergeStrategy(value: unknown): value is MergeStrategy {
  return typeof value === 'string' && (MERGE_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Combine an incoming collection with an existing one.
 * - replace: the incoming collection alone
 * - append: existing followed by incoming; ids are left as they are
 * - skip_duplicates: existing, then each incoming task whose description
 *   (case-insensitive) is not yet in the result
 * Inputs are never mutated.
 */
export function mergeTasks(
  existing: readonly Task[],
  incoming: readonly Task[],
  strategy: MergeStrategy = DEFAULT_MERGE_STRATEGY,
): Task[] {
  switch (strategy) {
    case 'replace':
      return [...incoming];
    case 'append':
      return [...existing, ...incoming];
    case 'skip_duplicates': {
      const merged = [...existing];
      const seen = new Set(existing.map(t => t.description.toLowerCase()));
      for (const task of incoming) {
        const key = task.description.toLowerCase();
        if (seen.has(key)) continue;
        merged.push(task);
        seen.add(key);
      }
      return merged;
    }
  }
}
