import type { CandidateRecord } from '../../types/task.js';
import { isRecordShaped } from '../../types/task.js';

/**
 * Decode a JSON document. A top-level array is taken as-is; an object must
 * carry its records under `tasks` or, failing that, `task_list`.
 * Returns null for malformed JSON or any other shape.
 */
export function decodeRecords(text: string): CandidateRecord[] | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }

  if (Array.isArray(data)) return data;
  if (!isRecordShaped(data)) return null;

  if (Array.isArray(data['tasks'])) return data['tasks'];
  if (Array.isArray(data['task_list'])) return data['task_list'];
  return null;
}
