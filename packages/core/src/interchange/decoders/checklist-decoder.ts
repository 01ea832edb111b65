/**
 * Decodes heading-grouped checklists such as the checklist encoder writes:
 *
 *   ## High Priority
 *   - [ ] **Ship release** _2026-03-01_
 *   ## Low Priority
 *   - [x] Tidy desk
 *
 * `##` headings switch the priority applied to the items below them; items
 * whose description is empty after cleanup are dropped.
 */

import type { TaskRecord } from '../../types/task.js';
import type { Priority } from '../../types/priority.js';
import { DEFAULT_PRIORITY } from '../../types/priority.js';
import { formatTimestamp } from '../../parsers/timestamp-parser.js';
import type { DecodeOptions } from '../options.js';

const EMPHASIS_MARKERS = ['**', '*', '__', '_'];
// Checked in this order; the first one present ends the description
const TRAILER_DELIMITERS = [' (', ' [', ' _'];

type ChecklistLine =
  | { readonly kind: 'heading'; readonly title: string }
  | { readonly kind: 'item'; readonly completed: boolean; readonly text: string }
  | { readonly kind: 'other' };

interface ChecklistParserState {
  readonly priority: Priority;
  readonly nextId: number;
  readonly records: readonly TaskRecord[];
}

function classifyLine(raw: string): ChecklistLine {
  const line = raw.trim();
  if (line.startsWith('##')) {
    return { kind: 'heading', title: line.replace(/^#+/, '').trim().toLowerCase() };
  }
  if (line.startsWith('- [')) {
    const mark = line[3];
    return { kind: 'item', completed: mark === 'x' || mark === 'X', text: line.slice(6) };
  }
  return { kind: 'other' };
}

/** Priority context after a heading; headings naming no priority keep the current one */
function headingPriority(title: string, current: Priority): Priority {
  if (title.includes('high')) return 'high';
  if (title.includes('low')) return 'low';
  if (title.includes('medium')) return 'medium';
  return current;
}

function cleanItemText(text: string): string {
  let cleaned = text.trim();
  for (const marker of EMPHASIS_MARKERS) {
    cleaned = cleaned.replaceAll(marker, '');
  }

  for (const delimiter of TRAILER_DELIMITERS) {
    const at = cleaned.indexOf(delimiter);
    if (at !== -1) {
      cleaned = cleaned.slice(0, at);
      break;
    }
  }
  return cleaned.trim();
}

function step(state: ChecklistParserState, line: ChecklistLine, stamp: string): ChecklistParserState {
  switch (line.kind) {
    case 'heading':
      return { ...state, priority: headingPriority(line.title, state.priority) };
    case 'item': {
      const description = cleanItemText(line.text);
      if (!description) return state;
      return {
        ...state,
        nextId: state.nextId + 1,
        records: [...state.records, {
          id: state.nextId,
          task: description,
          priority: state.priority,
          completed: line.completed,
          created_at: stamp,
        }],
      };
    }
    case 'other':
      return state;
  }
}

/** Decode checklist items with sequential ids. Returns null when no item survives. */
export function decodeChecklist(text: string, options: DecodeOptions = {}): TaskRecord[] | null {
  const stamp = formatTimestamp(options.now ?? new Date());

  let state: ChecklistParserState = { priority: DEFAULT_PRIORITY, nextId: 1, records: [] };
  for (const raw of text.split(/\r\n|\r|\n/)) {
    state = step(state, classifyLine(raw), stamp);
  }

  return state.records.length > 0 ? [...state.records] : null;
}
