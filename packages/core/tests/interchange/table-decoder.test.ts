import { describe, it, expect } from 'vitest';
import { decodeTable } from '../../src/interchange/decoders/table-decoder.js';
import { NOW, STAMP } from './fixtures.js';
const HEADER = 'id,task,priority,completed,created_at';

describe('decodeTable', () => {
  it('reads rows in file order', () => {
    const text = [
      HEADER,
      '1,Buy milk,high,True,2026-01-02T10:00:00',
      'x7,"Call bank, urgently",low,no,',
    ].join('\n');

    expect(decodeTable(text, { now: NOW })).toEqual([
      { id: 1, task: 'Buy milk', priority: 'high', completed: true, created_at: '2026-01-02T10:00:00' },
      { id: 0, task: 'Call bank, urgently', priority: 'low', completed: false, created_at: '' },
    ]);
  });

  it('accepts true, 1 and yes in any case as completed', () => {
    const text = [HEADER, '1,a,low,YES,', '2,b,low,1,', '3,c,low,TRUE,', '4,d,low,done,'].join('\n');
    expect(decodeTable(text, { now: NOW })?.map(r => r.completed)).toEqual([true, true, true, false]);
  });

  it('keeps priority cells verbatim for the validator to judge', () => {
    const text = [HEADER, '1,a,urgent,false,'].join('\n');
    expect(decodeTable(text, { now: NOW })?.[0]?.priority).toBe('urgent');
  });

  it('defaults absent columns', () => {
    expect(decodeTable('task\nWrite report\n', { now: NOW })).toEqual([
      { id: 0, task: 'Write report', priority: 'medium', completed: false, created_at: STAMP },
    ]);
  });

  it('defaults cells missing from a short row', () => {
    const text = [HEADER, '3,Short'].join('\n');
    expect(decodeTable(text, { now: NOW })).toEqual([
      { id: 3, task: 'Short', priority: 'medium', completed: false, created_at: STAMP },
    ]);
  });

  it('locates columns by header name', () => {
    const text = 'task,id\nReorder,12\n';
    expect(decodeTable(text, { now: NOW })?.[0]).toMatchObject({ id: 12, task: 'Reorder' });
  });

  it('fails on a header without rows', () => {
    expect(decodeTable(`${HEADER}\n`)).toBeNull();
  });

  it('fails on empty input', () => {
    expect(decodeTable('')).toBeNull();
  });
});
