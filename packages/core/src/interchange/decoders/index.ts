import type { CandidateRecord } from '../../types/task.js';
import type { Format } from '../format-resolver.js';
import type { DecodeOptions } from '../options.js';
import { decodeRecords } from './record-decoder.js';
import { decodeTable } from './table-decoder.js';
import { decodeText } from './text-decoder.js';
import { decodeChecklist } from './checklist-decoder.js';

export { decodeRecords, decodeTable, decodeText, decodeChecklist };
export { TABLE_COLUMNS } from './table-decoder.js';

/** Decode text in the given format. The document format cannot be decoded and yields null. */
export function decode(text: string, format: Format, options: DecodeOptions = {}): CandidateRecord[] | null {
  switch (format) {
    case 'record': return decodeRecords(text);
    case 'table': return decodeTable(text, options);
    case 'text': return decodeText(text, options);
    case 'checklist': return decodeChecklist(text, options);
    case 'document': return null;
  }
}
