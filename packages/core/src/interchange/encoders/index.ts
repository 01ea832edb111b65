import type { Task } from '../../types/task.js';
import type { Format } from '../format-resolver.js';
import type { EncodeOptions } from '../options.js';
import { encodeRecords } from './record-encoder.js';
import { encodeTable } from './table-encoder.js';
import { encodeChecklist } from './checklist-encoder.js';
import { encodeDocument } from './document-encoder.js';
import { encodeText } from './text-encoder.js';

export { encodeRecords, encodeTable, encodeChecklist, encodeDocument, encodeText };

/** Encode a collection in the given format. Null only when the encoder refuses the input. */
export function encode(tasks: readonly Task[], format: Format, options: EncodeOptions = {}): string | null {
  switch (format) {
    case 'record': return encodeRecords(tasks, options);
    case 'table': return encodeTable(tasks);
    case 'checklist': return encodeChecklist(tasks, options);
    case 'document': return encodeDocument(tasks, options);
    case 'text': return encodeText(tasks, options);
  }
}
