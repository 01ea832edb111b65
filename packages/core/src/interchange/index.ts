export { FORMATS, DECODABLE_FORMATS, DEFAULT_FORMAT, parseFormatTag, resolveFormat, isDecodable } from './format-resolver.js';
export type { Format } from './format-resolver.js';
export type { DecodeOptions, EncodeOptions } from './options.js';
export { decode, decodeRecords, decodeTable, decodeText, decodeChecklist, TABLE_COLUMNS } from './decoders/index.js';
export { encode, encodeRecords, encodeTable, encodeChecklist, encodeDocument, encodeText } from './encoders/index.js';
export { validateRecords } from './validator.js';
export type { ValidationResult, ValidateOptions } from './validator.js';
export { MERGE_STRATEGIES, DEFAULT_MERGE_STRATEGY, isMergeStrategy, mergeTasks } from './merge.js';
export type { MergeStrategy } from './merge.js';
export { importTasks, exportTasks, importIntoCollection } from './transfer.js';
export type { ImportOptions, ExportOptions, MergeImportOptions, ImportOutcome } from './transfer.js';
