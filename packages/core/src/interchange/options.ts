export interface DecodeOptions {
  /** Stamp used for created_at where the input carries none. Defaults to the current time. */
  now?: Date;
}

export interface EncodeOptions {
  /** Export time written into headers. Defaults to the current time. */
  now?: Date;
  /** Single-line output for the record format */
  compact?: boolean;
}
