
export type FieldType = 'alphanumeric' | 'numeric' | 'decimal';

export type Justify = 'left' | 'right';

interface BaseField {
  name: string,
  offset: number,
  width: number,
  justify?: Justify,
  paddingChar?: string,
  allowedValues?: string[],
}

export interface AlphanumericField extends BaseField {
  type: 'alphanumeric',
}

export interface NumericField extends BaseField {
  type: 'numeric',
}

export interface DecimalField extends BaseField {
  type: 'decimal',
  /** Digits after the decimal point. Defaults to 2. */
  scale?: number,
  /** When true (the default) the point is not stored: `500.00` is written as `50000`. */
  impliedDecimal?: boolean,
}

export type FieldSpec = AlphanumericField | NumericField | DecimalField;

/** Bytes that carry the record tag when they are not also a named field. */
export interface TagRange {
  offset: number,
  width: number,
}

export interface RecordTypeSpec {
  /** Name the record type is addressed by, e.g. `TRANSACTION`. */
  tag: string,
  /** Bytes written in the tag field. Defaults to `tag`. */
  tagValue?: string,
  width: number,
  /** Name of one of `fields`, or a bare byte range. */
  tagField: string | TagRange,
  fields: FieldSpec[],
  /** Field a bare selector value is compared against. */
  selectorField?: string,
}

export interface RoleMap {
  header?: string,
  transaction?: string,
  footer?: string,
}

export interface TransactionSettings {
  counterField: string,
  amountField: string,
  currencyField: string,
  initialCounter?: number,
}

export interface AggregateSpec {
  recordType: string,
  field: string,
  kind: 'count' | 'sum',
  source: string,
  sourceField?: string,
}

export interface SchemaDefinition {
  recordTypes: RecordTypeSpec[],
  roles?: RoleMap,
  transaction?: TransactionSettings,
  aggregates?: AggregateSpec[],
}

export type FieldValue = string | number;

export type Selector = string | number | { field: string, value: FieldValue };

// Encodings that write ASCII as one byte per character, as tags and padding are.
export type TextEncoding = 'utf8' | 'latin1' | 'ascii';

export interface CodecOptions {
  lineTerminator?: '\n' | '\r\n',
  encoding?: TextEncoding,
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}
