/**
 * Editing of fixed-width flat files: typed field access by record type,
 * field name and selector, transaction appends that keep footer totals
 * consistent, and byte-exact re-serialisation.
 *
 * @example
 * ```ts
 * import { FileTransaction, add } from 'flatfile-edit';
 *
 * const tx = new FileTransaction('payments.dat');
 * const counter = await tx.commit((file) => add(file, { amount: '500.00', currency: 'USD' }).counter);
 * ```
 */

import Codec from './codec';
import type FixedWidthFile from './file';
import defaultSchema from './schema/default';
import type Schema from './schema';
import type { CodecOptions } from './types';

export * from './types';
export * from './errors';

export { default as Codec } from './codec';
export { default as FixedWidthFile } from './file';
export { default as FixedWidthRecord } from './record';
export { default as Schema } from './schema';
export type { ResolvedRecordType } from './schema';
export { default as defaultSchema, defaultDefinition, CURRENCIES } from './schema/default';
export { default as FileTransaction, nodeFileSystem } from './transaction';
export type { FileSystem, TransactionOptions } from './transaction';
export { get, set, resolve, encodeValue, decodeValue } from './field';
export { add, refreshAggregates } from './appender';
export type { AddResult, TransactionInput } from './appender';

export function decode(bytes: Buffer, schema: Schema = defaultSchema(), options?: CodecOptions): FixedWidthFile {
    return new Codec(schema, options).decode(bytes);
}

/** Serialises with the terminator convention the file was decoded with. */
export function encode(file: FixedWidthFile): Buffer {
    return new Codec(file.schema).encode(file);
}
