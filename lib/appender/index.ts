// Transaction appender

import _ from 'lodash';
import { SchemaMismatchError } from '../errors';
import { encodeValue } from '../field';
import type FixedWidthFile from '../file';
import FixedWidthRecord from '../record';
import type Schema from '../schema';
import type { AggregateSpec, FieldValue } from '../types';
import { formatScaled, scaleOf } from '../utils';

export interface TransactionInput {
    amount: FieldValue,
    currency: string,
    /** Further fields of the new record, by name. */
    fields?: { [name: string]: FieldValue },
}

export interface AddResult {
    file: FixedWidthFile,
    record: FixedWidthRecord,
    counter: FieldValue,
}

interface PendingWrite {
    record: FixedWidthRecord,
    offset: number,
    bytes: Buffer,
}

function transactionLayout(schema: Schema) {
    const tag = schema.roles.transaction;
    const settings = schema.transaction;
    if (!tag || !settings) {
        throw new SchemaMismatchError('Schema defines no transaction record type');
    }
    return { type: schema.recordType(tag), settings };
}

function aggregateValue(aggregate: AggregateSpec, records: FixedWidthRecord[]): FieldValue {
    const sources = records.filter((record) => record.tag === aggregate.source);
    if (aggregate.kind === 'count' || !aggregate.sourceField) {
        return sources.length;
    }
    const sourceField = aggregate.sourceField;
    const total = sources.reduce((sum, record) => sum + record.units(sourceField), 0n);
    const field = sources.length > 0 ? sources[0].field(sourceField) : undefined;
    return formatScaled(total, field ? scaleOf(field) : 0);
}

// encodes every aggregate without writing; `apply` does the writes
function planAggregates(file: FixedWidthFile, records: FixedWidthRecord[]): PendingWrite[] {
    return _.flatMap(file.schema.aggregates, (aggregate) => {
        const value = aggregateValue(aggregate, records);
        return records
            .filter((record) => record.tag === aggregate.recordType)
            .map((record) => {
                const field = record.field(aggregate.field);
                const scaled = field.type === 'numeric' && typeof value === 'string'
                    ? value.replace('.', '')
                    : value;
                return { record, offset: field.offset, bytes: encodeValue(field, scaled, file.encoding) };
            });
    });
}

function apply(writes: PendingWrite[]): void {
    for (const { record, offset, bytes } of writes) {
        bytes.copy(record.raw, offset);
    }
}

export function refreshAggregates(file: FixedWidthFile): FixedWidthFile {
    apply(planAggregates(file, file.records));
    return file;
}

// Counter is one past the highest existing one; the record goes before the first footer.
export function add(file: FixedWidthFile, input: TransactionInput): AddResult {
    const { schema } = file;
    const { type, settings } = transactionLayout(schema);

    const existing = file.recordsOf(type.tag);
    const counter = existing.length > 0
        ? existing.reduce((max, record) => {
            const value = record.units(settings.counterField);
            return value > max ? value : max;
        }, 0n) + 1n
        : BigInt(settings.initialCounter ?? 1);

    const record = FixedWidthRecord.blank(type, file.encoding);
    _.forEach(input.fields, (value, name) => record.set(name, value));
    record.set(settings.counterField, counter.toString());
    record.set(settings.amountField, input.amount);
    record.set(settings.currencyField, input.currency);

    const position = file.insertionPoint(schema.roles.footer);
    const records = [...file.records];
    records.splice(position, 0, record);

    const writes = planAggregates(file, records);
    file.insert(record, position);
    apply(writes);

    return { file, record, counter: record.get(settings.counterField) };
}
