import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
    InvalidValueError,
    Schema,
    SchemaMismatchError,
    ValueTooLongError,
    add,
    decode,
    defaultDefinition,
    encode,
    get,
    refreshAggregates,
    set,
} from '../lib';
import { footerLine, headerLine, sampleLines, text, transactionLine } from './helpers';

describe('add', () => {
    it('inserts the next transaction before the footer and updates the totals', () => {
        const file = decode(text(sampleLines()));
        const result = add(file, { amount: '500.00', currency: 'GBP' });

        expect(result.counter).toBe(3);
        expect(encode(file).toString()).toBe(text([
            headerLine(),
            transactionLine(1, 10000, 'USD'),
            transactionLine(2, 2550, 'EUR'),
            transactionLine(3, 50000, 'GBP'),
            footerLine(3, 62550),
        ]).toString());
        expect(get(file, 'FOOTER', 'total_count')).toBe(3);
        expect(get(file, 'FOOTER', 'control_sum')).toBe('625.50');
    });

    it('continues from the highest counter, not the last one', () => {
        const file = decode(text([headerLine(), transactionLine(7, 100), transactionLine(4, 100), footerLine(2, 200)]));
        expect(add(file, { amount: 1, currency: 'USD' }).counter).toBe(8);
    });

    it('starts at 1 when there are no transactions', () => {
        const file = decode(text([headerLine(), footerLine(0, 0)]));
        const { counter } = add(file, { amount: '12.34', currency: 'USD' });
        expect(counter).toBe(1);
        expect(file.records.map((record) => record.tag)).toEqual(['HEADER', 'TRANSACTION', 'FOOTER']);
        expect(get(file, 'FOOTER', 'control_sum')).toBe('12.34');
    });

    it('starts at the configured initial counter', () => {
        const definition = defaultDefinition();
        definition.transaction = { counterField: 'counter', amountField: 'amount', currencyField: 'currency', initialCounter: 100 };
        const file = decode(text([headerLine(), footerLine(0, 0)]), new Schema(definition));
        expect(add(file, { amount: '1', currency: 'EUR' }).counter).toBe(100);
    });

    it('appends at the end when there is no footer', () => {
        const file = decode(text([headerLine(), transactionLine(1, 10000)]));
        add(file, { amount: '0.50', currency: 'EUR' });
        expect(file.records[2].raw.toString()).toBe(transactionLine(2, 50, 'EUR'));
    });

    it('writes extra fields of the new record', () => {
        const file = decode(text(sampleLines()));
        add(file, { amount: '1.00', currency: 'USD', fields: { reserved: 'note' } });
        expect(get(file, 'TRANSACTION', 'reserved', 3)).toBe('note');
    });

    describe('failures leave the file unchanged', () => {
        it('on an invalid currency', () => {
            const bytes = text(sampleLines());
            const file = decode(bytes);
            expect(() => add(file, { amount: '1.00', currency: 'JPY' })).toThrow(InvalidValueError);
            expect(encode(file).equals(bytes)).toBe(true);
        });

        it('on extra fields that would overwrite the tag', () => {
            const bytes = text(sampleLines());
            const file = decode(bytes);
            expect(() => add(file, { amount: '1.00', currency: 'USD', fields: { field_id: '03' } }))
                .toThrow("Invalid value for 'field_id': it holds the 'TRANSACTION' record tag");
            expect(encode(file).equals(bytes)).toBe(true);
        });

        it('on an amount too wide for its field', () => {
            const bytes = text(sampleLines());
            const file = decode(bytes);
            expect(() => add(file, { amount: '10000000000.00', currency: 'USD' })).toThrow(ValueTooLongError);
            expect(encode(file).equals(bytes)).toBe(true);
        });

        it('on a total too wide for the footer', () => {
            const bytes = text(sampleLines());
            const file = decode(bytes);
            expect(() => add(file, { amount: '9999999999.99', currency: 'USD' }))
                .toThrow("Value for 'control_sum' needs 13 bytes but the field is 12 wide");
            expect(file.records).toHaveLength(4);
            expect(encode(file).equals(bytes)).toBe(true);
        });
    });

    it('needs a schema with a transaction record type', () => {
        const schema = new Schema({
            recordTypes: [{ tag: 'A', width: 4, tagField: { offset: 0, width: 1 }, fields: [] }],
        });
        const file = decode(Buffer.from('A   \n'), schema);
        expect(() => add(file, { amount: '1.00', currency: 'USD' })).toThrow(SchemaMismatchError);
        expect(() => add(file, { amount: '1.00', currency: 'USD' })).toThrow('Schema defines no transaction record type');
    });

    it('works with a layout of other widths and no footer', () => {
        const schema = Schema.fromJSON(readFileSync(join(__dirname, 'fixtures/small-layout.json'), 'utf8'));
        const header = 'HD' + ' '.repeat(8) + '42 Elm Street'.padEnd(20) + ' '.repeat(10);
        const file = decode(text([header, '0000001250USD000003T']), schema);

        expect(add(file, { amount: '7.25', currency: 'EUR' }).counter).toBe(4);
        expect(encode(file).toString()).toBe(`${header}\n0000001250USD000003T\n0000000725EUR000004T\n`);
    });
});

describe('refreshAggregates', () => {
    it('recomputes counts and sums from the records', () => {
        const file = decode(text(sampleLines()));
        set(file, 'TRANSACTION', 'amount', '1.00', 1);
        refreshAggregates(file);
        expect(get(file, 'FOOTER', 'total_count')).toBe(2);
        expect(get(file, 'FOOTER', 'control_sum')).toBe('26.50');
    });

    it('writes sums into a numeric field in minor units', () => {
        const definition = defaultDefinition();
        definition.recordTypes[2].fields[2] = { name: 'control_sum', offset: 8, width: 12, type: 'numeric' };
        const file = decode(text([headerLine(), transactionLine(1, 10000), transactionLine(2, 2550), footerLine(0, 0)]), new Schema(definition));
        refreshAggregates(file);
        expect(get(file, 'FOOTER', 'control_sum')).toBe(12550);
        expect(file.records[3].raw.toString()).toBe(footerLine(2, 12550));
    });

    it('skips aggregates whose record is absent', () => {
        const bytes = text([headerLine(), transactionLine(1, 100)]);
        const file = decode(bytes);
        refreshAggregates(file);
        expect(encode(file).equals(bytes)).toBe(true);
    });
});
