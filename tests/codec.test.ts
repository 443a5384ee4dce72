import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { Codec, MalformedRecordError, Schema, decode, defaultSchema, encode } from '../lib';
import { footerLine, headerLine, sampleLines, text, transactionLine } from './helpers';

function malformed(bytes: Buffer, codec = new Codec(defaultSchema())): MalformedRecordError {
    try {
        codec.decode(bytes);
    } catch (err) {
        if (err instanceof MalformedRecordError) {
            return err;
        }
        throw err;
    }
    throw new Error('decode succeeded');
}

describe('Codec', () => {
    it('decodes one record per line in file order', () => {
        const file = decode(text(sampleLines()));
        expect(file.records.map((record) => record.tag)).toEqual(['HEADER', 'TRANSACTION', 'TRANSACTION', 'FOOTER']);
        expect(file.records[2].raw.toString()).toBe(transactionLine(2, 2550, 'EUR'));
    });

    describe('round trip', () => {
        it('reproduces a file ending in a newline', () => {
            const bytes = text(sampleLines());
            expect(encode(decode(bytes)).equals(bytes)).toBe(true);
        });

        it('reproduces a file without a final newline', () => {
            const bytes = Buffer.from(sampleLines().join('\n'));
            const file = decode(bytes);
            expect(file.options.trailingTerminator).toBe(false);
            expect(encode(file).equals(bytes)).toBe(true);
        });

        it('reproduces CRLF files with a CRLF codec', () => {
            const bytes = text(sampleLines(), '\r\n');
            const codec = new Codec(defaultSchema(), { lineTerminator: '\r\n' });
            expect(codec.encode(codec.decode(bytes)).equals(bytes)).toBe(true);
        });

        it('keeps bytes no field covers', () => {
            const line = headerLine().slice(0, 118) + 'ZZ';
            const bytes = text([line, footerLine(0, 0)]);
            expect(encode(decode(bytes)).toString()).toBe(`${line}\n${footerLine(0, 0)}\n`);
        });

        it('decodes re-encoded output to the same records', () => {
            const first = decode(text(sampleLines()));
            const second = decode(encode(first));
            expect(second.records.map((record) => record.raw.toString())).toEqual(first.records.map((record) => record.raw.toString()));
        });

        it('handles an empty file', () => {
            const file = decode(Buffer.alloc(0));
            expect(file.records).toHaveLength(0);
            expect(encode(file).length).toBe(0);
        });
    });

    describe('malformed input', () => {
        it('reports a line of the wrong width', () => {
            const lines = sampleLines();
            lines[1] = lines[1].slice(0, 119);
            const err = malformed(text(lines));
            expect(err.lineNumber).toBe(2);
            expect(err.reason).toBe("'TRANSACTION' records are 120 bytes wide, this line is 119");
        });

        it('reports an unknown tag', () => {
            const lines = sampleLines();
            lines[2] = '09' + lines[2].slice(2);
            const err = malformed(text(lines));
            expect(err.lineNumber).toBe(3);
            expect(err.reason).toBe('no record type matches this 120-byte line (known widths: 120)');
            expect(err.message).toBe('Malformed record on line 3: no record type matches this 120-byte line (known widths: 120)');
        });

        it('rejects blank lines', () => {
            const bytes = Buffer.from(`${headerLine()}\n\n${footerLine(0, 0)}\n`);
            expect(malformed(bytes).lineNumber).toBe(2);
        });

        it('sees the carriage return of a CRLF file read as LF', () => {
            const err = malformed(text(sampleLines(), '\r\n'));
            expect(err.lineNumber).toBe(1);
            expect(err.reason).toBe("'HEADER' records are 120 bytes wide, this line is 121");
        });
    });

    it('tells record types of different widths apart by their own tag bytes', () => {
        const schema = Schema.fromJSON(readFileSync(join(__dirname, 'fixtures/small-layout.json'), 'utf8'));
        const header = 'HD' + ' '.repeat(8) + '42 Elm Street'.padEnd(20) + ' '.repeat(10);
        const file = new Codec(schema).decode(text([header, '0000001250USD000003T']));
        expect(file.records.map((record) => record.tag)).toEqual(['HEADER', 'TRANSACTION']);
        expect(file.get('TRANSACTION', 'amount')).toBe('12.50');
        expect(file.get('HEADER', 'address')).toBe('42 Elm Street');
    });
});
