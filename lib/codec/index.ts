// Codec

import _ from 'lodash';
import { MalformedRecordError } from '../errors';
import FixedWidthFile from '../file';
import FixedWidthRecord from '../record';
import type Schema from '../schema';
import type { CodecOptions } from '../types';

const defaults: Required<CodecOptions> = {
    lineTerminator: '\n',
    encoding: 'utf8',
};

export default class Codec {
    readonly schema: Schema;
    readonly options: Readonly<Required<CodecOptions>>;

    constructor(schema: Schema, options: CodecOptions = {}) {
        this.schema = schema;
        this.options = Object.freeze(_.merge({}, defaults, _.omitBy(options, _.isUndefined)));
    }

    decode(bytes: Buffer): FixedWidthFile {
        const { lineTerminator, encoding } = this.options;
        const terminator = Buffer.from(lineTerminator, 'latin1');
        const records: FixedWidthRecord[] = [];

        let start = 0;
        let lineNumber = 0;
        while (start < bytes.length) {
            const end = bytes.indexOf(terminator, start);
            const line = bytes.subarray(start, end === -1 ? bytes.length : end);
            lineNumber++;
            records.push(this.decodeLine(line, lineNumber));
            if (end === -1) {
                return new FixedWidthFile(this.schema, records, { lineTerminator, encoding, trailingTerminator: false });
            }
            start = end + terminator.length;
        }

        return new FixedWidthFile(this.schema, records, { lineTerminator, encoding, trailingTerminator: true });
    }

    decodeLine(line: Buffer, lineNumber: number): FixedWidthRecord {
        const { type, byTagOnly } = this.schema.identify(line);
        if (type) {
            return new FixedWidthRecord(type, Buffer.from(line), this.options.encoding);
        }
        if (byTagOnly) {
            throw new MalformedRecordError(lineNumber,
                `'${byTagOnly.tag}' records are ${byTagOnly.width} bytes wide, this line is ${line.length}`);
        }
        const widths = _.uniq(this.schema.recordTypes.map((t) => t.width)).join(', ');
        throw new MalformedRecordError(lineNumber,
            `no record type matches this ${line.length}-byte line (known widths: ${widths})`);
    }

    encode(file: FixedWidthFile): Buffer {
        const terminator = Buffer.from(file.options.lineTerminator, 'latin1');
        const parts: Buffer[] = [];
        file.records.forEach((record, index) => {
            if (index > 0) {
                parts.push(terminator);
            }
            parts.push(record.raw);
        });
        if (parts.length > 0 && file.options.trailingTerminator) {
            parts.push(terminator);
        }
        return Buffer.concat(parts);
    }
}
