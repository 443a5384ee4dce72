// File

import _ from 'lodash';
import { get, set } from '../field';
import FixedWidthRecord from '../record';
import Schema from '../schema';
import type { CodecOptions, FieldValue, Selector, TextEncoding } from '../types';

export type FileOptions = Required<CodecOptions> & {
    /** Whether the last line was followed by a terminator. */
    trailingTerminator: boolean,
};

export const defaultFileOptions: FileOptions = {
    lineTerminator: '\n',
    encoding: 'utf8',
    trailingTerminator: true,
};

export default class FixedWidthFile {
    readonly schema: Schema;
    readonly records: FixedWidthRecord[];
    readonly options: Readonly<FileOptions>;

    constructor(schema: Schema, records: FixedWidthRecord[] = [], options: Partial<FileOptions> = {}) {
        this.schema = schema;
        this.records = records;
        this.options = Object.freeze(_.merge({}, defaultFileOptions, options));
    }

    get encoding(): TextEncoding {
        return this.options.encoding;
    }

    recordsOf(tag: string): FixedWidthRecord[] {
        const type = this.schema.recordType(tag);
        return this.records.filter((record) => record.type === type);
    }

    insertionPoint(beforeTag?: string): number {
        const index = beforeTag === undefined
            ? -1
            : _.findIndex(this.records, (candidate) => candidate.tag === beforeTag);
        return index === -1 ? this.records.length : index;
    }

    insert(record: FixedWidthRecord, position: number): void {
        this.records.splice(position, 0, record);
    }

    get(tag: string, field: string, selector?: Selector): FieldValue {
        return get(this, tag, field, selector);
    }

    set(tag: string, field: string, value: FieldValue, selector?: Selector): this {
        set(this, tag, field, value, selector);
        return this;
    }
}
