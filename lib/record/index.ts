// Record

import _ from 'lodash';
import { InvalidValueError, UnknownFieldError } from '../errors';
import { encodeValue, decodeUnits, decodeValue } from '../field/value';
import type { ResolvedRecordType } from '../schema';
import type { FieldValue } from '../types';
import type { ResolvedField } from '../utils';

export default class FixedWidthRecord {
    readonly type: ResolvedRecordType;
    readonly raw: Buffer;
    readonly encoding: BufferEncoding;

    constructor(type: ResolvedRecordType, raw: Buffer, encoding: BufferEncoding = 'utf8') {
        if (raw.length !== type.width) {
            throw new RangeError(`'${type.tag}' records are ${type.width} bytes, got ${raw.length}`);
        }
        this.type = type;
        this.raw = raw;
        this.encoding = encoding;
    }

    static blank(type: ResolvedRecordType, encoding: BufferEncoding = 'utf8'): FixedWidthRecord {
        const raw = Buffer.alloc(type.width, ' ');
        for (const field of type.fields) {
            raw.fill(field.paddingChar, field.offset, field.offset + field.width, encoding);
        }
        type.tagBytes.copy(raw, type.tagRange.offset);
        return new FixedWidthRecord(type, raw, encoding);
    }

    get tag(): string {
        return this.type.tag;
    }

    field(name: string): ResolvedField {
        const field = _.find(this.type.fields, { name });
        if (!field) {
            throw new UnknownFieldError(this.tag, name);
        }
        return field;
    }

    slice(field: ResolvedField): Buffer {
        return Buffer.from(this.raw.subarray(field.offset, field.offset + field.width));
    }

    get(name: string): FieldValue {
        const field = this.field(name);
        return decodeValue(field, this.slice(field), this.encoding);
    }

    units(name: string): bigint {
        const field = this.field(name);
        return decodeUnits(field, this.slice(field), this.encoding);
    }

    set(name: string, value: FieldValue): void {
        const field = this.field(name);
        const { offset, width } = this.type.tagRange;
        if (field.offset < offset + width && offset < field.offset + field.width) {
            throw new InvalidValueError(field.name, `it holds the '${this.tag}' record tag`);
        }
        const bytes = encodeValue(field, value, this.encoding);
        bytes.copy(this.raw, field.offset);
    }
}
