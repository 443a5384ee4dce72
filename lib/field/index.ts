// Field access

import {
    AmbiguousSelectionError,
    FixedWidthError,
    RecordNotFoundError,
    SchemaMismatchError,
} from '../errors';
import type FixedWidthFile from '../file';
import type FixedWidthRecord from '../record';
import type { ResolvedRecordType } from '../schema';
import type { FieldValue, Selector } from '../types';
import { compareKey, encodeValue } from './value';

export { decodeValue, encodeValue } from './value';

function selectorTerms(type: ResolvedRecordType, selector: Selector): { field: string, value: FieldValue } {
    if (typeof selector === 'object') {
        return selector;
    }
    if (!type.selectorField) {
        throw new SchemaMismatchError(`'${type.tag}' records define no selector field; name one explicitly`);
    }
    return { field: type.selectorField, value: selector };
}

// Selector values are compared as stored, so `3` and `000003` both pick counter `000003`.
export function resolve(file: FixedWidthFile, tag: string, selector?: Selector): FixedWidthRecord {
    const type = file.schema.recordType(tag);
    const candidates = file.recordsOf(type.tag);

    if (selector === undefined) {
        if (candidates.length === 0) {
            throw new RecordNotFoundError(type.tag);
        }
        if (candidates.length > 1) {
            throw new AmbiguousSelectionError(type.tag, candidates.length);
        }
        return candidates[0];
    }

    const terms = selectorTerms(type, selector);
    const field = file.schema.field(type.tag, terms.field);
    const detail = `${terms.field} = ${terms.value}`;

    let wanted: string;
    try {
        wanted = compareKey(field, encodeValue(field, terms.value, file.encoding), file.encoding);
    } catch (err) {
        // A selector that cannot be stored in the field cannot match any record.
        if (err instanceof FixedWidthError) {
            throw new RecordNotFoundError(type.tag, detail);
        }
        throw err;
    }

    const matches = candidates.filter((record) => compareKey(field, record.slice(field), file.encoding) === wanted);
    if (matches.length === 0) {
        throw new RecordNotFoundError(type.tag, detail);
    }
    if (matches.length > 1) {
        throw new AmbiguousSelectionError(type.tag, matches.length, `selector ${detail} is not unique`);
    }
    return matches[0];
}

export function get(file: FixedWidthFile, tag: string, field: string, selector?: Selector): FieldValue {
    const spec = file.schema.field(tag, field);
    return resolve(file, tag, selector).get(spec.name);
}

export function set(file: FixedWidthFile, tag: string, field: string, value: FieldValue, selector?: Selector): FixedWidthFile {
    const spec = file.schema.field(tag, field);
    resolve(file, tag, selector).set(spec.name, value);
    return file;
}
