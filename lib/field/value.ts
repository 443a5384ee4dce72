import { InvalidValueError } from '../errors';
import type { FieldValue } from '../types';
import { formatScaled, isImpliedDecimal, pad, parseScaled, scaleOf, unpad } from '../utils';
import type { ResolvedField } from '../utils';
import { validateAllowedValues, validateLength } from '../validate';

function stored(field: ResolvedField, bytes: Buffer, encoding: BufferEncoding): string {
    return unpad(bytes.toString(encoding), field.justify, field.paddingChar).trim();
}

function digitsOf(field: ResolvedField, value: FieldValue): string {
    if (typeof value === 'number' && (!Number.isSafeInteger(value) || value < 0)) {
        throw new InvalidValueError(field.name, `${value} is not a non-negative integer`);
    }
    const text = String(value).trim();
    if (!/^\d+$/.test(text)) {
        throw new InvalidValueError(field.name, `'${text}' is not a non-negative integer`);
    }
    return text.replace(/^0+(?=\d)/, '');
}

function decimalText(field: ResolvedField, value: FieldValue): string {
    const scale = scaleOf(field);
    const units = parseScaled(String(value).trim(), scale);
    if (units === null) {
        throw new InvalidValueError(field.name, `'${value}' is not a non-negative decimal with at most ${scale} fractional digits`);
    }
    return isImpliedDecimal(field) ? units.toString() : formatScaled(units, scale);
}

/**
 * Encodes a logical value into exactly `field.width` bytes.
 *
 * Numeric input may carry leading zeros; they are dropped before padding so
 * `000003` fits a four-byte counter as `0003`. Decimal input is scaled to the
 * field's `scale` and, for implied-decimal fields, written without a point.
 */
export function encodeValue(field: ResolvedField, value: FieldValue, encoding: BufferEncoding): Buffer {
    let text: string;
    switch (field.type) {
        case 'numeric':
            text = digitsOf(field, value);
            break;
        case 'decimal':
            text = decimalText(field, value);
            break;
        default:
            text = String(value);
    }
    validateAllowedValues(field, text);
    validateLength(field, Buffer.byteLength(text, encoding));
    return pad(text, field.width, field.justify, field.paddingChar, encoding);
}

// numeric fields as is, decimals in 10^-scale units
export function decodeUnits(field: ResolvedField, bytes: Buffer, encoding: BufferEncoding): bigint {
    const text = stored(field, bytes, encoding);
    if (field.type === 'decimal' && !isImpliedDecimal(field)) {
        const units = parseScaled(text || '0', scaleOf(field));
        if (units === null) {
            throw new InvalidValueError(field.name, `stored value '${bytes.toString(encoding)}' is not a decimal`);
        }
        return units;
    }
    if (!/^\d*$/.test(text)) {
        throw new InvalidValueError(field.name, `stored value '${bytes.toString(encoding)}' is not numeric`);
    }
    return BigInt(text || '0');
}

/**
 * Decodes a field's bytes back into the value `encodeValue` was given,
 * normalised. Numbers past `Number.MAX_SAFE_INTEGER` come back as digit strings.
 */
export function decodeValue(field: ResolvedField, bytes: Buffer, encoding: BufferEncoding): FieldValue {
    switch (field.type) {
        case 'numeric': {
            const units = decodeUnits(field, bytes, encoding);
            return units <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(units) : units.toString();
        }
        case 'decimal':
            return formatScaled(decodeUnits(field, bytes, encoding), scaleOf(field));
        default:
            return unpad(bytes.toString(encoding), field.justify, field.paddingChar);
    }
}

// Exact comparison key: unit count for numbers, unpadded text otherwise.
export function compareKey(field: ResolvedField, bytes: Buffer, encoding: BufferEncoding): string {
    return field.type === 'alphanumeric'
        ? unpad(bytes.toString(encoding), field.justify, field.paddingChar)
        : decodeUnits(field, bytes, encoding).toString();
}
