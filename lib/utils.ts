import _ from 'lodash';
import type { FieldSpec, Justify, Logger } from './types';

export type ResolvedField = FieldSpec & { justify: Justify, paddingChar: string };

export function resolveField(spec: FieldSpec): ResolvedField {
    const numeric = spec.type !== 'alphanumeric';
    return {
        ...spec,
        justify: spec.justify ?? (numeric ? 'right' : 'left'),
        paddingChar: spec.paddingChar ?? (numeric ? '0' : ' '),
    };
}

export function scaleOf(spec: FieldSpec): number {
    return spec.type === 'decimal' ? spec.scale ?? 2 : 0;
}

export function isImpliedDecimal(spec: FieldSpec): boolean {
    return spec.type === 'decimal' ? spec.impliedDecimal ?? true : false;
}

/** Pads `value` to exactly `width` bytes. The caller checks that it fits. */
export function pad(value: string, width: number, justify: Justify, paddingChar: string, encoding: BufferEncoding): Buffer {
    const content = Buffer.from(value, encoding);
    const filler = Buffer.alloc(width - content.length, paddingChar, encoding);
    return justify === 'left' ? Buffer.concat([content, filler]) : Buffer.concat([filler, content]);
}

export function unpad(value: string, justify: Justify, paddingChar: string): string {
    return justify === 'left' ? _.trimEnd(value, paddingChar) : _.trimStart(value, paddingChar);
}

const DECIMAL_PATTERN = /^(\d*)(?:\.(\d*))?$/;

/**
 * Parses a plain decimal string into an integer count of 10^-scale units.
 * Returns null for anything that is not digits with an optional point, or
 * that carries non-zero digits beyond `scale`.
 */
export function parseScaled(text: string, scale: number): bigint | null {
    const match = DECIMAL_PATTERN.exec(text);
    if (!match || text === '' || text === '.') {
        return null;
    }
    const whole = match[1] ?? '';
    const fraction = match[2] ?? '';
    if (!/^0*$/.test(fraction.slice(scale))) {
        return null;
    }
    const digits = fraction.slice(0, scale).padEnd(scale, '0');
    return BigInt(whole || '0') * 10n ** BigInt(scale) + BigInt(digits || '0');
}

export function formatScaled(units: bigint, scale: number): string {
    const sign = units < 0n ? '-' : '';
    const digits = (units < 0n ? -units : units).toString().padStart(scale + 1, '0');
    if (scale === 0) {
        return sign + digits;
    }
    return `${sign}${digits.slice(0, -scale)}.${digits.slice(-scale)}`;
}

export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

export const silentLogger: Logger = {
    debug: _.noop,
    info: _.noop,
    warn: _.noop,
    error: _.noop,
};
