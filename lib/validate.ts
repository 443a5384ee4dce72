import _ from 'lodash';
import { InvalidSchemaError, InvalidValueError, ValueTooLongError } from './errors';
import type { FieldSpec, FieldType, RecordTypeSpec, SchemaDefinition, TagRange } from './types';

const COUNTABLE: FieldType[] = ['numeric', 'decimal'];

export function tagRangeOf(type: RecordTypeSpec): TagRange {
    if (typeof type.tagField !== 'string') {
        return type.tagField;
    }
    const name = type.tagField;
    const field = _.find(type.fields, { name });
    if (!field) {
        throw new InvalidSchemaError(`tag field '${name}' of '${type.tag}' is not one of its fields`);
    }
    return { offset: field.offset, width: field.width };
}

function validateField(type: RecordTypeSpec, field: FieldSpec): void {
    const where = `field '${field.name}' of '${type.tag}'`;
    if (!Number.isInteger(field.offset) || field.offset < 0) {
        throw new InvalidSchemaError(`${where} has offset ${field.offset}`);
    }
    if (!Number.isInteger(field.width) || field.width <= 0) {
        throw new InvalidSchemaError(`${where} has width ${field.width}`);
    }
    if (field.offset + field.width > type.width) {
        throw new InvalidSchemaError(`${where} ends at ${field.offset + field.width}, past the record width ${type.width}`);
    }
    if (field.paddingChar !== undefined && !/^[\x20-\x7e]$/.test(field.paddingChar)) {
        throw new InvalidSchemaError(`${where} needs a single printable ASCII padding character`);
    }
    if (field.type === 'decimal' && field.scale !== undefined && (!Number.isInteger(field.scale) || field.scale < 0)) {
        throw new InvalidSchemaError(`${where} has scale ${field.scale}`);
    }
    // trailing digit padding could not be told apart from the number itself
    if (field.type !== 'alphanumeric' && field.justify === 'left' && /^\d$/.test(field.paddingChar ?? '0')) {
        throw new InvalidSchemaError(`${where} is left-justified with digit padding '${field.paddingChar ?? '0'}'`);
    }
}

function overlapsTag(type: RecordTypeSpec, field: FieldSpec): boolean {
    const { offset, width } = tagRangeOf(type);
    return field.offset < offset + width && offset < field.offset + field.width;
}

function validateRecordType(type: RecordTypeSpec): void {
    if (!type.tag) {
        throw new InvalidSchemaError('record type without a tag');
    }
    if (!Number.isInteger(type.width) || type.width <= 0) {
        throw new InvalidSchemaError(`record type '${type.tag}' has width ${type.width}`);
    }

    const names = new Set<string>();
    for (const field of type.fields) {
        if (names.has(field.name)) {
            throw new InvalidSchemaError(`field '${field.name}' appears twice in '${type.tag}'`);
        }
        names.add(field.name);
        validateField(type, field);
    }

    const ordered = _.sortBy(type.fields, 'offset');
    for (let i = 1; i < ordered.length; i++) {
        const previous = ordered[i - 1];
        const current = ordered[i];
        if (current.offset < previous.offset + previous.width) {
            throw new InvalidSchemaError(`fields '${previous.name}' and '${current.name}' of '${type.tag}' overlap`);
        }
    }

    const range = tagRangeOf(type);
    if (range.offset < 0 || range.width <= 0 || range.offset + range.width > type.width) {
        throw new InvalidSchemaError(`tag field of '${type.tag}' lies outside its ${type.width}-byte record`);
    }
    const tagValue = type.tagValue ?? type.tag;
    if (!/^[\x20-\x7e]+$/.test(tagValue)) {
        throw new InvalidSchemaError(`tag value '${tagValue}' of '${type.tag}' must be printable ASCII`);
    }
    if (tagValue.length > range.width) {
        throw new InvalidSchemaError(`tag value '${tagValue}' does not fit the ${range.width}-byte tag field of '${type.tag}'`);
    }

    if (type.selectorField !== undefined && !names.has(type.selectorField)) {
        throw new InvalidSchemaError(`selector field '${type.selectorField}' is not a field of '${type.tag}'`);
    }
}

// `writable` fields are filled in by the editor itself and so may not hold the tag.
function requireField(definition: SchemaDefinition, tag: string, name: string, types?: FieldType[], writable = false): FieldSpec {
    const type = _.find(definition.recordTypes, { tag });
    if (!type) {
        throw new InvalidSchemaError(`unknown record type '${tag}'`);
    }
    const field = _.find(type.fields, { name });
    if (!field) {
        throw new InvalidSchemaError(`'${tag}' has no field '${name}'`);
    }
    if (types && !types.includes(field.type)) {
        throw new InvalidSchemaError(`'${tag}.${name}' must be ${types.join(' or ')}, not ${field.type}`);
    }
    if (writable && overlapsTag(type, field)) {
        throw new InvalidSchemaError(`'${tag}.${name}' overlaps the tag field`);
    }
    return field;
}

export function validateSchema(definition: SchemaDefinition): void {
    if (definition.recordTypes.length === 0) {
        throw new InvalidSchemaError('no record types defined');
    }

    const tags = new Set<string>();
    for (const type of definition.recordTypes) {
        if (tags.has(type.tag)) {
            throw new InvalidSchemaError(`record type '${type.tag}' is defined twice`);
        }
        tags.add(type.tag);
        validateRecordType(type);
    }

    // Two layouts of the same width reading the same tag bytes could never be told apart.
    const signatures = definition.recordTypes.map((type) => {
        const range = tagRangeOf(type);
        return [type.width, range.offset, range.width, type.tagValue ?? type.tag].join(':');
    });
    if (_.uniq(signatures).length !== signatures.length) {
        throw new InvalidSchemaError('two record types share a width and tag value');
    }

    _.forEach(definition.roles, (tag, role) => {
        if (tag !== undefined && !tags.has(tag)) {
            throw new InvalidSchemaError(`${role} role names unknown record type '${tag}'`);
        }
    });

    if (definition.transaction) {
        const tag = definition.roles?.transaction;
        if (!tag) {
            throw new InvalidSchemaError('transaction settings given without a transaction record type');
        }
        requireField(definition, tag, definition.transaction.counterField, ['numeric'], true);
        requireField(definition, tag, definition.transaction.amountField, COUNTABLE, true);
        requireField(definition, tag, definition.transaction.currencyField, undefined, true);
        const initial = definition.transaction.initialCounter;
        if (initial !== undefined && (!Number.isInteger(initial) || initial < 0)) {
            throw new InvalidSchemaError(`initial counter ${initial} is not a non-negative integer`);
        }
    }

    for (const aggregate of definition.aggregates ?? []) {
        requireField(definition, aggregate.recordType, aggregate.field, COUNTABLE, true);
        if (!tags.has(aggregate.source)) {
            throw new InvalidSchemaError(`aggregate '${aggregate.field}' sums unknown record type '${aggregate.source}'`);
        }
        if (aggregate.kind === 'sum') {
            if (!aggregate.sourceField) {
                throw new InvalidSchemaError(`sum aggregate '${aggregate.field}' names no source field`);
            }
            requireField(definition, aggregate.source, aggregate.sourceField, COUNTABLE);
        }
    }
}

export function validateLength(field: FieldSpec, actual: number): void {
    if (actual > field.width) {
        throw new ValueTooLongError(field.name, field.width, actual);
    }
}

export function validateAllowedValues(field: FieldSpec, value: string): void {
    if (field.allowedValues && !field.allowedValues.includes(value)) {
        throw new InvalidValueError(field.name, `'${value}' is not one of ${field.allowedValues.join(', ')}`);
    }
}
