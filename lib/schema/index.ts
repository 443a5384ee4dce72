// Schema

import _ from 'lodash';
import { z } from 'zod';
import { InvalidSchemaError, UnknownFieldError, UnknownRecordTypeError } from '../errors';
import type {
    AggregateSpec,
    RecordTypeSpec,
    RoleMap,
    SchemaDefinition,
    TagRange,
    TransactionSettings,
} from '../types';
import { pad, resolveField } from '../utils';
import type { ResolvedField } from '../utils';
import { tagRangeOf, validateSchema } from '../validate';

export interface ResolvedRecordType {
    tag: string,
    tagValue: string,
    width: number,
    tagRange: TagRange,
    /** Tag bytes as they appear in a line of this type; ASCII, so the same in every TextEncoding. */
    tagBytes: Buffer,
    fields: ResolvedField[],
    selectorField?: string,
}

const fieldBase = {
    name: z.string().min(1),
    offset: z.number().int(),
    width: z.number().int(),
    justify: z.enum(['left', 'right']).optional(),
    paddingChar: z.string().length(1).optional(),
    allowedValues: z.array(z.string()).optional(),
};

const fieldSchema = z.discriminatedUnion('type', [
    z.object({ ...fieldBase, type: z.literal('alphanumeric') }),
    z.object({ ...fieldBase, type: z.literal('numeric') }),
    z.object({
        ...fieldBase,
        type: z.literal('decimal'),
        scale: z.number().int().optional(),
        impliedDecimal: z.boolean().optional(),
    }),
]);

const definitionSchema = z.object({
    recordTypes: z.array(z.object({
        tag: z.string().min(1),
        tagValue: z.string().optional(),
        width: z.number().int(),
        tagField: z.union([z.string(), z.object({ offset: z.number().int(), width: z.number().int() })]),
        fields: z.array(fieldSchema),
        selectorField: z.string().optional(),
    })),
    roles: z.object({
        header: z.string().optional(),
        transaction: z.string().optional(),
        footer: z.string().optional(),
    }).optional(),
    transaction: z.object({
        counterField: z.string(),
        amountField: z.string(),
        currencyField: z.string(),
        initialCounter: z.number().int().optional(),
    }).optional(),
    aggregates: z.array(z.object({
        recordType: z.string(),
        field: z.string(),
        kind: z.enum(['count', 'sum']),
        source: z.string(),
        sourceField: z.string().optional(),
    })).optional(),
});

export default class Schema {
    readonly recordTypes: readonly ResolvedRecordType[];
    readonly roles: Readonly<RoleMap>;
    readonly transaction?: Readonly<TransactionSettings>;
    readonly aggregates: readonly AggregateSpec[];
    private readonly byTag: { [tag: string]: ResolvedRecordType };

    constructor(definition: SchemaDefinition) {
        const copy = _.cloneDeep(definition);
        validateSchema(copy);

        this.recordTypes = Object.freeze(copy.recordTypes.map(resolveRecordType));
        this.byTag = _.keyBy(this.recordTypes, 'tag');
        this.roles = Object.freeze(copy.roles ?? {});
        this.transaction = copy.transaction && Object.freeze(copy.transaction);
        this.aggregates = Object.freeze(copy.aggregates ?? []);
        Object.freeze(this);
    }

    static fromJSON(text: string): Schema {
        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (err) {
            throw new InvalidSchemaError(`not valid JSON (${err instanceof Error ? err.message : String(err)})`);
        }
        const parsed = definitionSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new InvalidSchemaError(`${issue.path.join('.') || 'document'}: ${issue.message}`);
        }
        return new Schema(parsed.data);
    }

    // exact tag first, then a unique case-insensitive match
    recordType(tag: string): ResolvedRecordType {
        const exact = this.byTag[tag];
        if (exact) {
            return exact;
        }
        const loose = this.recordTypes.filter((type) => type.tag.toLowerCase() === tag.toLowerCase());
        if (loose.length !== 1) {
            throw new UnknownRecordTypeError(tag);
        }
        return loose[0];
    }

    field(tag: string, name: string): ResolvedField {
        const type = this.recordType(tag);
        const field = _.find(type.fields, { name });
        if (!field) {
            throw new UnknownFieldError(type.tag, name);
        }
        return field;
    }

    // byTagOnly lets the caller report the width it expected
    identify(line: Buffer): { type?: ResolvedRecordType, byTagOnly?: ResolvedRecordType } {
        const tagged = this.recordTypes.filter((type) => {
            const { offset, width } = type.tagRange;
            return offset + width <= line.length
                && line.subarray(offset, offset + width).equals(type.tagBytes);
        });
        return {
            type: _.find(tagged, (type) => type.width === line.length),
            byTagOnly: tagged[0],
        };
    }
}

function resolveRecordType(type: RecordTypeSpec): ResolvedRecordType {
    const tagRange = tagRangeOf(type);
    const tagValue = type.tagValue ?? type.tag;
    const tagField = typeof type.tagField === 'string' ? _.find(type.fields, { name: type.tagField }) : undefined;
    const tagSpec = tagField ? resolveField(tagField) : undefined;

    return Object.freeze({
        tag: type.tag,
        tagValue,
        width: type.width,
        tagRange: Object.freeze({ ...tagRange }),
        tagBytes: pad(tagValue, tagRange.width, tagSpec?.justify ?? 'left', tagSpec?.paddingChar ?? ' ', 'utf8'),
        fields: type.fields.map((field) => Object.freeze(resolveField(field))),
        selectorField: type.selectorField,
    });
}
