// Default layout: 120-byte lines, a header, any number of transactions and a footer

import type { RecordTypeSpec, SchemaDefinition } from '../types';
import Schema from './index';

const RECORD_WIDTH = 120;

export const CURRENCIES = ['USD', 'EUR', 'GBP'];

function header(): RecordTypeSpec {
    return {
        tag: 'HEADER',
        tagValue: '01',
        width: RECORD_WIDTH,
        tagField: 'field_id',
        fields: [
            { name: 'field_id', offset: 0, width: 2, type: 'alphanumeric' },
            { name: 'name', offset: 2, width: 28, type: 'alphanumeric' },
            { name: 'surname', offset: 30, width: 30, type: 'alphanumeric' },
            { name: 'patronymic', offset: 60, width: 30, type: 'alphanumeric' },
            { name: 'address', offset: 90, width: 28, type: 'alphanumeric' },
        ],
    };
}

function transaction(): RecordTypeSpec {
    return {
        tag: 'TRANSACTION',
        tagValue: '02',
        width: RECORD_WIDTH,
        tagField: 'field_id',
        selectorField: 'counter',
        fields: [
            { name: 'field_id', offset: 0, width: 2, type: 'alphanumeric' },
            { name: 'counter', offset: 2, width: 6, type: 'numeric' },
            { name: 'amount', offset: 8, width: 12, type: 'decimal', scale: 2 },
            { name: 'currency', offset: 20, width: 3, type: 'alphanumeric', allowedValues: CURRENCIES },
            { name: 'reserved', offset: 23, width: 95, type: 'alphanumeric' },
        ],
    };
}

function footer(): RecordTypeSpec {
    return {
        tag: 'FOOTER',
        tagValue: '03',
        width: RECORD_WIDTH,
        tagField: 'field_id',
        fields: [
            { name: 'field_id', offset: 0, width: 2, type: 'alphanumeric' },
            { name: 'total_count', offset: 2, width: 6, type: 'numeric' },
            { name: 'control_sum', offset: 8, width: 12, type: 'decimal', scale: 2 },
            { name: 'reserved', offset: 20, width: 98, type: 'alphanumeric' },
        ],
    };
}

export function defaultDefinition(): SchemaDefinition {
    return {
        recordTypes: [header(), transaction(), footer()],
        roles: { header: 'HEADER', transaction: 'TRANSACTION', footer: 'FOOTER' },
        transaction: { counterField: 'counter', amountField: 'amount', currencyField: 'currency' },
        aggregates: [
            { recordType: 'FOOTER', field: 'total_count', kind: 'count', source: 'TRANSACTION' },
            { recordType: 'FOOTER', field: 'control_sum', kind: 'sum', source: 'TRANSACTION', sourceField: 'amount' },
        ],
    };
}

export default function defaultSchema(): Schema {
    return new Schema(defaultDefinition());
}
