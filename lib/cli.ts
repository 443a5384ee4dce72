#!/usr/bin/env node
/**
 * Command-line interface.
 *
 * Commands:
 *   get <file> <record_type> <field>          print a field value
 *   set <file> <record_type> <field> <value>  overwrite a field in place
 *   add <file> <amount> <currency>            append a transaction
 *
 * Exit codes: 0 success, 1 I/O or unexpected failure, 2 usage or unknown
 * record type/field, 3 malformed file, 4 ambiguous or missing record,
 * 5 value rejected, 6 schema problem.
 */

import { Command, CommanderError, Option } from 'commander';
import { add, refreshAggregates } from './appender';
import { FixedWidthError, SchemaMismatchError } from './errors';
import type { ErrorCode } from './errors';
import { get, set } from './field';
import { createStreamLogger } from './logger';
import Schema from './schema';
import defaultSchema from './schema/default';
import FileTransaction, { nodeFileSystem } from './transaction';
import type { FileSystem } from './transaction';
import type { Selector } from './types';

const VERSION = '0.1.0';

interface Output {
    write(chunk: string): unknown;
}

export interface CliIO {
    stdout: Output,
    stderr: Output,
    fs?: FileSystem,
}

interface GlobalOptions {
    schema?: string,
    crlf?: boolean,
    verbose?: boolean,
}

interface SelectOptions {
    selector?: string,
    transaction_counter?: string,
}

interface SetOptions extends SelectOptions {
    refreshAggregates?: boolean,
}

const EXIT_CODES: { [code in ErrorCode]: number } = {
    UNKNOWN_RECORD_TYPE: 2,
    UNKNOWN_FIELD: 2,
    MALFORMED_RECORD: 3,
    AMBIGUOUS_SELECTION: 4,
    RECORD_NOT_FOUND: 4,
    VALUE_TOO_LONG: 5,
    INVALID_VALUE: 5,
    INVALID_SCHEMA: 6,
    SCHEMA_MISMATCH: 6,
};

function selectorFrom(schema: Schema, options: SelectOptions): Selector | undefined {
    if (options.selector !== undefined) {
        return options.selector;
    }
    if (options.transaction_counter !== undefined) {
        if (!schema.transaction) {
            throw new SchemaMismatchError('Schema defines no transaction counter');
        }
        return { field: schema.transaction.counterField, value: options.transaction_counter };
    }
    return undefined;
}

function addSelectorOptions(command: Command): Command {
    return command
        .addOption(new Option('--selector <value>', 'value of the record type\'s selector field').conflicts('transaction_counter'))
        .addOption(new Option('--transaction_counter <value>', 'transaction counter of the record').conflicts('selector'));
}

function buildProgram(io: CliIO): Command {
    const fs = io.fs ?? nodeFileSystem;
    const program = new Command('flatfile-edit')
        .description('Read and edit fixed-width flat files')
        .version(VERSION)
        .option('--schema <path>', 'JSON schema describing the record layouts (default: built-in layout)')
        .option('--crlf', 'lines end in CRLF instead of LF')
        .option('--verbose', 'log each step to stderr')
        .exitOverride()
        .configureOutput({
            writeOut: (text) => io.stdout.write(text),
            writeErr: (text) => io.stderr.write(text),
        });

    const transactionFor = async (path: string) => {
        const options = program.opts<GlobalOptions>();
        const schema = options.schema
            ? Schema.fromJSON((await fs.readFile(options.schema)).toString('utf8'))
            : defaultSchema();
        return new FileTransaction(path, {
            schema,
            fs,
            lineTerminator: options.crlf ? '\r\n' : '\n',
            logger: createStreamLogger(io.stderr, options.verbose ? 'debug' : 'error'),
        });
    };

    addSelectorOptions(program.command('get')
        .description('print the value of a field')
        .argument('<file>', 'fixed-width file')
        .argument('<record_type>', 'record type, e.g. HEADER, TRANSACTION, FOOTER')
        .argument('<field>', 'field name'))
        .action(async (path: string, recordType: string, field: string, options: SelectOptions) => {
            const transaction = await transactionFor(path);
            const file = await transaction.read();
            const value = get(file, recordType, field, selectorFrom(file.schema, options));
            io.stdout.write(`${value}\n`);
        });

    addSelectorOptions(program.command('set')
        .description('overwrite the value of a field')
        .argument('<file>', 'fixed-width file')
        .argument('<record_type>', 'record type, e.g. HEADER, TRANSACTION, FOOTER')
        .argument('<field>', 'field name')
        .argument('<value>', 'new value'))
        .option('--refresh-aggregates', 'recompute footer counts and totals afterwards')
        .action(async (path: string, recordType: string, field: string, value: string, options: SetOptions) => {
            const transaction = await transactionFor(path);
            const stored = await transaction.commit((file) => {
                const selector = selectorFrom(file.schema, options);
                set(file, recordType, field, value, selector);
                if (options.refreshAggregates) {
                    refreshAggregates(file);
                }
                return get(file, recordType, field, selector);
            });
            io.stdout.write(`${recordType}.${field} = ${stored}\n`);
        });

    program.command('add')
        .description('append a transaction')
        .argument('<file>', 'fixed-width file')
        .argument('<amount>', 'transaction amount, e.g. 1234.56')
        .argument('<currency>', 'currency code, e.g. USD')
        .action(async (path: string, amount: string, currency: string) => {
            const transaction = await transactionFor(path);
            const counter = await transaction.commit((file) => add(file, { amount, currency }).counter);
            io.stdout.write(`added transaction ${counter}\n`);
        });

    return program;
}

function exitCodeFor(err: unknown, io: CliIO): number {
    if (err instanceof CommanderError) {
        // commander has already printed usage or the parse error
        return err.exitCode === 0 ? 0 : 2;
    }
    const message = err instanceof Error ? err.message : String(err);
    io.stderr.write(`error: ${message}\n`);
    return err instanceof FixedWidthError ? EXIT_CODES[err.code] : 1;
}

/** Runs the CLI against `argv` (node and script path first) and returns the exit code. */
export async function run(argv: string[], io: CliIO = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
    try {
        await buildProgram(io).parseAsync(argv);
        return 0;
    } catch (err) {
        return exitCodeFor(err, io);
    }
}

if (require.main === module) {
    run(process.argv).then((code) => {
        process.exitCode = code;
    }, (err: unknown) => {
        process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
        process.exitCode = 1;
    });
}
