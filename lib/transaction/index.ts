// File transaction

import async from 'async';
import { randomBytes } from 'node:crypto';
import { promises as fsp } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import Codec from '../codec';
import type FixedWidthFile from '../file';
import defaultSchema from '../schema/default';
import type Schema from '../schema';
import type { CodecOptions, Logger } from '../types';
import { silentLogger, toError } from '../utils';

export interface FileSystem {
    readFile(path: string): Promise<Buffer>;
    writeFile(path: string, data: Buffer): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    unlink(path: string): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
    readFile: (path) => fsp.readFile(path),
    // `wx`: never write through an existing temp name
    writeFile: (path, data) => fsp.writeFile(path, data, { flag: 'wx' }),
    rename: (from, to) => fsp.rename(from, to),
    unlink: (path) => fsp.unlink(path),
};

export interface TransactionOptions extends CodecOptions {
    schema?: Schema,
    fs?: FileSystem,
    logger?: Logger,
}

type Next<T> = (err: Error | null, result?: T) => void;

function step<A, R>(fn: (arg: A) => R | Promise<R>) {
    return (arg: A, next: Next<R>): void => {
        new Promise<R>((resolve) => resolve(fn(arg)))
            .then((result) => next(null, result), (err: unknown) => next(toError(err)));
    };
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// No lock is taken: one writer per file.
export default class FileTransaction {
    readonly path: string;
    readonly codec: Codec;
    private readonly fs: FileSystem;
    private readonly logger: Logger;

    constructor(path: string, options: TransactionOptions = {}) {
        const { schema, fs, logger, ...codecOptions } = options;
        this.path = path;
        this.codec = new Codec(schema ?? defaultSchema(), codecOptions);
        this.fs = fs ?? nodeFileSystem;
        this.logger = logger ?? silentLogger;
    }

    async read(): Promise<FixedWidthFile> {
        this.logger.debug('reading file', { path: this.path });
        const bytes = await this.fs.readFile(this.path);
        const file = this.codec.decode(bytes);
        this.logger.debug('decoded file', { path: this.path, records: file.records.length });
        return file;
    }

    commit<T>(mutate: (file: FixedWidthFile) => T): Promise<T> {
        const tempPath = join(dirname(this.path), `.${basename(this.path)}.${randomBytes(6).toString('hex')}.tmp`);
        let outcome: { value: T } | undefined;
        let tempWritten = false;

        return new Promise<T>((resolve, reject) => {
            async.waterfall([
                (next: Next<Buffer>) => {
                    this.fs.readFile(this.path).then((bytes) => next(null, bytes), (err: unknown) => next(toError(err)));
                },
                step((bytes: Buffer) => this.codec.decode(bytes)),
                step((file: FixedWidthFile) => {
                    outcome = { value: mutate(file) };
                    return this.codec.encode(file);
                }),
                step((bytes: Buffer) => {
                    tempWritten = true;
                    this.logger.debug('writing temporary file', { path: tempPath, bytes: bytes.length });
                    return this.fs.writeFile(tempPath, bytes);
                }),
                step(() => this.fs.rename(tempPath, this.path)),
            ], (err?: Error | null) => {
                if (!err) {
                    this.logger.info('file updated', { path: this.path });
                    if (outcome) {
                        resolve(outcome.value);
                    } else {
                        reject(new Error('transaction finished without running its mutation'));
                    }
                    return;
                }
                this.logger.warn('edit aborted, file left unchanged', { path: this.path, error: err.message });
                if (!tempWritten) {
                    reject(err);
                    return;
                }
                this.fs.unlink(tempPath).then(() => reject(err), (cleanupErr: unknown) => {
                    if (!isMissing(cleanupErr)) {
                        this.logger.error('could not remove temporary file', { path: tempPath, error: toError(cleanupErr).message });
                    }
                    reject(err);
                });
            });
        });
    }
}
