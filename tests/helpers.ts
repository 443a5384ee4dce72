import type { FileSystem } from '../lib/transaction';

export const WIDTH = 120;

export function headerLine(name = 'John', surname = 'Smith', patronymic = 'Paul', address = '1 Main St'): string {
    return ('01' + name.padEnd(28) + surname.padEnd(30) + patronymic.padEnd(30) + address.padEnd(28)).padEnd(WIDTH);
}

export function transactionLine(counter: number, cents: number, currency = 'USD'): string {
    return ('02' + String(counter).padStart(6, '0') + String(cents).padStart(12, '0') + currency).padEnd(WIDTH);
}

export function footerLine(count: number, cents: number): string {
    return ('03' + String(count).padStart(6, '0') + String(cents).padStart(12, '0')).padEnd(WIDTH);
}

/** Header, transactions 1 (100.00 USD) and 2 (25.50 EUR), footer. */
export function sampleLines(): string[] {
    return [
        headerLine(),
        transactionLine(1, 10000, 'USD'),
        transactionLine(2, 2550, 'EUR'),
        footerLine(2, 12550),
    ];
}

export function text(lines: string[], terminator = '\n'): Buffer {
    return Buffer.from(lines.join(terminator) + terminator);
}

export function enoent(path: string): Error {
    return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

type Operation = 'readFile' | 'writeFile' | 'rename' | 'unlink';

/** In-process stand-in for the disk, with hooks to make one operation fail. */
export class MemoryFileSystem implements FileSystem {
    readonly files = new Map<string, Buffer>();
    readonly calls: Operation[] = [];
    private failures = new Map<Operation, Error>();

    constructor(files: { [path: string]: Buffer | string } = {}) {
        for (const [path, content] of Object.entries(files)) {
            this.files.set(path, Buffer.from(content));
        }
    }

    failOn(operation: Operation, error: Error): void {
        this.failures.set(operation, error);
    }

    content(path: string): string | undefined {
        return this.files.get(path)?.toString('utf8');
    }

    async readFile(path: string): Promise<Buffer> {
        this.enter('readFile');
        const data = this.files.get(path);
        if (!data) {
            throw enoent(path);
        }
        return Buffer.from(data);
    }

    async writeFile(path: string, data: Buffer): Promise<void> {
        this.calls.push('writeFile');
        const failure = this.failures.get('writeFile');
        if (failure) {
            // a write that dies half way still leaves a partial file behind
            this.files.set(path, Buffer.from(data.subarray(0, Math.floor(data.length / 2))));
            throw failure;
        }
        this.files.set(path, Buffer.from(data));
    }

    async rename(from: string, to: string): Promise<void> {
        this.enter('rename');
        const data = this.files.get(from);
        if (!data) {
            throw enoent(from);
        }
        this.files.delete(from);
        this.files.set(to, data);
    }

    async unlink(path: string): Promise<void> {
        this.enter('unlink');
        if (!this.files.delete(path)) {
            throw enoent(path);
        }
    }

    private enter(operation: Operation): void {
        this.calls.push(operation);
        const failure = this.failures.get(operation);
        if (failure) {
            throw failure;
        }
    }
}
