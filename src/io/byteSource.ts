import { closeSync, openSync, readSync } from 'fs';

/**
 * Synchronous pull-based byte producer.
 *
 * `read` copies up to `target.length` bytes into `target` and returns how many
 * it wrote; returning 0 means the input has ended.
 */
export interface ByteSource {
    read(target: Uint8Array): number;
    close?(): void;
}

/**
 * Serves an in-memory buffer, optionally no more than `maxReadSize` bytes per read.
 */
export class BufferByteSource implements ByteSource {
    private position = 0;

    constructor(
        private readonly data: Uint8Array,
        private readonly maxReadSize = Infinity,
    ) {}

    get remaining(): number {
        return this.data.length - this.position;
    }

    read(target: Uint8Array): number {
        const count = Math.min(target.length, this.maxReadSize, this.remaining);
        target.set(this.data.subarray(this.position, this.position + count));
        this.position += count;
        return count;
    }
}

/**
 * Serves a sequence of chunks as they are handed over, never merging two
 * chunks into one read. Empty chunks are passed over.
 */
export class ChunkedByteSource implements ByteSource {
    private readonly chunks: Iterator<Uint8Array>;
    private current: Uint8Array = new Uint8Array(0);
    private done = false;

    constructor(chunks: Iterable<Uint8Array>) {
        this.chunks = chunks[Symbol.iterator]();
    }

    read(target: Uint8Array): number {
        while (this.current.length === 0 && !this.done) {
            const next = this.chunks.next();
            if (next.done) {
                this.done = true;
            } else {
                this.current = next.value;
            }
        }

        const count = Math.min(target.length, this.current.length);
        target.set(this.current.subarray(0, count));
        this.current = this.current.subarray(count);
        return count;
    }

    close(): void {
        if (!this.done) {
            this.done = true;
            this.chunks.return?.();
        }
    }
}

/**
 * Reads a file through a descriptor. A descriptor opened from a path is
 * closed by {@link close}; one passed in is left to its owner.
 */
export class FileByteSource implements ByteSource {
    private readonly fd: number;
    private readonly ownsDescriptor: boolean;
    private closed = false;

    constructor(pathOrFd: string | number) {
        if (typeof pathOrFd === 'number') {
            this.fd = pathOrFd;
            this.ownsDescriptor = false;
        } else {
            this.fd = openSync(pathOrFd, 'r');
            this.ownsDescriptor = true;
        }
    }

    read(target: Uint8Array): number {
        if (this.closed || target.length === 0) return 0;
        return readSync(this.fd, target, 0, target.length, null);
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.ownsDescriptor) {
            closeSync(this.fd);
        }
    }
}
