import { OGG_CHECKSUM_OFFSET, SyncResult } from "./oggTypes";
import { findOggStart, measureOggPage, oggPageChecksum, parseOggPage } from "./oggParsing";
import { OggFatalError } from "../common/errors";
import debug from "../common/debugger";

const debugLog = (...args: unknown[]) => debug.debugLog('sync', ...args);

const GROWTH_SLACK = 4096;

export interface SyncStats {
    pages: number;
    skippedBytes: number;
    checksumFailures: number;
    malformedHeaders: number;
}

/**
 * Turns a raw byte stream into checksum-verified Ogg pages.
 *
 * Bytes are written through {@link reserve} / {@link commit}; pages come out of
 * {@link nextPage}. Anything between pages that does not frame a valid page is
 * skipped one byte at a time until the next capture pattern checks out.
 *
 * Pages returned alias the internal buffer. The buffer is only moved or
 * reallocated by {@link reserve}, so a page stays readable until then.
 */
export class OggSyncScanner {
    private buffer: Uint8Array;
    private readPos = 0;
    private fill = 0;
    private reserved = 0;
    private endOfInput = false;

    readonly stats: SyncStats = {
        pages: 0,
        skippedBytes: 0,
        checksumFailures: 0,
        malformedHeaders: 0,
    };

    constructor(initialCapacity = 0) {
        this.buffer = allocate(initialCapacity);
    }

    /** Bytes committed but not yet consumed as pages or skipped */
    get buffered(): number {
        return this.fill - this.readPos;
    }

    get capacity(): number {
        return this.buffer.length;
    }

    get ended(): boolean {
        return this.endOfInput;
    }

    /**
     * Writable window of exactly `size` bytes starting at the fill mark.
     * Invalidates pages handed out earlier.
     */
    reserve(size: number): Uint8Array {
        if (!Number.isInteger(size) || size < 0) {
            throw new OggFatalError('INVALID_OPTION', `Cannot reserve ${size} bytes`);
        }

        if (this.fill + size > this.buffer.length && this.readPos > 0) {
            // Drop the consumed prefix
            this.buffer.copyWithin(0, this.readPos, this.fill);
            this.fill -= this.readPos;
            this.readPos = 0;
        }

        if (this.fill + size > this.buffer.length) {
            const grown = allocate(Math.max(this.buffer.length * 2, this.fill + size + GROWTH_SLACK));
            grown.set(this.buffer.subarray(0, this.fill));
            debugLog(`Scan buffer grown from ${this.buffer.length} to ${grown.length} bytes`);
            this.buffer = grown;
        }

        this.reserved = size;
        return this.buffer.subarray(this.fill, this.fill + size);
    }

    /** Advance the fill mark over `size` bytes written into the last reserved window */
    commit(size: number): void {
        if (!Number.isInteger(size) || size < 0 || size > this.reserved) {
            throw new OggFatalError('BUFFER_OVERFLOW', `Committed ${size} bytes but only ${this.reserved} were reserved`);
        }
        this.fill += size;
        this.reserved -= size;
    }

    /** Copy `data` in. Shorthand for reserve + set + commit. */
    write(data: Uint8Array): void {
        this.reserve(data.length).set(data);
        this.commit(data.length);
    }

    /** No more bytes will be committed; truncated trailing data is skipped from now on */
    markEndOfInput(): void {
        this.endOfInput = true;
    }

    nextPage(): SyncResult {
        const buffer = this.buffer;

        while (this.readPos < this.fill) {
            const start = findOggStart(buffer, this.readPos, this.fill);

            if (start === -1) {
                // Keep a tail that may be the first bytes of a split capture pattern
                const keep = this.endOfInput ? 0 : Math.min(3, this.fill - this.readPos);
                this.skip(this.fill - keep - this.readPos);
                break;
            }

            this.skip(start - this.readPos);

            const pageSize = measureOggPage(buffer, start, this.fill);
            if (pageSize === null || start + pageSize > this.fill) {
                if (!this.endOfInput) return { status: 'need-data' };

                // Nothing more is coming, so this capture cannot be a whole page
                debugLog(`Truncated page at end of input, ${this.fill - start} bytes left`);
                this.skip(1);
                continue;
            }

            const stored = new DataView(buffer.buffer, buffer.byteOffset + start + OGG_CHECKSUM_OFFSET, 4)
                .getUint32(0, true);
            if (oggPageChecksum(buffer, start, pageSize) !== stored) {
                this.stats.checksumFailures++;
                debugLog(`Checksum mismatch for page at buffer offset ${start}, resynchronizing`);
                this.skip(1);
                continue;
            }

            const parsed = parseOggPage(buffer, start, start + pageSize);
            if (!parsed.ok) {
                this.stats.malformedHeaders++;
                debugLog(`Dropping page at buffer offset ${start}: ${parsed.reason}`);
                this.skip(1);
                continue;
            }

            this.readPos = start + pageSize;
            this.stats.pages++;
            return { status: 'page', page: parsed.page };
        }

        return this.endOfInput && this.readPos >= this.fill
            ? { status: 'end' }
            : { status: 'need-data' };
    }

    private skip(count: number): void {
        if (count <= 0) return;
        this.readPos += count;
        this.stats.skippedBytes += count;
        if (count > 1) {
            debugLog(`Skipped ${count} bytes of non-page data`);
        }
    }
}

const allocate = (size: number): Uint8Array => {
    try {
        return new Uint8Array(size);
    } catch (error) {
        throw new OggFatalError('ALLOCATION_FAILED', `Could not allocate ${size} byte scan buffer: ${String(error)}`);
    }
};
