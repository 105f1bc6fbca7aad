import { OggPacket, OggPage } from "./oggTypes";
import { OggSyncScanner, SyncStats } from "./oggSync";
import { OggStreamDemuxer } from "./oggStream";
import { ByteSource, FileByteSource } from "../io/byteSource";
import { OggFatalError, StreamIssue } from "../common/errors";
import debug from "../common/debugger";

const debugLog = (...args: unknown[]) => debug.debugLog('decoder', ...args);

export const DEFAULT_CHUNK_SIZE = 4096;

export interface DecoderOptions {
    /** Bytes requested from the source per read */
    chunkSize?: number;
    /** Stop reading once every stream seen so far has hit its end-of-stream page */
    stopWhenStreamsEnd?: boolean;
}

export interface RoutedPackets {
    serialNumber: number;
    packets: OggPacket[];
}

const resolveOptions = (options?: DecoderOptions): Required<DecoderOptions> => {
    const chunkSize = options?.chunkSize === undefined ? DEFAULT_CHUNK_SIZE : options.chunkSize;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new OggFatalError('INVALID_OPTION', `chunkSize must be a positive integer, got ${chunkSize}`);
    }
    return {
        chunkSize,
        stopWhenStreamsEnd: options?.stopWhenStreamsEnd ?? false,
    };
};

/**
 * Demultiplexes an Ogg byte stream into per-serial packets.
 *
 * Streaming use pulls pages and routes them one at a time:
 *
 * @example
 * ```ts
 * const decoder = OggDecoder.open('voice.ogg');
 * try {
 *   for (const packet of decoder.packets()) {
 *     handle(packet.serialNumber, packet.data);
 *   }
 * } finally {
 *   decoder.close();
 * }
 * ```
 *
 * Batch use collects everything with {@link decodeAll}. Packets and pages
 * handed out while streaming may alias the scan buffer and are only valid
 * until the next pull; copy them to keep them.
 */
export class OggDecoder {
    private readonly options: Required<DecoderOptions>;
    private readonly scanner = new OggSyncScanner();
    private readonly streams = new Map<number, OggStreamDemuxer>();
    private readonly endedSerials = new Set<number>();
    private readonly _issues: StreamIssue[] = [];
    private lookahead: OggPage | null = null;
    private exhausted = false;
    private closed = false;

    constructor(
        private readonly source: ByteSource,
        options?: DecoderOptions,
        private readonly ownsSource = false,
    ) {
        this.options = resolveOptions(options);
    }

    /**
     * Decoder over a file it opens itself and closes in {@link close}.
     */
    static open(path: string, options?: DecoderOptions): OggDecoder {
        const resolved = resolveOptions(options);
        return new OggDecoder(new FileByteSource(path), resolved, true);
    }

    get issues(): readonly StreamIssue[] {
        return this._issues;
    }

    get syncStats(): Readonly<SyncStats> {
        return this.scanner.stats;
    }

    /** Serials whose demuxer is still live */
    get activeSerials(): number[] {
        return [...this.streams.keys()];
    }

    get endedStreams(): number[] {
        return [...this.endedSerials];
    }

    hasNextPage(): boolean {
        return this.peekPage() !== null;
    }

    /** Next page without consuming it */
    peekPage(): OggPage | null {
        if (this.lookahead === null) {
            this.lookahead = this.readPage();
        }
        return this.lookahead;
    }

    /** Next page, or null once the input holds no more pages */
    pullPage(): OggPage | null {
        const page = this.peekPage();
        this.lookahead = null;
        return page;
    }

    /**
     * Hand a page to the demuxer of its serial, creating it on first sight.
     */
    route(page: OggPage): RoutedPackets {
        const serialNumber = page.serialNumber;

        if (this.endedSerials.has(serialNumber)) {
            this.record({ kind: 'page-after-eos', serial: serialNumber, sequenceNumber: page.pageSequence });
            return { serialNumber, packets: [] };
        }

        let stream = this.streams.get(serialNumber);
        if (!stream) {
            debugLog(`New logical stream ${serialNumber}${page.bos ? '' : ' (no BOS flag)'}`);
            stream = new OggStreamDemuxer(serialNumber);
            this.streams.set(serialNumber, stream);
        }

        const seen = stream.issues.length;
        const packets = stream.pageIn(page);
        for (let i = seen; i < stream.issues.length; i++) {
            this._issues.push(stream.issues[i]);
        }

        if (stream.terminated) {
            this.streams.delete(serialNumber);
            this.endedSerials.add(serialNumber);
        }

        return { serialNumber, packets };
    }

    *pages(): Generator<OggPage> {
        let page = this.pullPage();
        while (page !== null) {
            yield page;
            page = this.pullPage();
        }
    }

    *packets(): Generator<OggPacket> {
        for (const page of this.pages()) {
            yield* this.route(page).packets;
        }
    }

    /**
     * Drain the input and collect every complete packet by serial, in stream order.
     * Packet bytes are copied out of the scan buffer.
     */
    decodeAll(): Map<number, Uint8Array[]> {
        const result = new Map<number, Uint8Array[]>();

        for (const page of this.pages()) {
            const { serialNumber, packets } = this.route(page);
            let list = result.get(serialNumber);
            if (!list) {
                list = [];
                result.set(serialNumber, list);
            }
            for (const packet of packets) {
                list.push(packet.data.slice());
            }
        }

        debugLog(`Decoded ${result.size} streams from ${this.scanner.stats.pages} pages`);
        return result;
    }

    /**
     * Drop fragments still pending in live streams. Runs by itself when the input ends.
     */
    finish(): void {
        for (const stream of this.streams.values()) {
            const seen = stream.issues.length;
            stream.flush();
            for (let i = seen; i < stream.issues.length; i++) {
                this._issues.push(stream.issues[i]);
            }
        }
    }

    /** Release the source if this decoder opened it. Safe to call repeatedly. */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.lookahead = null;
        if (this.ownsSource) {
            this.source.close?.();
        }
    }

    private readPage(): OggPage | null {
        if (this.closed) {
            throw new OggFatalError('SOURCE_CLOSED', 'Decoder has been closed');
        }
        if (this.exhausted) return null;

        if (this.options.stopWhenStreamsEnd && this.streams.size === 0 && this.endedSerials.size > 0) {
            debugLog('Every stream has ended, not reading further');
            this.exhausted = true;
            return null;
        }

        for (;;) {
            const result = this.scanner.nextPage();

            if (result.status === 'page') return result.page;

            if (result.status === 'end') {
                this.exhausted = true;
                this.finish();
                return null;
            }

            const window = this.scanner.reserve(this.options.chunkSize);
            let bytesRead: number;
            try {
                bytesRead = this.source.read(window);
            } catch (error) {
                this.close();
                throw error;
            }
            this.scanner.commit(bytesRead);
            if (bytesRead === 0) {
                debugLog(`End of input after ${this.scanner.stats.pages} pages`);
                this.scanner.markEndOfInput();
            }
        }
    }

    private record(issue: StreamIssue): void {
        this._issues.push(issue);
        debugLog(`Stream ${issue.serial}: ${issue.kind}`, issue);
    }
}
