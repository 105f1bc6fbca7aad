import debug, { DebugCategory, DebugLogger } from "./common/debugger";
import { BufferByteSource } from "./io/byteSource";
import { DecoderOptions, OggDecoder } from "./ogg/oggDecoder";

export { OggFatalError } from "./common/errors";
export type { OggFatalErrorCode, StreamIssue, StreamIssueKind } from "./common/errors";
export type { DebugCategory, DebugLogger } from "./common/debugger";
export { BufferByteSource, ChunkedByteSource, FileByteSource } from "./io/byteSource";
export type { ByteSource } from "./io/byteSource";
export { calculateCRC } from "./ogg/oggCrc";
export { findOggStart, measureOggPage, oggPageChecksum, parseOggPage } from "./ogg/oggParsing";
export { OggSyncScanner } from "./ogg/oggSync";
export type { SyncStats } from "./ogg/oggSync";
export { OggStreamDemuxer } from "./ogg/oggStream";
export type { StreamState } from "./ogg/oggStream";
export { DEFAULT_CHUNK_SIZE, OggDecoder } from "./ogg/oggDecoder";
export type { DecoderOptions, RoutedPackets } from "./ogg/oggDecoder";
export { HEADER_FLAG_BOS, HEADER_FLAG_CONTINUED, HEADER_FLAG_EOS } from "./ogg/oggTypes";
export type { OggPacket, OggPage, PageParseFailure, PageParseResult, SyncResult } from "./ogg/oggTypes";

export const setDebug = (enabled: boolean) => {
    debug.isDebug = enabled;
};

export const setDebugCategories = (categories: DebugCategory[]) =>
    debug.enabledCategories = new Set(categories);

export const setCustomDebugLogger = (logger: DebugLogger | null) => {
    debug.customLogger = logger;
};

const debugLog = (...args: unknown[]) => debug.debugLog('index', ...args);

/**
 * Demultiplex a whole Ogg file into its logical streams.
 * @param input file contents, or a path to read them from
 * @param options decoder options
 * @returns complete packets of every logical stream, keyed by serial number, in stream order
 */
export const loadOgg = (
    input: Uint8Array | string,
    options?: DecoderOptions,
): Map<number, Uint8Array[]> => {
    const decoder = typeof input === 'string'
        ? OggDecoder.open(input, options)
        : new OggDecoder(new BufferByteSource(input), options);

    try {
        const streams = decoder.decodeAll();
        debugLog(`Loaded ${streams.size} logical streams, ${decoder.issues.length} stream issues`);
        return streams;
    } finally {
        decoder.close();
    }
};
