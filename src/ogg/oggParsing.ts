import {
    HEADER_FLAG_BOS,
    HEADER_FLAG_CONTINUED,
    HEADER_FLAG_EOS,
    OGG_CHECKSUM_OFFSET,
    OGG_HEADER_SIZE,
    OGG_SEGMENT_COUNT_OFFSET,
    PageParseResult,
} from "./oggTypes";
import { updateCRC, updateCRCZeros } from "./oggCrc";
import debug from "../common/debugger";

const debugLog = (...args: unknown[]) => debug.debugLog('parser', ...args);

const isCapturePattern = (data: Uint8Array, offset: number): boolean =>
    data[offset] === 0x4f && data[offset + 1] === 0x67 &&
    data[offset + 2] === 0x67 && data[offset + 3] === 0x53;

/**
 * Scan for the next "OggS" capture pattern in `data[from..to)`
 * @returns position of the pattern or -1 if not found
 */
export const findOggStart = (data: Uint8Array, from = 0, to = data.length): number => {
    for (let i = from; i <= to - 4; i++) {
        if (isCapturePattern(data, i)) {
            return i;
        }
    }
    return -1; // Not found
};

/**
 * Framed size of the page whose header starts at `offset`, read from its segment table.
 * @returns total page length, or null while the header and segment table are not all within `end`
 */
export const measureOggPage = (data: Uint8Array, offset: number, end = data.length): number | null => {
    if (offset + OGG_HEADER_SIZE > end) return null;

    const segments = data[offset + OGG_SEGMENT_COUNT_OFFSET];
    if (offset + OGG_HEADER_SIZE + segments > end) return null;

    let bodySize = 0;
    for (let i = 0; i < segments; i++) {
        bodySize += data[offset + OGG_HEADER_SIZE + i];
    }

    return OGG_HEADER_SIZE + segments + bodySize;
};

/**
 * CRC of a framed page computed as if its checksum field were zero
 */
export const oggPageChecksum = (data: Uint8Array, offset: number, pageSize: number): number => {
    let crc = updateCRC(0, data, offset, offset + OGG_CHECKSUM_OFFSET);
    crc = updateCRCZeros(crc, 4);
    return updateCRC(crc, data, offset + OGG_CHECKSUM_OFFSET + 4, offset + pageSize);
};

/**
 * Decode the page framed at `offset`. The checksum is read but not verified here.
 * Segment table and payload alias `data`.
 */
export const parseOggPage = (data: Uint8Array, offset = 0, end = data.length): PageParseResult => {
    if (offset + 4 > end || !isCapturePattern(data, offset)) {
        return { ok: false, reason: 'bad-capture' };
    }

    const pageSize = measureOggPage(data, offset, end);
    if (pageSize === null || offset + pageSize > end) {
        return { ok: false, reason: 'truncated' };
    }

    const version = data[offset + 4];
    if (version !== 0) {
        debugLog(`Unsupported stream structure version ${version} at offset ${offset}`);
        return { ok: false, reason: 'malformed-header' };
    }

    const view = new DataView(data.buffer, data.byteOffset + offset, pageSize);

    const headerType = data[offset + 5];
    const segments = data[offset + OGG_SEGMENT_COUNT_OFFSET];
    const bodyStart = offset + OGG_HEADER_SIZE + segments;

    return {
        ok: true,
        page: {
            version,
            headerType,
            continued: (headerType & HEADER_FLAG_CONTINUED) !== 0,
            bos: (headerType & HEADER_FLAG_BOS) !== 0,
            eos: (headerType & HEADER_FLAG_EOS) !== 0,
            granulePosition: view.getBigInt64(6, true),
            serialNumber: view.getUint32(14, true),
            pageSequence: view.getUint32(18, true),
            checksum: view.getUint32(OGG_CHECKSUM_OFFSET, true),
            segmentTable: data.subarray(offset + OGG_HEADER_SIZE, bodyStart),
            payload: data.subarray(bodyStart, offset + pageSize),
            byteLength: pageSize,
        },
    };
};
