import { calculateCRC } from '../../src/ogg/oggCrc';

export interface PageSpec {
    serialNumber?: number;
    pageSequence?: number;
    headerType?: number;
    granulePosition?: bigint;
    segmentTable: number[];
    /** Defaults to bytes counting up from `fill`, sized by the segment table */
    payload?: Uint8Array;
    fill?: number;
    version?: number;
}

/**
 * Frame one Ogg page with a correct checksum.
 */
export const createOggPage = (options: PageSpec): Uint8Array => {
    const bodySize = options.segmentTable.reduce((sum, lacing) => sum + lacing, 0);
    const body = options.payload ?? sequentialBytes(bodySize, options.fill ?? 0);
    if (body.length !== bodySize) {
        throw new Error(`Payload is ${body.length} bytes, segment table says ${bodySize}`);
    }

    const segments = options.segmentTable.length;
    const page = new Uint8Array(27 + segments + bodySize);
    const view = new DataView(page.buffer);

    // OggS magic
    page.set([0x4f, 0x67, 0x67, 0x53], 0);
    page[4] = options.version ?? 0;
    page[5] = options.headerType ?? 0;
    view.setBigInt64(6, options.granulePosition ?? BigInt(0), true);
    view.setUint32(14, options.serialNumber ?? 1, true);
    view.setUint32(18, options.pageSequence ?? 0, true);
    view.setUint32(22, 0, true);
    page[26] = segments;
    page.set(options.segmentTable, 27);
    page.set(body, 27 + segments);

    view.setUint32(22, calculateCRC(page), true);
    return page;
};

/**
 * Lacing values for one packet of `size` bytes
 */
export const lacePacket = (size: number): number[] => {
    const table = new Array<number>(Math.floor(size / 255)).fill(255);
    table.push(size % 255);
    return table;
};

export const sequentialBytes = (size: number, start = 0): Uint8Array => {
    const bytes = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
        bytes[i] = (start + i) & 0xff;
    }
    return bytes;
};

export const concatBytes = (...parts: Uint8Array[]): Uint8Array => {
    const total = parts.reduce((sum, p) => sum + p.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
        result.set(part, offset);
        offset += part.length;
    }
    return result;
};
