export const OGG_HEADER_SIZE = 27;
export const OGG_CHECKSUM_OFFSET = 22;
export const OGG_SEGMENT_COUNT_OFFSET = 26;

export const HEADER_FLAG_CONTINUED = 0x01;
export const HEADER_FLAG_BOS = 0x02;
export const HEADER_FLAG_EOS = 0x04;

/**
 * A framed Ogg page.
 *
 * `segmentTable` and `payload` are views into the scanner buffer; they stay
 * valid until the scanner is asked for more room. Copy them to keep them longer.
 */
export type OggPage = {
    version: number,
    headerType: number,
    continued: boolean,
    bos: boolean,
    eos: boolean,
    granulePosition: bigint,
    serialNumber: number,
    pageSequence: number,
    checksum: number,
    segmentTable: Uint8Array,
    payload: Uint8Array,
    byteLength: number,
}

export type OggPacket = {
    serialNumber: number,
    data: Uint8Array,
    isFirstInStream: boolean,
    isLastInStream: boolean,
    /** Granule of the page that completed this packet, or -1 if more packets completed after it on that page */
    granulePosition: bigint,
    packetNumber: number,
}

export type PageParseFailure = 'bad-capture' | 'truncated' | 'malformed-header';

export type PageParseResult =
    | { ok: true, page: OggPage }
    | { ok: false, reason: PageParseFailure };

export type SyncResult =
    | { status: 'page', page: OggPage }
    | { status: 'need-data' }
    | { status: 'end' };
