import assert from 'node:assert';
import { describe, it } from 'node:test';

import { findOggStart, measureOggPage, oggPageChecksum, parseOggPage } from '../src/ogg/oggParsing';
import { HEADER_FLAG_BOS, HEADER_FLAG_EOS } from '../src/ogg/oggTypes';
import { concatBytes, createOggPage } from './helpers/oggPages';

describe('Ogg page parsing', () => {
    describe('findOggStart', () => {
        it('should find the capture pattern after leading junk', () => {
            const data = concatBytes(new Uint8Array([1, 2, 3]), createOggPage({ segmentTable: [4] }));
            assert.equal(findOggStart(data), 3);
        });

        it('should return -1 when there is no capture pattern', () => {
            assert.equal(findOggStart(new TextEncoder().encode('OggOggOgg')), -1);
            assert.equal(findOggStart(new Uint8Array(0)), -1);
        });

        it('should only look inside the given range', () => {
            const page = createOggPage({ segmentTable: [4] });
            const data = concatBytes(page, page);
            assert.equal(findOggStart(data, 1), page.length);
            assert.equal(findOggStart(data, 1, page.length + 3), -1);
        });
    });

    describe('measureOggPage', () => {
        it('should sum header, segment table and lacing values', () => {
            const page = createOggPage({ segmentTable: [10, 20] });
            assert.equal(measureOggPage(page, 0), 59);
        });

        it('should return null until the segment table is buffered', () => {
            const page = createOggPage({ segmentTable: [10, 20] });
            assert.equal(measureOggPage(page, 0, 26), null);
            assert.equal(measureOggPage(page, 0, 28), null);
            assert.equal(measureOggPage(page, 0, 29), 59);
        });
    });

    describe('parseOggPage', () => {
        it('should decode every header field', () => {
            const data = createOggPage({
                serialNumber: 0xdeadbeef,
                pageSequence: 7,
                headerType: HEADER_FLAG_BOS | HEADER_FLAG_EOS,
                granulePosition: BigInt(123456789),
                segmentTable: [10, 20],
            });

            const result = parseOggPage(data);
            assert.ok(result.ok);
            const { page } = result;
            assert.equal(page.version, 0);
            assert.equal(page.headerType, 0x06);
            assert.equal(page.continued, false);
            assert.equal(page.bos, true);
            assert.equal(page.eos, true);
            assert.equal(page.granulePosition, BigInt(123456789));
            assert.equal(page.serialNumber, 0xdeadbeef);
            assert.equal(page.pageSequence, 7);
            assert.equal(page.checksum, new DataView(data.buffer).getUint32(22, true));
            assert.deepStrictEqual(Array.from(page.segmentTable), [10, 20]);
            assert.equal(page.payload.length, 30);
            assert.equal(page.payload[0], 0);
            assert.equal(page.payload[29], 29);
            assert.equal(page.byteLength, 59);
        });

        it('should read a negative granule position', () => {
            const result = parseOggPage(createOggPage({ granulePosition: BigInt(-1), segmentTable: [1] }));
            assert.ok(result.ok);
            assert.equal(result.page.granulePosition, BigInt(-1));
        });

        it('should alias the input rather than copy', () => {
            const data = createOggPage({ segmentTable: [3] });
            const result = parseOggPage(data);
            assert.ok(result.ok);
            assert.equal(result.page.payload.buffer, data.buffer);
            data[28] = 99;
            assert.equal(result.page.payload[0], 99);
        });

        it('should parse at an offset', () => {
            const data = concatBytes(new Uint8Array(5), createOggPage({ pageSequence: 3, segmentTable: [2] }));
            const result = parseOggPage(data, 5);
            assert.ok(result.ok);
            assert.equal(result.page.pageSequence, 3);
            assert.deepStrictEqual(Array.from(result.page.payload), [0, 1]);
        });

        it('should reject a nonzero stream structure version', () => {
            assert.deepStrictEqual(parseOggPage(createOggPage({ version: 1, segmentTable: [1] })), {
                ok: false,
                reason: 'malformed-header',
            });
        });

        it('should report missing capture pattern and truncation', () => {
            const data = createOggPage({ segmentTable: [10] });
            assert.deepStrictEqual(parseOggPage(data, 1), { ok: false, reason: 'bad-capture' });
            assert.deepStrictEqual(parseOggPage(data, 0, data.length - 1), { ok: false, reason: 'truncated' });
            assert.deepStrictEqual(parseOggPage(data, 0, 20), { ok: false, reason: 'truncated' });
        });
    });

    describe('oggPageChecksum', () => {
        it('should match the stored checksum regardless of the field content', () => {
            const data = createOggPage({ serialNumber: 42, segmentTable: [255, 17] });
            const stored = new DataView(data.buffer).getUint32(22, true);
            assert.equal(oggPageChecksum(data, 0, data.length), stored);
        });

        it('should change when the payload changes', () => {
            const data = createOggPage({ segmentTable: [8] });
            const stored = new DataView(data.buffer).getUint32(22, true);
            data[30] ^= 0xff;
            assert.notEqual(oggPageChecksum(data, 0, data.length), stored);
        });
    });
});
