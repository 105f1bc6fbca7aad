import assert from 'node:assert';
import { describe, it } from 'node:test';

import { calculateCRC, updateCRC, updateCRCZeros } from '../src/ogg/oggCrc';

const encode = (text: string) => new TextEncoder().encode(text);

describe('Ogg CRC', () => {
    it('should return 0 for empty input', () => {
        assert.equal(calculateCRC(new Uint8Array(0)), 0);
    });

    it('should use the unreflected 0x04c11db7 polynomial with zero initial value', () => {
        assert.equal(calculateCRC(encode('Hello World')), 835807244);
        assert.equal(calculateCRC(encode('123456789')), 0x89a1897f);
    });

    it('should leave the CRC at 0 for leading zero bytes', () => {
        assert.equal(calculateCRC(new Uint8Array([0, 0, 0])), 0);
    });

    it('should give the same result fed in pieces', () => {
        const data = encode('OggS page body spread over calls');
        let crc = updateCRC(0, data, 0, 5);
        crc = updateCRC(crc, data, 5, 17);
        crc = updateCRC(crc, data, 17);
        assert.equal(crc, calculateCRC(data));
    });

    it('should treat zero runs like literal zero bytes', () => {
        const head = encode('header');
        const withZeros = new Uint8Array(head.length + 4);
        withZeros.set(head);
        assert.equal(updateCRCZeros(calculateCRC(head), 4), calculateCRC(withZeros));
    });
});
