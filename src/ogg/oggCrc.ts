// CRC32 lookup table, Ogg polynomial 0x04c11db7, unreflected
const makeCRCTable = (): Uint32Array => {
    const table = new Uint32Array(256);
    for (let i = 0; i < 256; i++) {
        let c = i << 24;
        for (let j = 0; j < 8; j++) {
            c = c & 0x80000000 ? (c << 1) ^ 0x04c11db7 : c << 1;
        }
        table[i] = c >>> 0;
    }
    return table;
};

const crcTable: Uint32Array = makeCRCTable();

/**
 * Feed `data[start..end)` into a running Ogg CRC
 */
export const updateCRC = (crc: number, data: Uint8Array, start = 0, end = data.length): number => {
    for (let i = start; i < end; i++) {
        crc = ((crc << 8) ^ crcTable[((crc >>> 24) ^ data[i]) & 0xff]) >>> 0;
    }
    return crc;
};

/**
 * Feed `count` zero bytes into a running Ogg CRC
 */
export const updateCRCZeros = (crc: number, count: number): number => {
    for (let i = 0; i < count; i++) {
        crc = ((crc << 8) ^ crcTable[(crc >>> 24) & 0xff]) >>> 0;
    }
    return crc;
};

export const calculateCRC = (data: Uint8Array): number => updateCRC(0, data);
