import { describe, it, expect } from 'vitest';
import { readPic } from './pic-reader';
import { PicFormatError, UnsupportedVersionError } from '../errors';


const header = (signature: number, imageCount: number): Buffer => {
    const data = Buffer.alloc(6);
    data.writeUInt32LE(signature, 0);
    data.writeUInt16LE(imageCount, 4);
    return data;
};

const offsets = (...values: number[]): Buffer => {
    const data = Buffer.alloc(values.length * 4);
    values.forEach((value, i) => data.writeUInt32LE(value, i * 4));
    return data;
};


describe('readPic', () => {

    it('rejects buffers smaller than the archive header', () => {
        expect(() => readPic(Buffer.alloc(5))).toThrow(PicFormatError);
    });

    it('rejects the legacy signature before reading the image count', () => {
        const data = header(0x01FD0302, 0xFFFF);

        expect(() => readPic(data)).toThrow(UnsupportedVersionError);
    });

    it('does not report the legacy signature as a format error', () => {
        let caught: unknown;
        try {
            readPic(header(0x01FD0302, 0));
        } catch(error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(UnsupportedVersionError);
        expect(caught).not.toBeInstanceOf(PicFormatError);
    });

    it('reads an archive without images', () => {
        const pic = readPic(header(0x12345678, 0), '/tmp/empty.pic');

        expect(pic.signature).toBe(0x12345678);
        expect(pic.imageCount).toBe(0);
        expect(pic.filePath).toBe('/tmp/empty.pic');
    });

    it('reads image headers and follows tile offsets in any order', () => {
        // 6 byte archive header + 5 byte image header + 2 offsets puts tile data at byte 19
        const data = Buffer.concat([
            header(0x0A0B0C0D, 1),
            Buffer.from([ 2, 1, 10, 20, 30 ]),
            offsets(23, 19),
            Buffer.from([ 0x02, 0x00, 0xAA, 0xBB ]),
            Buffer.from([ 0x03, 0x00, 0x01, 0x02, 0x03 ])
        ]);

        const pic = readPic(data);
        const image = pic.images[0];

        expect(pic.imageCount).toBe(1);
        expect(image.width).toBe(2);
        expect(image.height).toBe(1);
        expect(image.background.toTuple()).toEqual([ 10, 20, 30 ]);
        expect(image.modified).toBe(false);
        expect(image.tiles.map(tile => Array.from(tile.data))).toEqual([
            [ 0x01, 0x02, 0x03 ],
            [ 0xAA, 0xBB ]
        ]);
    });

    it('allows several tiles to share the same data', () => {
        const data = Buffer.concat([
            header(1, 1),
            Buffer.from([ 1, 2, 0, 0, 0 ]),
            offsets(19, 19),
            Buffer.from([ 0x01, 0x00, 0x7F ])
        ]);

        const pic = readPic(data);

        expect(pic.images[0].tiles.map(tile => Array.from(tile.data))).toEqual([ [ 0x7F ], [ 0x7F ] ]);
    });

    it('reads consecutive image headers', () => {
        // headers end at 6 + 9 + 9 = 24
        const data = Buffer.concat([
            header(1, 2),
            Buffer.from([ 1, 1, 255, 0, 255 ]),
            offsets(24),
            Buffer.from([ 1, 1, 0, 0, 0 ]),
            offsets(27),
            Buffer.from([ 0x01, 0x00, 0x11 ]),
            Buffer.from([ 0x00, 0x00 ])
        ]);

        const pic = readPic(data);

        expect(pic.imageCount).toBe(2);
        expect(Array.from(pic.images[0].tiles[0].data)).toEqual([ 0x11 ]);
        expect(pic.images[1].background.toTuple()).toEqual([ 0, 0, 0 ]);
        expect(pic.images[1].tiles[0].size).toBe(0);
    });

    it('rejects a truncated image header', () => {
        const data = Buffer.concat([ header(1, 1), Buffer.from([ 1, 1, 0 ]) ]);

        expect(() => readPic(data)).toThrow(PicFormatError);
    });

    it('rejects a truncated tile offset table', () => {
        const data = Buffer.concat([ header(1, 1), Buffer.from([ 2, 2, 0, 0, 0 ]), offsets(0) ]);

        expect(() => readPic(data)).toThrow(PicFormatError);
    });

    it('rejects tile offsets past the end of the file', () => {
        const data = Buffer.concat([ header(1, 1), Buffer.from([ 1, 1, 0, 0, 0 ]), offsets(500) ]);

        expect(() => readPic(data)).toThrow(PicFormatError);
    });

    it('rejects tile data that runs past the end of the file', () => {
        const data = Buffer.concat([
            header(1, 1),
            Buffer.from([ 1, 1, 0, 0, 0 ]),
            offsets(15),
            Buffer.from([ 0x08, 0x00, 0x01 ])
        ]);

        expect(() => readPic(data)).toThrow(PicFormatError);
    });

    it('accepts plain byte arrays', () => {
        const pic = readPic(new Uint8Array([ 1, 0, 0, 0, 0, 0 ]));

        expect(pic.signature).toBe(1);
        expect(pic.filePath).toBeNull();
    });

});
