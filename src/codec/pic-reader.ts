import { ByteBuffer, logger } from '@runejs/common';
import {
    IMAGE_HEADER_SIZE,
    LEGACY_SIGNATURE,
    Pic,
    PIC_HEADER_SIZE,
    PicImage,
    Tile,
    TILE_LENGTH_SIZE,
    TILE_OFFSET_SIZE
} from '../content/pic';
import { RGB } from '../util/colors';
import { PicFormatError, UnsupportedVersionError } from '../errors';


const readImage = (picData: ByteBuffer, rawData: Buffer, imageIndex: number): PicImage => {
    if(picData.readable < IMAGE_HEADER_SIZE) {
        throw new PicFormatError(`Image ${imageIndex} header is truncated at byte ${picData.readerIndex}.`);
    }

    const width = picData.get('byte', 'unsigned');
    const height = picData.get('byte', 'unsigned');
    const background = new RGB(
        picData.get('byte', 'unsigned'),
        picData.get('byte', 'unsigned'),
        picData.get('byte', 'unsigned')
    );

    const tileCount = width * height;

    if(tileCount === 0) {
        logger.warn(`Image ${imageIndex} has an empty ${width}x${height} tile grid.`);
    }

    if(picData.readable < tileCount * TILE_OFFSET_SIZE) {
        throw new PicFormatError(`Image ${imageIndex} tile offset table is truncated, ` +
            `expected ${tileCount} offsets at byte ${picData.readerIndex}.`);
    }

    const tileOffsets: number[] = new Array(tileCount);
    for(let i = 0; i < tileCount; i++) {
        tileOffsets[i] = picData.get('int', 'unsigned', 'le');
    }

    // Tiles are looked up through the offset table alone, they may sit anywhere in the file
    // in any order and may even share data.
    const headerEnd = picData.readerIndex;
    const tiles = tileOffsets.map((tileOffset, tileIndex) => {
        if(tileOffset + TILE_LENGTH_SIZE > rawData.length) {
            throw new PicFormatError(`Image ${imageIndex} tile ${tileIndex} offset ${tileOffset} ` +
                `lies beyond the end of the file (${rawData.length} bytes).`);
        }

        picData.readerIndex = tileOffset;
        const tileLength = picData.get('short', 'unsigned', 'le');
        const tileDataStart = picData.readerIndex;

        if(tileDataStart + tileLength > rawData.length) {
            throw new PicFormatError(`Image ${imageIndex} tile ${tileIndex} declares ${tileLength} bytes ` +
                `of data at byte ${tileDataStart}, which runs past the end of the file.`);
        }

        return new Tile(rawData.subarray(tileDataStart, tileDataStart + tileLength));
    });

    picData.readerIndex = headerEnd;

    return new PicImage({ width, height, background, tiles });
};


/**
 * Parses a pic archive. Tile payloads are kept compressed, decoding them is left to the tile codec.
 */
export const readPic = (data: Buffer | Uint8Array, filePath: string | null = null): Pic => {
    const rawData = Buffer.isBuffer(data) ? data : Buffer.from(data);

    if(rawData.length < PIC_HEADER_SIZE) {
        throw new PicFormatError(`Pic archive is too small, ${rawData.length} bytes found ` +
            `but at least ${PIC_HEADER_SIZE} are required.`);
    }

    const picData = new ByteBuffer(rawData);

    const signature = picData.get('int', 'unsigned', 'le');
    if(signature === LEGACY_SIGNATURE) {
        throw new UnsupportedVersionError(signature);
    }

    const imageCount = picData.get('short', 'unsigned', 'le');
    const images: PicImage[] = new Array(imageCount);

    for(let i = 0; i < imageCount; i++) {
        images[i] = readImage(picData, rawData, i);
    }

    return new Pic(signature, images, filePath);
};
