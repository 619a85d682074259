import { PNG } from 'pngjs';
import { ByteBuffer } from '@runejs/common';
import { Tile, TILE_PIXEL_COUNT, TILE_SIZE } from '../content/pic';
import { RGB } from '../util/colors';
import { PixelDimensionError } from '../errors';


// background run length (uint16) + colored run length (uint16)
const CHUNK_HEADER_SIZE = 4;

const COLORED_PIXEL_SIZE = 3;

// every pixel colored, one chunk per pixel at worst
const MAX_ENCODED_TILE_SIZE = TILE_PIXEL_COUNT * (CHUNK_HEADER_SIZE + COLORED_PIXEL_SIZE);


export const createPixelBuffer = (width: number, height: number): PNG => new PNG({
    width,
    height,
    colorType: 6,
    inputHasAlpha: true
});


const setPixel = (pixels: Buffer, pixelIndex: number, red: number, green: number, blue: number): void => {
    const offset = pixelIndex * 4;
    pixels[offset] = red;
    pixels[offset + 1] = green;
    pixels[offset + 2] = blue;
    pixels[offset + 3] = 0xff;
};


/**
 * A pixel counts as background when it is fully transparent or exactly matches the background color.
 */
export const isBackgroundPixel = (pixels: Buffer, pixelIndex: number, background: RGB): boolean => {
    const offset = pixelIndex * 4;
    if(pixels[offset + 3] === 0) {
        return true;
    }

    return background.matches(pixels[offset], pixels[offset + 1], pixels[offset + 2]);
};


/**
 * Decodes a tile's RLE stream into a 32x32 RGBA pixel buffer.
 *
 * The stream is a series of chunks, each a little-endian `uint16` background run length followed by a
 * `uint16` colored run length and then one RGB triplet per colored pixel. Background pixels decode as the
 * opaque background color. Decoding stops silently once the tile is full or the data runs out, any pixel
 * not reached by then is left fully transparent.
 */
export const decodeTile = (tile: Tile, background: RGB): PNG => {
    const png = createPixelBuffer(TILE_SIZE, TILE_SIZE);
    if(tile.empty) {
        return png;
    }

    const pixels = png.data;
    const tileData = new ByteBuffer(tile.data);
    const { red, green, blue } = background;
    let pixelIndex = 0;

    while(pixelIndex < TILE_PIXEL_COUNT && tileData.readable >= CHUNK_HEADER_SIZE) {
        const backgroundCount = tileData.get('short', 'unsigned', 'le');
        const coloredCount = tileData.get('short', 'unsigned', 'le');

        for(let i = 0; i < backgroundCount && pixelIndex < TILE_PIXEL_COUNT; i++) {
            setPixel(pixels, pixelIndex++, red, green, blue);
        }

        for(let i = 0; i < coloredCount && pixelIndex < TILE_PIXEL_COUNT; i++) {
            if(tileData.readable < COLORED_PIXEL_SIZE) {
                // truncated tile, leave the rest transparent
                return png;
            }

            setPixel(pixels, pixelIndex++,
                tileData.get('byte', 'unsigned'),
                tileData.get('byte', 'unsigned'),
                tileData.get('byte', 'unsigned'));
        }
    }

    return png;
};


/**
 * Compresses a 32x32 RGBA pixel buffer into a tile.
 *
 * Pixels are classified as background using an exact color match (or zero alpha) and written as
 * alternating background/colored runs. Alpha is not stored: colored pixels come back fully opaque and
 * background pixels come back as the background color.
 */
export const encodeTile = (png: PNG, background: RGB): Tile => {
    if(png.width !== TILE_SIZE || png.height !== TILE_SIZE) {
        throw new PixelDimensionError(TILE_SIZE, TILE_SIZE, png.width, png.height);
    }

    const pixels = png.data;
    const tileData = new ByteBuffer(MAX_ENCODED_TILE_SIZE);
    let pixelIndex = 0;

    while(pixelIndex < TILE_PIXEL_COUNT) {
        const backgroundStart = pixelIndex;
        while(pixelIndex < TILE_PIXEL_COUNT && isBackgroundPixel(pixels, pixelIndex, background)) {
            pixelIndex++;
        }

        const coloredStart = pixelIndex;
        while(pixelIndex < TILE_PIXEL_COUNT && !isBackgroundPixel(pixels, pixelIndex, background)) {
            pixelIndex++;
        }

        tileData.put(coloredStart - backgroundStart, 'short', 'le');
        tileData.put(pixelIndex - coloredStart, 'short', 'le');

        for(let i = coloredStart; i < pixelIndex; i++) {
            const offset = i * 4;
            tileData.put(pixels[offset]);
            tileData.put(pixels[offset + 1]);
            tileData.put(pixels[offset + 2]);
        }
    }

    return new Tile(tileData.getSlice(0, tileData.writerIndex));
};
