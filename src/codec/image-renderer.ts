import { PNG } from 'pngjs';
import { PicImage, Tile, TILE_SIZE } from '../content/pic';
import { PixelDimensionError } from '../errors';
import { createPixelBuffer, decodeTile, encodeTile } from './tile-codec';


/**
 * Assembles an image's decoded tiles into one RGBA pixel buffer of the image's full pixel size.
 *
 * The result is cached on the image until its tiles or background change. Grid cells without a
 * matching tile are left transparent.
 */
export const renderPicImage = (image: PicImage): PNG => {
    const cached = image.renderedPixels;
    if(cached) {
        return cached;
    }

    const { width, height, background, tiles } = image;
    const png = createPixelBuffer(image.pixelWidth, image.pixelHeight);

    const tileCount = Math.min(tiles.length, width * height);
    for(let tileIndex = 0; tileIndex < tileCount; tileIndex++) {
        const column = tileIndex % width;
        const row = Math.floor(tileIndex / width);

        decodeTile(tiles[tileIndex], background)
            .bitblt(png, 0, 0, TILE_SIZE, TILE_SIZE, column * TILE_SIZE, row * TILE_SIZE);
    }

    image.cacheRenderedPixels(png);
    return png;
};


/**
 * Re-encodes every tile of an image from a pixel buffer of exactly the image's pixel size,
 * replacing the image's tiles and dropping its render cache.
 */
export const updatePicImage = (image: PicImage, png: PNG): void => {
    const { pixelWidth, pixelHeight, width, height, background } = image;

    if(png.width !== pixelWidth || png.height !== pixelHeight) {
        throw new PixelDimensionError(pixelWidth, pixelHeight, png.width, png.height);
    }

    const tiles: Tile[] = new Array(width * height);

    for(let row = 0; row < height; row++) {
        for(let column = 0; column < width; column++) {
            const tilePixels = createPixelBuffer(TILE_SIZE, TILE_SIZE);
            png.bitblt(tilePixels, column * TILE_SIZE, row * TILE_SIZE, TILE_SIZE, TILE_SIZE, 0, 0);
            tiles[row * width + column] = encodeTile(tilePixels, background);
        }
    }

    image.replaceTiles(tiles);
};
