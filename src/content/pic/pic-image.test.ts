import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import { Pic } from './pic';
import { PicImage } from './pic-image';
import { Tile } from './tile';
import { RGB } from '../../util/colors';


describe('PicImage', () => {

    it('defaults to a single magenta tile grid', () => {
        const image = new PicImage();

        expect(image.width).toBe(1);
        expect(image.height).toBe(1);
        expect(image.background.toTuple()).toEqual([ 255, 0, 255 ]);
        expect(image.tiles).toEqual([]);
        expect(image.modified).toBe(false);
    });

    it('derives pixel dimensions from the tile grid', () => {
        const image = new PicImage({ width: 3, height: 2 });

        expect(image.tileCount).toBe(6);
        expect(image.pixelWidth).toBe(96);
        expect(image.pixelHeight).toBe(64);
    });

    it('counts offset, length and payload bytes in its data size', () => {
        const image = new PicImage({
            width: 2,
            height: 1,
            tiles: [ new Tile(Buffer.from([ 1, 2, 3 ])), new Tile() ]
        });

        expect(image.dataSize).toBe((4 + 2 + 3) + (4 + 2));
    });

    it('drops the render cache and flags itself modified when tiles are replaced', () => {
        const image = new PicImage();
        image.cacheRenderedPixels(new PNG({ width: 32, height: 32 }));

        image.replaceTiles([ new Tile() ]);

        expect(image.renderedPixels).toBeNull();
        expect(image.modified).toBe(true);
        expect(image.tiles).toHaveLength(1);
    });

    it('keeps its own copy of the tiles it is given', () => {
        const initial = [ new Tile() ];
        const image = new PicImage({ tiles: initial });
        initial.push(new Tile());

        expect(image.tiles).toHaveLength(1);

        const replacement = [ new Tile(Buffer.from([ 1 ])) ];
        image.replaceTiles(replacement);
        image.modified = false;
        const png = new PNG({ width: 32, height: 32 });
        image.cacheRenderedPixels(png);

        replacement.push(new Tile());
        replacement[0] = new Tile();

        expect(image.tiles).toHaveLength(1);
        expect(Array.from(image.tiles[0].data)).toEqual([ 1 ]);
        expect(image.renderedPixels).toBe(png);
        expect(image.modified).toBe(false);
    });

    it('only invalidates the cache when the background actually changes', () => {
        const image = new PicImage({ background: new RGB(1, 2, 3) });
        const png = new PNG({ width: 32, height: 32 });
        image.cacheRenderedPixels(png);

        image.background = new RGB(1, 2, 3);
        expect(image.renderedPixels).toBe(png);
        expect(image.modified).toBe(false);

        image.background = new RGB(3, 2, 1);
        expect(image.renderedPixels).toBeNull();
        expect(image.modified).toBe(true);
    });

});


describe('Pic', () => {

    it('looks up images by index', () => {
        const first = new PicImage();
        const pic = new Pic(1, [ first ]);

        expect(pic.imageCount).toBe(1);
        expect(pic.getImage(0)).toBe(first);
        expect(pic.getImage(1)).toBeNull();
        expect(pic.getImage(-1)).toBeNull();
        expect(pic.getImage(0.5)).toBeNull();
    });

    it('reports modification when any image is modified', () => {
        const pic = new Pic(1, [ new PicImage(), new PicImage() ]);
        expect(pic.isModified()).toBe(false);

        pic.images[1].invalidateCache();

        expect(pic.isModified()).toBe(true);
    });

});
