import { PNG } from 'pngjs';
import { RGB } from '../../util/colors';
import { TILE_LENGTH_SIZE, TILE_OFFSET_SIZE, TILE_SIZE } from './format';
import { Tile } from './tile';


export interface PicImageOptions {
    width?: number;
    height?: number;
    background?: RGB;
    tiles?: readonly Tile[];
}


/**
 * One image within a pic archive, stored as a grid of `width` x `height` tiles.
 *
 * Tiles are kept in row-major order: tile `i` sits at row `floor(i / width)` and column `i % width`.
 *
 * The image also owns a cache of its fully rendered pixels, filled lazily by the image renderer and
 * dropped whenever the tiles or background color change. Neither the cache nor the `modified` flag
 * are part of the archive format.
 */
export class PicImage {

    public readonly width: number;
    public readonly height: number;

    public modified: boolean = false;

    private _background: RGB;
    private _tiles: Tile[];
    private _renderedPixels: PNG | null = null;

    public constructor(options: PicImageOptions = {}) {
        this.width = options.width ?? 1;
        this.height = options.height ?? 1;
        this._background = options.background ?? new RGB(255, 0, 255);
        this._tiles = [ ...(options.tiles ?? []) ];
    }

    /**
     * Swaps out the image's entire tile sequence, flagging the image as modified.
     */
    public replaceTiles(tiles: readonly Tile[]): void {
        this._tiles = [ ...tiles ];
        this.invalidateCache();
    }

    public invalidateCache(): void {
        this._renderedPixels = null;
        this.modified = true;
    }

    public cacheRenderedPixels(png: PNG): void {
        this._renderedPixels = png;
    }

    public get renderedPixels(): PNG | null {
        return this._renderedPixels;
    }

    public get tiles(): readonly Tile[] {
        return this._tiles;
    }

    public get background(): RGB {
        return this._background;
    }

    public set background(background: RGB) {
        if(this._background.equals(background)) {
            return;
        }

        this._background = background;
        this.invalidateCache();
    }

    public get tileCount(): number {
        return this.width * this.height;
    }

    public get pixelWidth(): number {
        return this.width * TILE_SIZE;
    }

    public get pixelHeight(): number {
        return this.height * TILE_SIZE;
    }

    /**
     * The number of bytes this image's tiles occupy on disk, offset table entries included.
     */
    public get dataSize(): number {
        return this._tiles.reduce((size, tile) =>
            size + TILE_OFFSET_SIZE + TILE_LENGTH_SIZE + tile.size, 0);
    }

}
