/**
 * A single RLE compressed tile of 32 x 32 pixels.
 */
export class Tile {

    public readonly data: Buffer;

    public constructor(data?: Buffer | Uint8Array) {
        this.data = data ? Buffer.from(data) : Buffer.alloc(0);
    }

    public get size(): number {
        return this.data.length;
    }

    public get empty(): boolean {
        return this.data.length === 0;
    }

}
