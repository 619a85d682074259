import { PicImage } from './pic-image';


export class Pic {

    public signature: number;
    public readonly images: PicImage[];
    public filePath: string | null;

    public constructor(signature: number = 0, images: PicImage[] = [], filePath: string | null = null) {
        this.signature = signature;
        this.images = images;
        this.filePath = filePath;
    }

    public getImage(index: number): PicImage | null {
        if(!Number.isInteger(index) || index < 0 || index >= this.images.length) {
            return null;
        }

        return this.images[index] ?? null;
    }

    public isModified(): boolean {
        return this.images.some(image => image.modified);
    }

    public get imageCount(): number {
        return this.images.length;
    }

}
