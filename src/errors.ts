/**
 * Base class for every error raised by the pic archive tooling.
 */
export class PicError extends Error {

    public constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

}


/**
 * The buffer (or the in-memory model being written) does not follow the pic archive layout.
 */
export class PicFormatError extends PicError {
}


/**
 * The archive carries the signature of an older generation of the format that is not supported.
 * Deliberately not a {@link PicFormatError} so that callers can tell it apart from corruption.
 */
export class UnsupportedVersionError extends PicError {

    public readonly signature: number;

    public constructor(signature: number) {
        super(`Pic archives with signature 0x${signature.toString(16).padStart(8, '0')} ` +
            `belong to an older, unsupported generation of the format.`);
        this.signature = signature;
    }

}


export class PicFileNotFoundError extends PicError {

    public readonly filePath: string;

    public constructor(filePath: string) {
        super(`Pic archive not found: ${filePath}`);
        this.filePath = filePath;
    }

}


/**
 * A pixel buffer was supplied whose dimensions differ from the ones required.
 */
export class PixelDimensionError extends PicError {

    public readonly expectedWidth: number;
    public readonly expectedHeight: number;
    public readonly actualWidth: number;
    public readonly actualHeight: number;

    public constructor(expectedWidth: number, expectedHeight: number,
                       actualWidth: number, actualHeight: number) {
        super(`Expected a ${expectedWidth}x${expectedHeight} pixel buffer, ` +
            `received ${actualWidth}x${actualHeight}.`);
        this.expectedWidth = expectedWidth;
        this.expectedHeight = expectedHeight;
        this.actualWidth = actualWidth;
        this.actualHeight = actualHeight;
    }

}


export class ImageIndexError extends PicError {

    public readonly index: number;
    public readonly imageCount: number;

    public constructor(index: number, imageCount: number) {
        super(`Image index ${index} is out of range, the archive holds ${imageCount} image(s).`);
        this.index = index;
        this.imageCount = imageCount;
    }

}
