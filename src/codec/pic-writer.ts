import { ByteBuffer } from '@runejs/common';
import {
    IMAGE_HEADER_SIZE,
    MAX_IMAGE_COUNT,
    MAX_IMAGE_DIMENSION,
    MAX_TILE_DATA_LENGTH,
    Pic,
    PIC_HEADER_SIZE,
    PicImage,
    TILE_LENGTH_SIZE,
    TILE_OFFSET_SIZE
} from '../content/pic';
import { PicFormatError } from '../errors';


const validateImage = (image: PicImage, imageIndex: number): void => {
    const { width, height, tiles } = image;

    if(!Number.isInteger(width) || width < 0 || width > MAX_IMAGE_DIMENSION ||
        !Number.isInteger(height) || height < 0 || height > MAX_IMAGE_DIMENSION) {
        throw new PicFormatError(`Image ${imageIndex} has an invalid ${width}x${height} tile grid, ` +
            `both dimensions must be between 0 and ${MAX_IMAGE_DIMENSION}.`);
    }

    if(tiles.length !== image.tileCount) {
        throw new PicFormatError(`Image ${imageIndex} holds ${tiles.length} tiles ` +
            `but its ${width}x${height} grid requires ${image.tileCount}.`);
    }

    tiles.forEach((tile, tileIndex) => {
        if(tile.size > MAX_TILE_DATA_LENGTH) {
            throw new PicFormatError(`Image ${imageIndex} tile ${tileIndex} holds ${tile.size} bytes, ` +
                `the format allows at most ${MAX_TILE_DATA_LENGTH}.`);
        }
    });
};


const validatePic = (pic: Pic): void => {
    const { signature, images } = pic;

    if(!Number.isInteger(signature) || signature < 0 || signature > 0xFFFFFFFF) {
        throw new PicFormatError(`Pic signature ${signature} does not fit in an unsigned 32-bit integer.`);
    }

    if(images.length > MAX_IMAGE_COUNT) {
        throw new PicFormatError(`Pic archives hold at most ${MAX_IMAGE_COUNT} images, ` +
            `${images.length} were found.`);
    }

    images.forEach((image, imageIndex) => validateImage(image, imageIndex));
};


/**
 * The size of every image header and tile offset table, which is where tile data begins.
 */
export const calculateHeaderSize = (pic: Pic): number =>
    pic.images.reduce((size, image) =>
        size + IMAGE_HEADER_SIZE + image.tiles.length * TILE_OFFSET_SIZE, PIC_HEADER_SIZE);


export const calculatePicSize = (pic: Pic): number =>
    pic.images.reduce((size, image) =>
        image.tiles.reduce((imageSize, tile) =>
            imageSize + TILE_LENGTH_SIZE + tile.size, size), calculateHeaderSize(pic));


/**
 * Serializes a pic archive.
 *
 * The output layout is always canonical: all image headers and offset tables come first, followed by
 * the length-prefixed data of every tile, in image order and then row-major tile order.
 */
export const writePic = (pic: Pic): Buffer => {
    validatePic(pic);

    const picData = new ByteBuffer(calculatePicSize(pic));

    picData.put(pic.signature, 'int', 'le');
    picData.put(pic.images.length, 'short', 'le');

    let tileDataOffset = calculateHeaderSize(pic);

    for(const image of pic.images) {
        const { width, height, background } = image;

        picData.put(width);
        picData.put(height);
        picData.put(background.red);
        picData.put(background.green);
        picData.put(background.blue);

        for(const tile of image.tiles) {
            picData.put(tileDataOffset, 'int', 'le');

            const headerIndex = picData.writerIndex;
            picData.writerIndex = tileDataOffset;
            picData.put(tile.size, 'short', 'le');
            picData.set(tile.data, picData.writerIndex);

            tileDataOffset = picData.writerIndex + tile.size;
            picData.writerIndex = headerIndex;
        }
    }

    return Buffer.from(picData);
};
