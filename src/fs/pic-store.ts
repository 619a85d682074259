import path from 'path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'graceful-fs';
import { logger } from '@runejs/common';
import { Pic, PicImage } from '../content/pic';
import { readPic } from '../codec/pic-reader';
import { writePic } from '../codec/pic-writer';
import { renderPicImage, updatePicImage } from '../codec/image-renderer';
import { PicConfig } from '../config/pic-config';
import { bufferToPng, pngToBuffer } from '../util/png';
import { ImageIndexError, PicError, PicFileNotFoundError } from '../errors';


const findImage = (pic: Pic, imageIndex: number): PicImage => {
    const image = pic.getImage(imageIndex);
    if(!image) {
        throw new ImageIndexError(imageIndex, pic.imageCount);
    }

    return image;
};


export const loadPic = (filePath: string): Pic => {
    const resolvedPath = path.resolve(filePath);

    if(!existsSync(resolvedPath)) {
        throw new PicFileNotFoundError(resolvedPath);
    }

    const pic = readPic(readFileSync(resolvedPath), resolvedPath);

    logger.info(`Loaded ${pic.imageCount} image(s) from ${resolvedPath}.`);

    return pic;
};


/**
 * Writes the archive to `filePath`, or back to where it was loaded from when no path is given.
 * I/O errors are not caught.
 */
export const savePic = (pic: Pic, filePath?: string): string => {
    const targetPath = filePath ?? pic.filePath;
    if(!targetPath) {
        throw new PicError(`No file path was given and the pic archive was not loaded from disk.`);
    }

    const resolvedPath = path.resolve(targetPath);
    const data = writePic(pic);

    writeFileSync(resolvedPath, data);

    pic.filePath = resolvedPath;
    pic.images.forEach(image => {
        image.modified = false;
    });

    logger.info(`Saved ${pic.imageCount} image(s) to ${resolvedPath} (${data.length} bytes).`);

    return resolvedPath;
};


export const exportImagePng = (pic: Pic, imageIndex: number, filePath: string): string => {
    const image = findImage(pic, imageIndex);
    const resolvedPath = path.resolve(filePath);

    mkdirSync(path.dirname(resolvedPath), { recursive: true });
    writeFileSync(resolvedPath, pngToBuffer(renderPicImage(image)));

    return resolvedPath;
};


export const exportAllPngs = (pic: Pic, outputDir: string, config: PicConfig = new PicConfig()): string[] => {
    const resolvedDir = path.resolve(outputDir);
    const exportedPaths = pic.images.map((_, imageIndex) =>
        exportImagePng(pic, imageIndex, path.join(resolvedDir, config.exportFileName(imageIndex))));

    logger.info(`Exported ${exportedPaths.length} image(s) to ${resolvedDir}.`);

    return exportedPaths;
};


/**
 * Replaces an image's contents with the pixels of a PNG file, which must match the image's pixel size.
 */
export const importImagePng = (pic: Pic, imageIndex: number, filePath: string): PicImage => {
    const image = findImage(pic, imageIndex);
    const resolvedPath = path.resolve(filePath);

    updatePicImage(image, bufferToPng(readFileSync(resolvedPath)));

    logger.info(`Image ${imageIndex} replaced with ${resolvedPath}.`);

    return image;
};
