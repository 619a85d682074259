import path from 'path';
import { logger } from '@runejs/common';
import { Pic } from '../content/pic';
import { PicConfig } from '../config/pic-config';
import { exportAllPngs, exportImagePng, importImagePng, loadPic, savePic } from '../fs/pic-store';


export interface InfoOptions {
    file: string;
}


export interface ExportOptions {
    file: string;
    out: string;
    image?: number;
    config?: string;
}


export interface ImportOptions {
    file: string;
    image: number;
    png: string;
    out?: string;
}


export interface RepackOptions {
    file: string;
    out?: string;
}


export const formatSignature = (signature: number): string =>
    `0x${signature.toString(16).toUpperCase().padStart(8, '0')}`;


/**
 * A human readable summary of an archive, one line per entry.
 */
export const describePic = (pic: Pic): string[] => {
    const lines = [
        `Signature: ${formatSignature(pic.signature)}`,
        `Images: ${pic.imageCount}`
    ];

    pic.images.forEach((image, imageIndex) => {
        lines.push(`[${imageIndex}] ${image.width}x${image.height} tiles, ` +
            `${image.pixelWidth}x${image.pixelHeight} pixels, ` +
            `background ${image.background}, ${image.dataSize} bytes`);
    });

    return lines;
};


export const showInfo = ({ file }: InfoOptions): void => {
    describePic(loadPic(file)).forEach(line => logger.info(line));
};


export const exportImages = ({ file, out, image, config }: ExportOptions): string[] => {
    const picConfig = PicConfig.load(config);
    const pic = loadPic(file);

    if(image === undefined) {
        return exportAllPngs(pic, out, picConfig);
    }

    const exportedPath = exportImagePng(pic, image, path.join(out, picConfig.exportFileName(image)));
    logger.info(`Exported image ${image} to ${exportedPath}.`);
    return [ exportedPath ];
};


export const importImage = ({ file, image, png, out }: ImportOptions): string => {
    const pic = loadPic(file);
    importImagePng(pic, image, png);
    return savePic(pic, out);
};


export const repack = ({ file, out }: RepackOptions): string => savePic(loadPic(file), out);
