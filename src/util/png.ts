import { PNG } from 'pngjs';


export const pngToBuffer = (png: PNG): Buffer => PNG.sync.write(png, {
    colorType: 6,
    inputHasAlpha: true
});


/**
 * Decodes PNG file data into 8-bit RGBA pixels, whatever color type the file was saved with.
 */
export const bufferToPng = (data: Buffer): PNG => PNG.sync.read(data);
