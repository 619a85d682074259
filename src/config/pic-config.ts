import * as fs from 'graceful-fs';
import path from 'path';
import JSON5 from 'json5';
import { logger } from '@runejs/common';


export const defaultConfigFileName = 'pic-tool.json5';


export interface PicConfigOptions {
    exportFilePrefix: string;
    exportIndexPadding: number;
    exportIndexBase: number;
}


const defaultOptions: PicConfigOptions = {
    exportFilePrefix: 'image_',
    exportIndexPadding: 4,
    exportIndexBase: 1
};


const isNonNegativeInteger = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value >= 0;


export class PicConfig {

    public readonly exportFilePrefix: string;
    public readonly exportIndexPadding: number;
    public readonly exportIndexBase: number;

    public constructor(options: Partial<PicConfigOptions> = {}) {
        const { exportFilePrefix, exportIndexPadding, exportIndexBase } = { ...defaultOptions, ...options };
        this.exportFilePrefix = exportFilePrefix;
        this.exportIndexPadding = exportIndexPadding;
        this.exportIndexBase = exportIndexBase;
    }

    /**
     * Loads the tool configuration from a JSON5 file, falling back to the defaults for a missing file,
     * an unreadable file, or any individual setting of the wrong type.
     */
    public static load(configPath: string = path.join(process.cwd(), defaultConfigFileName)): PicConfig {
        if(!fs.existsSync(configPath)) {
            return new PicConfig();
        }

        let parsed: unknown;

        try {
            parsed = JSON5.parse(fs.readFileSync(configPath, 'utf-8'));
        } catch(error) {
            logger.error(`Error loading pic tool config ${configPath}:`, error);
            return new PicConfig();
        }

        return PicConfig.fromObject(parsed);
    }

    public static fromObject(value: unknown): PicConfig {
        if(typeof value !== 'object' || value === null || Array.isArray(value)) {
            return new PicConfig();
        }

        const options: Partial<PicConfigOptions> = {};

        if('exportFilePrefix' in value && typeof value.exportFilePrefix === 'string') {
            options.exportFilePrefix = value.exportFilePrefix;
        }
        if('exportIndexPadding' in value && isNonNegativeInteger(value.exportIndexPadding)) {
            options.exportIndexPadding = value.exportIndexPadding;
        }
        if('exportIndexBase' in value && isNonNegativeInteger(value.exportIndexBase)) {
            options.exportIndexBase = value.exportIndexBase;
        }

        return new PicConfig(options);
    }

    /**
     * The file name an image is exported under, e.g. `image_0001.png` for the first image.
     */
    public exportFileName(imageIndex: number): string {
        const displayIndex = String(imageIndex + this.exportIndexBase).padStart(this.exportIndexPadding, '0');
        return `${this.exportFilePrefix}${displayIndex}.png`;
    }

}
