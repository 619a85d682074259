#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import yargs from 'yargs/yargs';
import { logger } from '@runejs/common';
import { exportImages, importImage, repack, showInfo } from './commands';


const timed = (name: string, executor: () => void) => (): void => {
    const start = Date.now();

    try {
        executor();
    } catch(error) {
        logger.error(`${name} failed:`, error);
        process.exitCode = 1;
        return;
    }

    const end = Date.now();
    logger.info(`${name} completed in ${(end - start) / 1000} seconds.`);
};


yargs(hideBin(process.argv))
    .scriptName('pic-tool')
    .command('info <file>', 'list the images within a pic archive', (yargs) => yargs
        .positional('file', {
            type: 'string', demandOption: true,
            description: `The pic archive to inspect.`
        }), (argv) => timed('Info', () => showInfo(argv))())
    .command('export <file>', 'export the images within a pic archive as PNG files', (yargs) => yargs
        .positional('file', {
            type: 'string', demandOption: true,
            description: `The pic archive to export images from.`
        })
        .options({
            out: {
                alias: 'o', type: 'string', default: './images',
                description: `The directory to write PNG files to. Defaults to './images'.`
            },
            image: {
                alias: 'i', type: 'number',
                description: `The zero based index of a single image to export. All images are exported when omitted.`
            },
            config: {
                alias: 'c', type: 'string',
                description: `Path to a JSON5 config file. Defaults to 'pic-tool.json5' in the current directory.`
            }
        }), (argv) => timed('Export', () => {
            exportImages(argv);
        })())
    .command('import <file>', 'replace an image within a pic archive with a PNG file', (yargs) => yargs
        .positional('file', {
            type: 'string', demandOption: true,
            description: `The pic archive to modify.`
        })
        .options({
            image: {
                alias: 'i', type: 'number', demandOption: true,
                description: `The zero based index of the image to replace.`
            },
            png: {
                alias: 'p', type: 'string', demandOption: true,
                description: `The PNG file to import, it must match the image's pixel dimensions exactly.`
            },
            out: {
                alias: 'o', type: 'string',
                description: `Where to save the modified archive. Defaults to overwriting the input archive.`
            }
        }), (argv) => timed('Import', () => {
            importImage(argv);
        })())
    .command('repack <file>', 're-write a pic archive using the canonical tile data layout', (yargs) => yargs
        .positional('file', {
            type: 'string', demandOption: true,
            description: `The pic archive to repack.`
        })
        .options({
            out: {
                alias: 'o', type: 'string',
                description: `Where to save the repacked archive. Defaults to overwriting the input archive.`
            }
        }), (argv) => timed('Repack', () => {
            repack(argv);
        })())
    .demandCommand(1)
    .strict()
    .help()
    .parse();
