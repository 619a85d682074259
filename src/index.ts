// content
export * from './content/pic';

// codec
export * from './codec/tile-codec';
export * from './codec/pic-reader';
export * from './codec/pic-writer';
export * from './codec/image-renderer';

// fs
export * from './fs/pic-store';

// config
export * from './config/pic-config';

// util
export * from './util/colors';
export * from './util/png';

export * from './errors';
