export * from './format';
export * from './tile';
export * from './pic-image';
export * from './pic';
