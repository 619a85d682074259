/**
 * Side length, in pixels, of every square tile within a pic archive.
 */
export const TILE_SIZE = 32;

export const TILE_PIXEL_COUNT = TILE_SIZE * TILE_SIZE;

/**
 * Signature written by the older generation of the format, which uses a different layout.
 */
export const LEGACY_SIGNATURE = 0x01FD0302;

// signature (uint32) + image count (uint16)
export const PIC_HEADER_SIZE = 6;

// width (uint8) + height (uint8) + background rgb (3 x uint8)
export const IMAGE_HEADER_SIZE = 5;

export const TILE_OFFSET_SIZE = 4;

export const TILE_LENGTH_SIZE = 2;

export const MAX_IMAGE_DIMENSION = 0xFF;

export const MAX_IMAGE_COUNT = 0xFFFF;

export const MAX_TILE_DATA_LENGTH = 0xFFFF;
