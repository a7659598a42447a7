/**
 * An in-memory RGBA image, row-major, 4 bytes per pixel.
 */
export interface Raster {
	width: number;
	height: number;
	data: Uint8Array;
}

export type Rgba = readonly [r: number, g: number, b: number, a: number];
