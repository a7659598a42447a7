import { PNG } from "pngjs";
import { ErrorCode, ImageError } from "../domain/errors";
import type { Raster, Rgba } from "../domain/raster";

export const WHITE: Rgba = [255, 255, 255, 255];
export const BLACK: Rgba = [0, 0, 0, 255];

const DARK_THRESHOLD = 128;

export function createRaster(width: number, height: number, color: Rgba = WHITE): Raster {
	const raster: Raster = { width, height, data: new Uint8Array(width * height * 4) };
	fillRect(raster, 0, 0, width, height, color);
	return raster;
}

/**
 * Paints a rectangle, clipped to the raster bounds.
 */
export function fillRect(target: Raster, x: number, y: number, width: number, height: number, color: Rgba): void {
	const x0 = Math.max(0, x);
	const y0 = Math.max(0, y);
	const x1 = Math.min(target.width, x + width);
	const y1 = Math.min(target.height, y + height);
	for (let row = y0; row < y1; row++) {
		for (let col = x0; col < x1; col++) {
			target.data.set(color, (row * target.width + col) * 4);
		}
	}
}

/**
 * Copies all of `source` into `target` with its top-left corner at (x, y),
 * clipped to the target bounds.
 */
export function blit(source: Raster, target: Raster, x: number, y: number): void {
	const x0 = Math.max(0, x);
	const x1 = Math.min(target.width, x + source.width);
	if (x1 <= x0) return;
	for (let row = 0; row < source.height; row++) {
		const targetRow = y + row;
		if (targetRow < 0 || targetRow >= target.height) continue;
		const from = (row * source.width + (x0 - x)) * 4;
		const to = from + (x1 - x0) * 4;
		target.data.set(source.data.subarray(from, to), (targetRow * target.width + x0) * 4);
	}
}

/**
 * Copies a region of `source` onto a new white raster with `padding` pixels of
 * margin on every side.
 */
export function crop(source: Raster, x: number, y: number, width: number, height: number, padding = 0): Raster {
	const region: Raster = { width, height, data: new Uint8Array(width * height * 4) };
	for (let row = 0; row < height; row++) {
		const from = ((y + row) * source.width + x) * 4;
		region.data.set(source.data.subarray(from, from + width * 4), row * width * 4);
	}
	if (padding === 0) return region;

	const padded = createRaster(width + padding * 2, height + padding * 2);
	blit(region, padded, padding, padding);
	return padded;
}

/**
 * Whether the pixel at (x, y) reads as ink: luminance below mid-grey, with
 * transparent pixels treated as white.
 */
export function isDark(raster: Raster, x: number, y: number): boolean {
	const i = (y * raster.width + x) * 4;
	const alpha = raster.data[i + 3] / 255;
	const luminance = 0.299 * raster.data[i] + 0.587 * raster.data[i + 1] + 0.114 * raster.data[i + 2];
	return luminance * alpha + 255 * (1 - alpha) < DARK_THRESHOLD;
}

export function encodePng(raster: Raster): Buffer {
	const png = new PNG({ width: raster.width, height: raster.height });
	png.data.set(raster.data);
	return PNG.sync.write(png);
}

/**
 * @throws {ImageError} if `bytes` is not a readable PNG.
 */
export function decodePng(bytes: Uint8Array): Raster {
	let png: PNG;
	try {
		png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
	} catch {
		throw new ImageError(ErrorCode.INVALID_IMAGE, "Invalid image: expected a PNG raster");
	}
	return { width: png.width, height: png.height, data: new Uint8Array(png.data) };
}
