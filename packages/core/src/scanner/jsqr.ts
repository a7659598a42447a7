import jsQR from "jsqr";
import type { Raster } from "../domain/raster";
import type { IScanner } from "../domain/scanner";
import { crop } from "../raster";
import { segmentRegions } from "./segment";

export type JsQrScannerOptions = {
	/** Narrowest blank band, in pixels, that separates two symbols. */
	minGap?: number;
};

// Version 1 symbols are 21 modules wide; anything smaller is a caption or noise.
const MIN_SYMBOL_PIXELS = 21;

function decodeSingle(image: Raster): string | null {
	const pixels = new Uint8ClampedArray(image.data.buffer, image.data.byteOffset, image.data.byteLength);
	const result = jsQR(pixels, image.width, image.height, { inversionAttempts: "dontInvert" });
	return result ? result.data : null;
}

/**
 * Scans every QR symbol in an image with `jsqr`, which reads one symbol per
 * call: the image is first cut into separately inked regions, each region is
 * decoded on its own padded canvas.
 */
export class JsQrScanner implements IScanner {
	private readonly minGap: number;

	constructor(options: JsQrScannerOptions = {}) {
		this.minGap = options.minGap ?? 16;
	}

	scan(image: Raster): string[] {
		const found: string[] = [];
		for (const region of segmentRegions(image, this.minGap)) {
			if (region.width < MIN_SYMBOL_PIXELS || region.height < MIN_SYMBOL_PIXELS) continue;
			const padding = Math.max(this.minGap, Math.ceil(Math.max(region.width, region.height) / 5));
			const data = decodeSingle(crop(image, region.x, region.y, region.width, region.height, padding));
			if (data !== null) found.push(data);
		}
		if (found.length > 0) return found;

		const whole = decodeSingle(image);
		return whole === null ? [] : [whole];
	}
}
