import type { Raster } from "./raster";

/**
 * Finds and decodes every QR symbol in an image. Order and multiplicity of the
 * returned strings are unspecified; the same symbol may be reported twice.
 */
export interface IScanner {
	scan(image: Raster): string[];
}
