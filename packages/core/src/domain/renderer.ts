import type { Raster } from "./raster";

export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

/**
 * Turns one string into a scannable QR symbol image. Implementations must
 * produce symbols that round-trip through the project's `IScanner`.
 */
export interface IRenderer {
	render(text: string, level?: ErrorCorrectionLevel): Raster;
}
