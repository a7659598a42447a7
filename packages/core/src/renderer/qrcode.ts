import QRCode from "qrcode";
import { ErrorCode, ValidationError } from "../domain/errors";
import type { Raster } from "../domain/raster";
import type { ErrorCorrectionLevel, IRenderer } from "../domain/renderer";
import { BLACK, createRaster, fillRect } from "../raster";

export type QrCodeRendererOptions = {
	/** Pixels per module. */
	scale?: number;
	/** Quiet zone width in modules. */
	margin?: number;
};

/**
 * Renders QR symbols with the `qrcode` package, black modules on white.
 */
export class QrCodeRenderer implements IRenderer {
	private readonly scale: number;
	private readonly margin: number;

	constructor(options: QrCodeRendererOptions = {}) {
		this.scale = options.scale ?? 10;
		this.margin = options.margin ?? 4;
	}

	/**
	 * @throws {ValidationError} if `text` does not fit in a single symbol.
	 */
	render(text: string, level: ErrorCorrectionLevel = "Q"): Raster {
		let symbol: ReturnType<typeof QRCode.create>;
		try {
			symbol = QRCode.create(text, { errorCorrectionLevel: level });
		} catch {
			throw new ValidationError(
				ErrorCode.CHUNK_TOO_LARGE,
				`A frame of ${text.length} characters does not fit in one QR symbol; use a smaller chunk size`,
			);
		}

		const { size } = symbol.modules;
		const dimension = (size + this.margin * 2) * this.scale;
		const image = createRaster(dimension, dimension);
		for (let row = 0; row < size; row++) {
			for (let col = 0; col < size; col++) {
				if (!symbol.modules.get(row, col)) continue;
				fillRect(image, (col + this.margin) * this.scale, (row + this.margin) * this.scale, this.scale, this.scale, BLACK);
			}
		}
		return image;
	}
}
