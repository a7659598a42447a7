import type { Frame } from "../domain/frame";
import type { Raster } from "../domain/raster";
import type { IRenderer } from "../domain/renderer";
import { ErrorCode, ValidationError } from "../domain/errors";
import { encodeFrame } from "../frame";
import { BLACK, blit, createRaster, fillRect } from "../raster";
import glyphs from "./glyphs.json";

const GLYPHS: Readonly<Record<string, readonly string[]>> = glyphs;
const GLYPH_WIDTH = 5;
const GLYPH_HEIGHT = 7;
const MIN_LABEL_HEIGHT = 24;

export type LabelFn = (image: Raster, index: number, total: number) => Raster;

function drawText(target: Raster, text: string, x: number, y: number, scale: number): void {
	let cursor = x;
	for (const character of text) {
		const rows = GLYPHS[character] ?? [];
		rows.forEach((row, dy) => {
			for (let dx = 0; dx < row.length; dx++) {
				if (row[dx] === "#") fillRect(target, cursor + dx * scale, y + dy * scale, scale, scale, BLACK);
			}
		});
		cursor += (GLYPH_WIDTH + 1) * scale;
	}
}

/**
 * Returns a copy of `image` extended by a white strip with an `index+1/total`
 * caption centred in it. The pixels of `image` itself are left untouched.
 */
export const addIndexLabel: LabelFn = (image, index, total) => {
	const labelHeight = Math.max(MIN_LABEL_HEIGHT, Math.floor(image.height / 6));
	const labelled = createRaster(image.width, image.height + labelHeight);
	blit(image, labelled, 0, 0);

	const text = `${index + 1}/${total}`;
	const scale = Math.max(1, Math.floor(labelHeight / (GLYPH_HEIGHT * 2)));
	const textWidth = Array.from(text).length * (GLYPH_WIDTH + 1) * scale - scale;
	const textHeight = GLYPH_HEIGHT * scale;
	const x = Math.max(0, Math.floor((image.width - textWidth) / 2));
	const y = image.height + Math.floor((labelHeight - textHeight) / 2);
	drawText(labelled, text, x, y, scale);
	return labelled;
};

export type GridSize = {
	cols: number;
	rows: number;
};

/**
 * The smallest near-square grid holding `count` cells.
 */
export function gridSize(count: number): GridSize {
	const cols = Math.ceil(Math.sqrt(count));
	return { cols, rows: Math.ceil(count / cols) };
}

/**
 * Places images left-to-right, top-to-bottom on a white canvas. Every cell is
 * as large as the largest image; each image sits at its cell's top-left corner.
 * @throws {ValidationError} if there are no images.
 */
export function tileImages(images: readonly Raster[]): Raster {
	if (images.length === 0) throw new ValidationError(ErrorCode.NO_IMAGES, "No images to tile");

	const cellWidth = Math.max(...images.map((image) => image.width));
	const cellHeight = Math.max(...images.map((image) => image.height));
	const { cols, rows } = gridSize(images.length);

	const canvas = createRaster(cols * cellWidth, rows * cellHeight);
	images.forEach((image, i) => {
		const row = Math.floor(i / cols);
		const col = i % cols;
		blit(image, canvas, col * cellWidth, row * cellHeight);
	});
	return canvas;
}

/**
 * Renders every frame as a QR symbol at error-correction level Q, labels it,
 * and tiles the results into one image. Pass `null` to skip the labels.
 */
export function renderMessage(frames: readonly Frame[], renderer: IRenderer, label: LabelFn | null = addIndexLabel): Raster {
	const images = frames.map((frame) => {
		const symbol = renderer.render(encodeFrame(frame), "Q");
		return label ? label(symbol, frame.index, frame.total) : symbol;
	});
	return tileImages(images);
}
