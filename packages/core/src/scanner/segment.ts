import type { Raster } from "../domain/raster";
import { isDark } from "../raster";

export type Region = {
	x: number;
	y: number;
	width: number;
	height: number;
};

type Span = [start: number, end: number];

/**
 * Groups the inked positions of a profile into spans, merging spans separated
 * by fewer than `minGap` blank positions. Returned spans are half-open.
 */
function inkSpans(profile: readonly boolean[], minGap: number): Span[] {
	const spans: Span[] = [];
	for (let i = 0; i < profile.length; i++) {
		if (!profile[i]) continue;
		const last = spans[spans.length - 1];
		if (last && i - last[1] < minGap) last[1] = i + 1;
		else spans.push([i, i + 1]);
	}
	return spans;
}

function rowProfile(image: Raster, region: Region): boolean[] {
	const profile: boolean[] = [];
	for (let y = region.y; y < region.y + region.height; y++) {
		let ink = false;
		for (let x = region.x; x < region.x + region.width && !ink; x++) ink = isDark(image, x, y);
		profile.push(ink);
	}
	return profile;
}

function columnProfile(image: Raster, region: Region): boolean[] {
	const profile: boolean[] = [];
	for (let x = region.x; x < region.x + region.width; x++) {
		let ink = false;
		for (let y = region.y; y < region.y + region.height && !ink; y++) ink = isDark(image, x, y);
		profile.push(ink);
	}
	return profile;
}

function cut(image: Raster, region: Region, minGap: number, regions: Region[]): void {
	const rows = inkSpans(rowProfile(image, region), minGap);
	if (rows.length === 0) return;
	if (rows.length > 1) {
		for (const [start, end] of rows) {
			cut(image, { x: region.x, y: region.y + start, width: region.width, height: end - start }, minGap, regions);
		}
		return;
	}

	const [[top, bottom]] = rows;
	const band: Region = { x: region.x, y: region.y + top, width: region.width, height: bottom - top };
	const columns = inkSpans(columnProfile(image, band), minGap);
	if (columns.length > 1) {
		for (const [start, end] of columns) {
			cut(image, { x: band.x + start, y: band.y, width: end - start, height: band.height }, minGap, regions);
		}
		return;
	}

	const [[left, right]] = columns;
	regions.push({ x: band.x + left, y: band.y, width: right - left, height: band.height });
}

/**
 * Splits an image into the bounding boxes of inked areas that are separated by
 * blank bands at least `minGap` pixels wide, cutting rows and columns
 * alternately until no band splits further.
 */
export function segmentRegions(image: Raster, minGap: number): Region[] {
	const regions: Region[] = [];
	cut(image, { x: 0, y: 0, width: image.width, height: image.height }, minGap, regions);
	return regions;
}
