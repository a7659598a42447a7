import * as t from "vitest";
import { ErrorCode, ValidationError } from "../domain/errors";
import { isDark } from "../raster";
import { QrCodeRenderer } from "./qrcode";

t.describe("QrCodeRenderer", () => {
	t.it("should render a version 1 symbol with a four module quiet zone", () => {
		const image = new QrCodeRenderer().render("hello", "Q");

		// 21 modules plus 2 * 4 quiet modules, 10px each
		t.expect(image.width).toBe(290);
		t.expect(image.height).toBe(290);
		t.expect(isDark(image, 0, 0)).toBe(false);
		t.expect(isDark(image, 39, 39)).toBe(false);
		// top-left finder pattern corner
		t.expect(isDark(image, 40, 40)).toBe(true);
		t.expect(isDark(image, 109, 40)).toBe(true);
	});

	t.it("should honour scale and margin", () => {
		const image = new QrCodeRenderer({ scale: 2, margin: 1 }).render("hello");
		t.expect(image.width).toBe(46);
		t.expect(isDark(image, 1, 1)).toBe(false);
		t.expect(isDark(image, 2, 2)).toBe(true);
	});

	t.it("should reject text that does not fit in one symbol", () => {
		try {
			new QrCodeRenderer().render("a".repeat(3000));
			t.expect.unreachable("should have thrown");
		} catch (e) {
			t.expect(e).toBeInstanceOf(ValidationError);
			t.expect((e as ValidationError).code).toBe(ErrorCode.CHUNK_TOO_LARGE);
		}
	});
});
