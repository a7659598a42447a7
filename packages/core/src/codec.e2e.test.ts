import * as t from "vitest";
import { sha256Hex, wrapEnvelope } from "./checksum";
import { MosaicCodec } from "./codec";
import { DecryptionError, MissingChunksError, ScanError } from "./domain/errors";
import type { Logger } from "./domain/logger";
import { decodeFrame } from "./frame";
import { renderMessage } from "./layout";
import { createRaster, encodePng } from "./raster";
import { QrCodeRenderer } from "./renderer/qrcode";
import { JsQrScanner } from "./scanner/jsqr";

const quiet: Logger = { debug: () => {}, warn: () => {} };

t.describe("MosaicCodec with qrcode and jsqr", () => {
	const codec = new MosaicCodec({ logger: quiet });

	t.it("should encode hello world in five character chunks and decode it back", () => {
		const image = codec.encode("hello world", { chunkSize: 5 });
		const total = Math.ceil(wrapEnvelope("hello world").length / 5);

		const scanned = new JsQrScanner().scan(codec.render("hello world", { chunkSize: 5 }));
		t.expect(scanned).toHaveLength(total);
		t.expect(scanned.map((raw) => decodeFrame(raw)?.total)).toEqual(Array(total).fill(total));

		t.expect(codec.decode(image)).toEqual({ ok: true, text: "hello world", sha256: sha256Hex("hello world") });
	});

	t.it("should round-trip an encrypted multi-line message", () => {
		const text = "Dear reader,\nthis note | has bars, ümlauts and 🎉.\n".repeat(4);
		const image = codec.encode(text, { chunkSize: 120, passphrase: "test-secret" });
		t.expect(codec.decode(image, { passphrase: "test-secret" })).toEqual({ ok: true, text, sha256: sha256Hex(text) });
	});

	t.it("should refuse to decrypt with the wrong passphrase", () => {
		const image = codec.encode("classified", { chunkSize: 60, passphrase: "test-secret" });
		const result = codec.decode(image, { passphrase: "not-the-secret" });
		t.expect(result.ok).toBe(false);
		t.expect(!result.ok && result.error).toBeInstanceOf(DecryptionError);
	});

	t.it("should report exactly the fragment left out of the image", () => {
		const frames = codec.frames("a message spread over several symbols", { chunkSize: 25 });
		const image = encodePng(renderMessage(frames.filter((frame) => frame.index !== 2), new QrCodeRenderer()));

		const result = codec.decode(image);
		t.expect(result.ok).toBe(false);
		t.expect(!result.ok && result.error).toBeInstanceOf(MissingChunksError);
		t.expect(!result.ok && result.error instanceof MissingChunksError && result.error.missing).toEqual([2]);
	});

	t.it("should report a blank image as having no QR codes", () => {
		const result = codec.decode(encodePng(createRaster(300, 300)));
		t.expect(result.ok).toBe(false);
		t.expect(!result.ok && result.error).toBeInstanceOf(ScanError);
		t.expect(!result.ok && result.error.message).toBe("No QR codes found");
	});
});
