import * as t from "vitest";
import { vi } from "vitest";
import { encryptPayload } from "./index";

// IV bytes 0x00..0x0f instead of random ones.
vi.mock("@noble/hashes/utils", async (importOriginal) => {
	const actual = await importOriginal<typeof import("@noble/hashes/utils")>();
	return { ...actual, randomBytes: (length = 32) => Uint8Array.from({ length }, (_, i) => i) };
});

t.describe("encryptPayload with a fixed IV and clock", () => {
	t.beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(1_700_000_000_000);
	});

	t.afterEach(() => {
		vi.useRealTimers();
	});

	t.it("should produce the exact Fernet token another implementation produces", () => {
		t.expect(encryptPayload("abc", "test-secret")).toBe(
			"gAAAAABlU_EAAAECAwQFBgcICQoLDA0OD7C-8Ub1imtibCvZthVfGrKrkOv9F0Op7aSZ6xxglLB_t9eQgLQ62xq0v9fEeXeVqA==",
		);
	});
});
