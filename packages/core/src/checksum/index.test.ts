import * as t from "vitest";
import { ErrorCode, IntegrityError } from "../domain/errors";
import { parseEnvelope, sha256Hex, unwrapEnvelope, wrapEnvelope } from "./index";

const HELLO_WORLD_SHA256 = "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9";

t.describe("sha256Hex", () => {
	t.it("should hash the UTF-8 bytes as lowercase hex", () => {
		t.expect(sha256Hex("hello world")).toBe(HELLO_WORLD_SHA256);
		t.expect(sha256Hex("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
	});
});

t.describe("wrapEnvelope", () => {
	t.it("should serialize the hash and the text", () => {
		t.expect(wrapEnvelope("hello world")).toBe(`{"hash":"${HELLO_WORLD_SHA256}","text":"hello world"}`);
	});

	t.it("should keep non-ASCII text unescaped", () => {
		const wrapped = wrapEnvelope("héllo ✓");
		t.expect(wrapped).toContain(`"text":"héllo ✓"`);
	});
});

t.describe("parseEnvelope", () => {
	t.it("should recognise a structured envelope", () => {
		t.expect(parseEnvelope(wrapEnvelope("abc"))).toEqual({
			kind: "envelope",
			hash: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
			text: "abc",
		});
	});

	t.it("should treat a bare string as legacy text", () => {
		t.expect(parseEnvelope("just some text")).toEqual({ kind: "legacy", text: "just some text" });
	});

	t.it("should treat JSON that is not an object as legacy text", () => {
		t.expect(parseEnvelope("[1,2,3]")).toEqual({ kind: "legacy", text: "[1,2,3]" });
		t.expect(parseEnvelope('"quoted"')).toEqual({ kind: "legacy", text: '"quoted"' });
		t.expect(parseEnvelope("42")).toEqual({ kind: "legacy", text: "42" });
		t.expect(parseEnvelope("null")).toEqual({ kind: "legacy", text: "null" });
	});

	t.it("should treat objects without two string fields as legacy text", () => {
		const missingHash = JSON.stringify({ text: "abc" });
		const numericHash = JSON.stringify({ hash: 1, text: "abc" });
		t.expect(parseEnvelope(missingHash)).toEqual({ kind: "legacy", text: missingHash });
		t.expect(parseEnvelope(numericHash)).toEqual({ kind: "legacy", text: numericHash });
	});

	t.it("should read an envelope that carries extra fields", () => {
		const extra = JSON.stringify({ hash: sha256Hex("abc"), text: "abc", note: "x" });
		t.expect(parseEnvelope(extra)).toEqual({ kind: "envelope", hash: sha256Hex("abc"), text: "abc" });
	});
});

t.describe("unwrapEnvelope", () => {
	t.it("should return the text and its verified hash", () => {
		t.expect(unwrapEnvelope(wrapEnvelope("hello world"))).toEqual({ text: "hello world", sha256: HELLO_WORLD_SHA256 });
	});

	t.it("should pass legacy text through without a hash", () => {
		t.expect(unwrapEnvelope("plain old text")).toEqual({ text: "plain old text", sha256: null });
	});

	t.it("should reject a tampered text with the stored hash attached", () => {
		const tampered = wrapEnvelope("hello world").replace("hello world", "hello w0rld");
		try {
			unwrapEnvelope(tampered);
			t.expect.unreachable("should have thrown");
		} catch (e) {
			t.expect(e).toBeInstanceOf(IntegrityError);
			t.expect((e as IntegrityError).code).toBe(ErrorCode.INTEGRITY_MISMATCH);
			t.expect((e as IntegrityError).storedHash).toBe(HELLO_WORLD_SHA256);
		}
	});

	t.it("should verify an envelope that carries extra fields", () => {
		const payload = JSON.stringify({ hash: sha256Hex("abc"), text: "abc", v: 2 });
		t.expect(unwrapEnvelope(payload)).toEqual({ text: "abc", sha256: sha256Hex("abc") });
	});

	t.it("should reject a tampered envelope even when it carries extra fields", () => {
		const storedHash = "0".repeat(64);
		try {
			unwrapEnvelope(JSON.stringify({ hash: storedHash, text: "tampered", v: 2 }));
			t.expect.unreachable("should have thrown");
		} catch (e) {
			t.expect(e).toBeInstanceOf(IntegrityError);
			t.expect((e as IntegrityError).storedHash).toBe(storedHash);
		}
	});

	t.it("should reject a hash that is not hex at all", () => {
		const payload = JSON.stringify({ hash: "not-a-hash", text: "abc" });
		t.expect(() => unwrapEnvelope(payload)).toThrow(IntegrityError);
	});
});
