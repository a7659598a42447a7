import { type Logger, MosaicCodec, MosaicError } from "@qr-mosaic/core";
import chalk from "chalk";
import { Command } from "commander";
import { type DecodeCommandOptions, runDecode } from "./commands/decode.js";
import { type EncodeCommandOptions, runEncode } from "./commands/encode.js";
import type { CliConfig } from "./config.js";
import { formatDecodeJson, formatDecodeResult, formatEncodeOutcome, formatError } from "./output/formatter.js";

export interface CliIO {
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	setExitCode: (code: number) => void;
}

const consoleIO: CliIO = {
	stdout: (line) => console.log(line),
	stderr: (line) => console.error(line),
	setExitCode: (code) => {
		process.exitCode = code;
	},
};

function createLogger(io: CliIO, verbose: boolean): Logger {
	return {
		debug: (message) => {
			if (verbose) io.stderr(chalk.gray(message));
		},
		warn: (message) => io.stderr(chalk.yellow(message)),
	};
}

/**
 * Build the `qr-mosaic` command tree. Defaults come from `config`; flags win.
 */
export function createProgram(config: CliConfig, io: CliIO = consoleIO): Command {
	const program = new Command();
	program
		.name("qr-mosaic")
		.description("Encode text into a grid of QR codes in one PNG, and decode it back")
		.option("-v, --verbose", "Log decoding details", false);

	const codec = () => new MosaicCodec({ logger: createLogger(io, program.opts<{ verbose: boolean }>().verbose) });

	program
		.command("encode")
		.description("Encode text into a PNG mosaic")
		.argument("[text]", "Text to encode (or use --input)")
		.option("-i, --input <file>", "Read the text from a file")
		.option("-c, --chunk-size <n>", `Characters per QR code (default: ${config.chunkSize})`)
		.option("-p, --passphrase <passphrase>", "Encrypt with a passphrase")
		.option("-o, --out <file>", "Output PNG path", "multi_qr.png")
		.option("--base64", "Print the PNG as base64 instead of writing a file", false)
		.action((text: string | undefined, options: EncodeCommandOptions) => {
			try {
				io.stdout(formatEncodeOutcome(runEncode(text, options, config, codec())));
			} catch (error) {
				if (!(error instanceof MosaicError)) throw error;
				io.stderr(formatError(error));
				io.setExitCode(1);
			}
		});

	program
		.command("decode")
		.description("Decode a PNG mosaic back into text")
		.argument("<image>", "PNG produced by the encode command")
		.option("-p, --passphrase <passphrase>", "Passphrase used when encoding")
		.option("--json", "Print the result as JSON", false)
		.action((image: string, options: DecodeCommandOptions) => {
			const result = runDecode(image, options, config, codec());
			const output = options.json ? formatDecodeJson(result) : formatDecodeResult(result);
			if (result.ok) {
				io.stdout(output);
			} else {
				(options.json ? io.stdout : io.stderr)(output);
				io.setExitCode(1);
			}
		});

	return program;
}
