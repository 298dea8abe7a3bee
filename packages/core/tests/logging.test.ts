import { afterEach, describe, expect, it } from "vitest";
import { createLogger, getLogLevelFromEnv, isLogLevel, silentLogger } from "../src/logging/index.js";

describe("createLogger", () => {
	it("writes messages at or above the threshold", () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "warn", sink: (line) => lines.push(line) });

		logger.error("broken");
		logger.warn("careful");
		logger.info("hello");
		logger.debug("details");

		expect(lines).toEqual(["[vastlint] error: broken", "[vastlint] warn: careful"]);
	});

	it("defaults log() to the info level", () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "info", sink: (line) => lines.push(line) });

		logger.log("probing");

		expect(lines).toEqual(["[vastlint] info: probing"]);
	});

	it("writes everything at debug", () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "debug", sink: (line) => lines.push(line) });

		logger.debug("a");
		logger.log("b", "error");

		expect(lines).toEqual(["[vastlint] debug: a", "[vastlint] error: b"]);
	});
});

describe("getLogLevelFromEnv", () => {
	const original = process.env["VASTLINT_LOG_LEVEL"];

	afterEach(() => {
		if (original === undefined) {
			delete process.env["VASTLINT_LOG_LEVEL"];
		} else {
			process.env["VASTLINT_LOG_LEVEL"] = original;
		}
	});

	it("defaults to warn", () => {
		delete process.env["VASTLINT_LOG_LEVEL"];

		expect(getLogLevelFromEnv()).toBe("warn");
	});

	it("reads the level case-insensitively", () => {
		process.env["VASTLINT_LOG_LEVEL"] = " DEBUG ";

		expect(getLogLevelFromEnv()).toBe("debug");
	});

	it("ignores unknown levels", () => {
		process.env["VASTLINT_LOG_LEVEL"] = "verbose";

		expect(getLogLevelFromEnv()).toBe("warn");
	});
});

describe("isLogLevel", () => {
	it("accepts known levels only", () => {
		expect(isLogLevel("info")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
		expect(isLogLevel(undefined)).toBe(false);
	});
});

describe("silentLogger", () => {
	it("never throws", () => {
		expect(() => silentLogger.error("ignored")).not.toThrow();
	});
});
