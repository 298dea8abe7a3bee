/**
 * @title Asset Probe
 * @description Reachability checks for asset URLs without downloading them.
 *
 * A probe sends `HEAD` first. Servers answering 405 get a single-byte ranged
 * `GET` instead. Response bodies are never read.
 *
 * @module probe
 */

import { AssetUrlError, getErrorMessage } from "../errors.js";
import type { HttpClient } from "../hooks/types.js";
import type { Logger } from "../logging/log.js";
import { sendRequest } from "./http.js";

/** Range requested by the GET fallback. */
export const PROBE_RANGE = "bytes=0-0";

const HTTP_METHOD_NOT_ALLOWED = 405;

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;
/** Scheme followed by `//` and a non-empty authority. */
const AUTHORITY_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]/i;

/**
 * Normalize an asset URL for probing.
 *
 * Surrounding whitespace is trimmed and scheme-relative URLs (`//host/path`)
 * are treated as HTTPS.
 *
 * @param raw - URL as written in the document
 * @returns Absolute http(s) URL
 * @throws AssetUrlError when the URL is empty, unparseable, lacks a scheme or host, or uses another scheme
 */
export function normalizeAssetUrl(raw: string): string {
	let value = raw.trim();
	if (value === "") {
		throw new AssetUrlError("asset URL is empty");
	}
	if (value.startsWith("//")) {
		value = `https:${value}`;
	}
	if (!SCHEME_PATTERN.test(value)) {
		throw new AssetUrlError(`invalid asset URL "${value}": missing scheme or host`);
	}

	let parsed: URL;
	try {
		parsed = new URL(value);
	} catch (error) {
		throw new AssetUrlError(`invalid asset URL "${value}": ${getErrorMessage(error)}`, { cause: error });
	}

	const scheme = parsed.protocol.slice(0, -1);
	if (scheme !== "http" && scheme !== "https") {
		throw new AssetUrlError(`unsupported asset URL scheme "${scheme}"`);
	}
	if (parsed.host === "" || !AUTHORITY_PATTERN.test(value)) {
		throw new AssetUrlError(`invalid asset URL "${value}": missing scheme or host`);
	}

	return parsed.href;
}

/**
 * Options for {@link probeAsset}.
 */
export interface ProbeOptions {
	client: HttpClient;
	/** Aborts in-flight requests. */
	signal: AbortSignal;
	logger?: Logger;
}

async function discardBody(response: Response, logger?: Logger): Promise<void> {
	try {
		await response.body?.cancel();
	} catch (error) {
		logger?.debug(`Failed to discard probe response body: ${getErrorMessage(error)}`);
	}
}

/**
 * Probe an asset URL.
 *
 * The returned response has no readable body; only status and headers are
 * meaningful.
 *
 * @param url - Asset URL as written in the document
 * @param options - Client and cancellation signal
 * @throws AssetUrlError for URLs that cannot be probed
 * @throws NetworkError on transport failures and timeouts
 * @throws CancellationError when the caller cancels
 */
export async function probeAsset(url: string, options: ProbeOptions): Promise<Response> {
	const { client, signal, logger } = options;
	const target = normalizeAssetUrl(url);

	const head = await sendRequest(client, target, { method: "HEAD", signal });
	await discardBody(head, logger);
	if (head.status !== HTTP_METHOD_NOT_ALLOWED) {
		return head;
	}

	logger?.debug(`HEAD not allowed for ${target}, retrying with a ranged GET`);
	const get = await sendRequest(client, target, { method: "GET", headers: { Range: PROBE_RANGE }, signal });
	await discardBody(get, logger);
	return get;
}
