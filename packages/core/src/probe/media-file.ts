/**
 * @title Media File Inspector
 * @description Built-in network inspector checking that media files resolve.
 *
 * @module probe
 */

import { getErrorMessage } from "../errors.js";
import { networkInspector } from "../hooks/types.js";
import { CUSTOM_CATEGORY, type NodeAnalysisResult } from "../validation/results.js";
import { probeAsset } from "./asset-probe.js";

/** Node name the inspector is registered under. */
export const MEDIA_FILE_NODE = "MediaFile";

function fail(reason: string): NodeAnalysisResult {
	return { category: CUSTOM_CATEGORY, status: "fail", reasons: [reason] };
}

function normalizeMediaType(value: string): string {
	const [type = ""] = value.split(";");
	return type.trim().toLowerCase();
}

/**
 * Probes the media file URL held in the node text.
 *
 * Fails on an empty URL, a failed request, an HTTP status of 400 or above, and
 * a response content type that differs from the declared `type` attribute.
 * A response without a content type is not penalized.
 */
export const mediaFileInspector = networkInspector(async (context, network) => {
	if (context.text === "") {
		return fail("media file URL is empty");
	}

	let response: Response;
	try {
		response = await probeAsset(context.text, {
			client: network.client,
			signal: network.signal,
			logger: network.logger,
		});
	} catch (error) {
		return fail(`media file request failed: ${getErrorMessage(error)}`);
	}

	if (response.status >= 400) {
		return fail(`media file responded with HTTP ${response.status}`);
	}

	const expected = (context.attribute("type") ?? "").trim().toLowerCase();
	if (expected !== "") {
		const actual = normalizeMediaType(response.headers.get("content-type") ?? "");
		if (actual !== "" && actual !== expected) {
			return fail(`content type mismatch: expected ${expected}, got ${actual}`);
		}
	}

	return { category: CUSTOM_CATEGORY, status: "pass" };
});
