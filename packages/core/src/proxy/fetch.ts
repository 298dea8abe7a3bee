/**
 * @title Proxy-Aware Fetch
 * @description Default HTTP client for asset probes.
 *
 * Requests go through undici with a `ProxyAgent` when the environment names
 * a proxy for the target URL, and through the global fetch otherwise.
 *
 * @module proxy
 */

import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from "undici";
import { getErrorMessage } from "../errors.js";
import { createLogger } from "../logging/log.js";
import { getProxyForUrl, type ProxyConfig } from "./config.js";

const MAX_CACHED_AGENTS = 8;

/**
 * Agents by proxy URL, least recently used first.
 */
const agents = new Map<string, ProxyAgent>();

function agentFor(proxyUrl: string): ProxyAgent {
	const cached = agents.get(proxyUrl);
	if (cached) {
		agents.delete(proxyUrl);
		agents.set(proxyUrl, cached);
		return cached;
	}

	if (agents.size >= MAX_CACHED_AGENTS) {
		const oldestUrl = agents.keys().next().value;
		const oldest = oldestUrl === undefined ? undefined : agents.get(oldestUrl);
		if (oldestUrl !== undefined && oldest) {
			agents.delete(oldestUrl);
			oldest.close().catch((error: unknown) => {
				createLogger().debug(`Failed to close proxy agent for ${oldestUrl}: ${getErrorMessage(error)}`);
			});
		}
	}

	const agent = new ProxyAgent(proxyUrl);
	agents.set(proxyUrl, agent);
	return agent;
}

/**
 * Fetch options accepted by {@link proxyFetch}.
 */
export interface ProxyFetchOptions extends RequestInit {
	/** Proxy settings; read from the environment when omitted. */
	proxyConfig?: ProxyConfig;
}

/**
 * Fetch a URL, routing through a proxy when one applies.
 *
 * Compatible with the `HttpClient` signature used by network inspectors.
 */
export async function proxyFetch(url: string, options: ProxyFetchOptions = {}): Promise<Response> {
	const { proxyConfig, ...init } = options;
	const proxyUrl = getProxyForUrl(url, proxyConfig);

	if (!proxyUrl) {
		return fetch(url, init);
	}

	// undici's Dispatcher and Response are separate declarations of the same
	// runtime shapes as the global fetch types.
	return undiciFetch(url, {
		...init,
		dispatcher: agentFor(proxyUrl) as unknown as Dispatcher,
	}) as unknown as Response;
}

/**
 * Close and forget every cached proxy agent.
 */
export async function clearProxyAgentCache(): Promise<void> {
	const closing = [...agents.values()].map((agent) => agent.close());
	agents.clear();
	await Promise.all(closing);
}
