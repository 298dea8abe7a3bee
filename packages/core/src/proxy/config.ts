/**
 * @title Proxy Configuration
 * @description Proxy settings read from the standard environment variables.
 *
 * Asset probes honour `HTTP_PROXY`, `HTTPS_PROXY` and `NO_PROXY`. Each may
 * also be given in lower case; the upper-case variable wins when both are set.
 *
 * `NO_PROXY` takes a comma or whitespace separated list of patterns:
 * `*` bypasses every host, `.ads.test` bypasses that domain and its
 * subdomains, and a bare name such as `cdn.test` matches itself and its
 * subdomains. CIDR ranges are compared literally.
 *
 * @module proxy
 */

/**
 * Proxy settings for outgoing asset requests.
 */
export interface ProxyConfig {
	httpProxy?: string;
	httpsProxy?: string;
	/** Lower-cased bypass patterns. */
	noProxy: string[];
}

function readEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
	return env[name.toUpperCase()] ?? env[name.toLowerCase()];
}

/**
 * Split a `NO_PROXY` value into lower-cased patterns.
 */
export function parseNoProxy(value: string | undefined): string[] {
	if (!value) {
		return [];
	}
	return value
		.split(/[,\s]+/)
		.map((pattern) => pattern.trim().toLowerCase())
		.filter((pattern) => pattern !== "");
}

/**
 * Read proxy settings from the environment.
 *
 * @param env - Environment to read (defaults to `process.env`)
 */
export function getProxyConfig(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
	return {
		httpProxy: readEnv("HTTP_PROXY", env),
		httpsProxy: readEnv("HTTPS_PROXY", env),
		noProxy: parseNoProxy(readEnv("NO_PROXY", env)),
	};
}

/**
 * Whether a host matches one of the bypass patterns.
 */
export function shouldBypassProxy(hostname: string, noProxy: readonly string[]): boolean {
	const host = hostname.toLowerCase();
	return noProxy.some((pattern) => {
		if (pattern === "*") {
			return true;
		}
		const domain = pattern.startsWith(".") ? pattern.slice(1) : pattern;
		return host === domain || host.endsWith(`.${domain}`);
	});
}

/**
 * Proxy URL to use for a request, or undefined for a direct connection.
 *
 * HTTPS requests fall back to the HTTP proxy when no HTTPS proxy is set.
 * Unparseable URLs and other schemes always connect directly.
 */
export function getProxyForUrl(url: string, config: ProxyConfig = getProxyConfig()): string | undefined {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return undefined;
	}

	if (shouldBypassProxy(parsed.hostname, config.noProxy)) {
		return undefined;
	}

	switch (parsed.protocol) {
		case "https:":
			return config.httpsProxy ?? config.httpProxy;
		case "http:":
			return config.httpProxy;
		default:
			return undefined;
	}
}
