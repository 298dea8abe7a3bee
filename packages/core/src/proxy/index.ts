/**
 * Proxy configuration and proxy-aware fetch.
 */

export { getProxyConfig, getProxyForUrl, parseNoProxy, shouldBypassProxy, type ProxyConfig } from "./config.js";
export { proxyFetch, clearProxyAgentCache, type ProxyFetchOptions } from "./fetch.js";
