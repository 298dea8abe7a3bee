/**
 * @title Validation Options
 * @description Options accepted by the validation engine and their defaults.
 *
 * @module validation
 */

import { loadDefaultCatalog, type Catalog } from "@vastlint/schema";
import { CatalogError, VastLintError } from "../errors.js";
import { createDefaultHookRegistry } from "../hooks/defaults.js";
import type { HookRegistry } from "../hooks/registry.js";
import type { HttpClient } from "../hooks/types.js";
import { createLogger, type Logger } from "../logging/log.js";
import { DEFAULT_NETWORK_TIMEOUT } from "../probe/http.js";
import { proxyFetch } from "../proxy/fetch.js";

/**
 * Settings for network inspectors.
 */
export interface HttpValidationOptions {
	/** Client handed to network inspectors (default: proxy-aware fetch). */
	client?: HttpClient;
	/** Per-node deadline in milliseconds (default: 2000). */
	timeout?: number;
}

/**
 * Options for a validation call.
 */
export interface ValidateOptions {
	/** Catalog to validate against (default: the built-in VAST catalog). */
	catalog?: Catalog;
	/** Inspectors to run (default: a shared registry holding the built-in inspectors). */
	hooks?: HookRegistry;
	/** Skip every inspector, pure and network. */
	disableCustomValidators?: boolean;
	/** Skip network inspectors; pure inspectors still run. */
	disableNetworkValidators?: boolean;
	/** Leave `xmlns`, `xmlns:*`, `xml:*` and `xsi:*` attributes out of attribute checks (default: false). */
	ignoreNamespaceAttributes?: boolean;
	http?: HttpValidationOptions;
	/** Cancels in-flight network inspectors. Traversal itself always completes. */
	signal?: AbortSignal;
	logger?: Logger;
}

/**
 * Options with every default applied.
 */
export interface ResolvedValidateOptions {
	catalog: Catalog;
	hooks: HookRegistry;
	runCustom: boolean;
	runNetwork: boolean;
	ignoreNamespaceAttributes: boolean;
	client: HttpClient;
	timeout: number;
	signal?: AbortSignal;
	logger: Logger;
}

let sharedHooks: HookRegistry | undefined;

function defaultHooks(): HookRegistry {
	sharedHooks ??= createDefaultHookRegistry();
	return sharedHooks;
}

function defaultCatalog(): Catalog {
	try {
		return loadDefaultCatalog();
	} catch (error) {
		throw new CatalogError("Failed to load the built-in catalog", { cause: error });
	}
}

/**
 * Apply defaults to validation options.
 *
 * @throws VastLintError when the HTTP timeout is not a positive number
 * @throws CatalogError when the built-in catalog cannot be loaded
 */
export function resolveValidateOptions(options: ValidateOptions = {}): ResolvedValidateOptions {
	const timeout = options.http?.timeout ?? DEFAULT_NETWORK_TIMEOUT;
	if (!Number.isFinite(timeout) || timeout <= 0) {
		throw new VastLintError(`Invalid HTTP timeout: ${timeout}`, "INVALID_OPTIONS", {
			suggestion: "Use a positive number of milliseconds",
		});
	}

	const runCustom = options.disableCustomValidators !== true;

	return {
		catalog: options.catalog ?? defaultCatalog(),
		hooks: options.hooks ?? defaultHooks(),
		runCustom,
		runNetwork: runCustom && options.disableNetworkValidators !== true,
		ignoreNamespaceAttributes: options.ignoreNamespaceAttributes === true,
		client: options.http?.client ?? proxyFetch,
		timeout,
		signal: options.signal,
		logger: options.logger ?? createLogger(),
	};
}

/**
 * Layer per-call overrides on top of base options. An override left
 * undefined keeps the base setting.
 */
export function mergeValidateOptions(base: ValidateOptions, overrides: ValidateOptions = {}): ValidateOptions {
	return {
		catalog: overrides.catalog ?? base.catalog,
		hooks: overrides.hooks ?? base.hooks,
		disableCustomValidators: overrides.disableCustomValidators ?? base.disableCustomValidators,
		disableNetworkValidators: overrides.disableNetworkValidators ?? base.disableNetworkValidators,
		ignoreNamespaceAttributes: overrides.ignoreNamespaceAttributes ?? base.ignoreNamespaceAttributes,
		http: {
			client: overrides.http?.client ?? base.http?.client,
			timeout: overrides.http?.timeout ?? base.http?.timeout,
		},
		signal: overrides.signal ?? base.signal,
		logger: overrides.logger ?? base.logger,
	};
}
