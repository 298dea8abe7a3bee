import { describe, expect, it } from "vitest";
import { loadDefaultCatalog } from "@vastlint/schema";
import { HookRegistry } from "../../src/hooks/index.js";
import { silentLogger } from "../../src/logging/index.js";
import { proxyFetch } from "../../src/proxy/index.js";
import { mergeValidateOptions, resolveValidateOptions } from "../../src/validation/options.js";
import { createFakeClient } from "../fake-http.js";
import { createTestCatalog } from "./fixtures.js";

describe("resolveValidateOptions", () => {
	it("applies defaults", () => {
		const resolved = resolveValidateOptions();

		expect(resolved.catalog).toBe(loadDefaultCatalog());
		expect(resolved.hooks.networkInspectors("MediaFile")).toHaveLength(1);
		expect(resolved.runCustom).toBe(true);
		expect(resolved.runNetwork).toBe(true);
		expect(resolved.client).toBe(proxyFetch);
		expect(resolved.timeout).toBe(2000);
		expect(resolved.signal).toBeUndefined();
	});

	it("shares the default registry between calls", () => {
		expect(resolveValidateOptions().hooks).toBe(resolveValidateOptions().hooks);
	});

	it("keeps caller settings", () => {
		const catalog = createTestCatalog();
		const hooks = new HookRegistry();
		const { client } = createFakeClient(() => new Response(null));
		const signal = new AbortController().signal;

		const resolved = resolveValidateOptions({
			catalog,
			hooks,
			http: { client, timeout: 500 },
			signal,
			logger: silentLogger,
		});

		expect(resolved).toEqual({
			catalog,
			hooks,
			runCustom: true,
			runNetwork: true,
			ignoreNamespaceAttributes: false,
			client,
			timeout: 500,
			signal,
			logger: silentLogger,
		});
	});

	it("disables network inspectors along with custom ones", () => {
		const resolved = resolveValidateOptions({ disableCustomValidators: true });

		expect(resolved.runCustom).toBe(false);
		expect(resolved.runNetwork).toBe(false);
	});

	it("disables network inspectors alone", () => {
		const resolved = resolveValidateOptions({ disableNetworkValidators: true });

		expect(resolved.runCustom).toBe(true);
		expect(resolved.runNetwork).toBe(false);
	});

	it("rejects invalid timeouts", () => {
		expect(() => resolveValidateOptions({ http: { timeout: -1 } })).toThrow("Invalid HTTP timeout: -1");
		expect(() => resolveValidateOptions({ http: { timeout: Number.NaN } })).toThrow("Invalid HTTP timeout: NaN");
	});
});

describe("mergeValidateOptions", () => {
	it("layers overrides and merges HTTP settings", () => {
		const { client } = createFakeClient(() => new Response(null));

		const merged = mergeValidateOptions(
			{ disableNetworkValidators: true, http: { client, timeout: 1000 } },
			{ disableNetworkValidators: false, http: { timeout: 250 } },
		);

		expect(merged).toEqual({ disableNetworkValidators: false, http: { client, timeout: 250 } });
	});

	it("keeps base settings that an override leaves undefined", () => {
		const catalog = createTestCatalog();
		const hooks = new HookRegistry();

		const merged = mergeValidateOptions(
			{ catalog, hooks, disableNetworkValidators: true },
			{ catalog: undefined, hooks: undefined, disableNetworkValidators: undefined },
		);

		expect(merged.catalog).toBe(catalog);
		expect(merged.hooks).toBe(hooks);
		expect(merged.disableNetworkValidators).toBe(true);
	});
});
