/**
 * @title Default Hooks
 * @description Registry pre-populated with the built-in inspectors.
 *
 * @module hooks
 */

import { MEDIA_FILE_NODE, mediaFileInspector } from "../probe/media-file.js";
import { HookRegistry } from "./registry.js";

/**
 * Create a registry holding the built-in inspectors: the media file probe.
 */
export function createDefaultHookRegistry(): HookRegistry {
	const registry = new HookRegistry();
	registry.register(MEDIA_FILE_NODE, mediaFileInspector);
	return registry;
}
