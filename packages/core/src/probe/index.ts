/**
 * Asset probing and the built-in media file inspector.
 */

export { DEFAULT_NETWORK_TIMEOUT, abortReason, createDeadline, sendRequest, type Deadline } from "./http.js";
export { PROBE_RANGE, normalizeAssetUrl, probeAsset, type ProbeOptions } from "./asset-probe.js";
export { MEDIA_FILE_NODE, mediaFileInspector } from "./media-file.js";
