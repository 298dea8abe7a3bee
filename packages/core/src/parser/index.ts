/**
 * Markup parsing into a generic node tree.
 */

export { parseDocument, localName, getAttribute, type DocumentNode, type DocumentAttribute } from "./tree.js";
