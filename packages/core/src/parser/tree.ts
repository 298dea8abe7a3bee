/**
 * @title Tree Parser
 * @description Streams raw markup into a generic, ordered node tree.
 *
 * The tree keeps attributes and children in document order and folds all
 * text and CDATA runs of an element into one trimmed string. Comments,
 * processing instructions and doctypes are not modelled.
 *
 * @module parser
 */

import sax from "sax";
import { EmptyDocumentError, MalformedDocumentError } from "../errors.js";

/**
 * An attribute as it appeared on an element.
 */
export interface DocumentAttribute {
	/** Local name (namespace prefix stripped). */
	name: string;
	/** Name as written, including any prefix. */
	qualifiedName: string;
	value: string;
}

/**
 * One element of the parsed document.
 */
export interface DocumentNode {
	/** Local name (namespace prefix stripped). */
	name: string;
	/** Attributes in document order; local names may repeat. */
	attributes: DocumentAttribute[];
	children: DocumentNode[];
	/** Trimmed text runs joined by single spaces. */
	text: string;
}

const decoder = new TextDecoder("utf-8", { fatal: true });

/** `name="value"` or `name='value'` inside a start tag. */
const ATTRIBUTE_PATTERN = /([^\s=/>]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const REFERENCE_PATTERN = /&(?:#x([0-9a-fA-F]+)|#([0-9]+)|(amp|lt|gt|quot|apos));/g;
const NAMED_REFERENCES: Record<string, string> = { amp: "&", lt: "<", gt: ">", quot: '"', apos: "'" };

/**
 * Strip the namespace prefix from a qualified name.
 */
export function localName(name: string): string {
	const idx = name.indexOf(":");
	return idx >= 0 ? name.substring(idx + 1) : name;
}

/**
 * Look up an attribute value by local name. The last occurrence wins.
 */
export function getAttribute(node: DocumentNode, name: string): string | undefined {
	let value: string | undefined;
	for (const attr of node.attributes) {
		if (attr.name === name) {
			value = attr.value;
		}
	}
	return value;
}

function decodeReferences(value: string): string {
	return value.replace(
		REFERENCE_PATTERN,
		(match: string, hex: string | undefined, decimal: string | undefined, named: string | undefined) => {
			if (hex !== undefined) {
				return String.fromCodePoint(parseInt(hex, 16));
			}
			if (decimal !== undefined) {
				return String.fromCodePoint(parseInt(decimal, 10));
			}
			return (named !== undefined ? NAMED_REFERENCES[named] : undefined) ?? match;
		},
	);
}

/**
 * Every attribute written in a start tag, repeats included.
 */
function scanAttributes(source: string): DocumentAttribute[] {
	return [...source.matchAll(ATTRIBUTE_PATTERN)].map((match) => {
		const qualifiedName = match[1] ?? "";
		return {
			name: localName(qualifiedName),
			qualifiedName,
			value: decodeReferences(match[2] ?? match[3] ?? ""),
		};
	});
}

function decodeBytes(raw: Uint8Array): string {
	try {
		return decoder.decode(raw);
	} catch (error) {
		throw new MalformedDocumentError("Malformed markup: invalid UTF-8 byte sequence", { cause: error });
	}
}

/**
 * Parse raw markup into a node tree.
 *
 * @param raw - Document as a string or UTF-8 bytes
 * @returns The root node
 * @throws EmptyDocumentError when the input is empty or holds no element
 * @throws MalformedDocumentError on syntax errors, unbalanced tags or truncated input
 */
export function parseDocument(raw: string | Uint8Array): DocumentNode {
	if (raw.length === 0) {
		throw new EmptyDocumentError();
	}
	const content = typeof raw === "string" ? raw : decodeBytes(raw);

	const parser = sax.parser(true, { position: true });
	const stack: DocumentNode[] = [];
	let root: DocumentNode | undefined;
	let pending: DocumentAttribute[] = [];
	let tagStart = 0;

	const fail = (message: string, cause?: unknown): never => {
		throw new MalformedDocumentError(message, { line: parser.line + 1, column: parser.column, cause });
	};

	const appendText = (value: string): void => {
		const current = stack[stack.length - 1];
		const trimmed = value.trim();
		if (!current || trimmed === "") {
			return;
		}
		current.text = current.text === "" ? trimmed : `${current.text} ${trimmed}`;
	};

	parser.onerror = (error) => {
		const [firstLine] = error.message.split("\n");
		fail(`Malformed markup: ${firstLine}`, error);
	};

	parser.onopentagstart = () => {
		pending = [];
		tagStart = parser.position - 1;
	};

	parser.onattribute = (attr) => {
		pending.push({ name: localName(attr.name), qualifiedName: attr.name, value: attr.value });
	};

	parser.onopentag = (tag) => {
		// sax keeps only the first of a repeated attribute name; recover the rest from the tag source.
		const written = scanAttributes(content.slice(tagStart, parser.position));
		const attributes = written.length > pending.length ? written : pending;
		const node: DocumentNode = { name: localName(tag.name), attributes, children: [], text: "" };
		pending = [];

		const parent = stack[stack.length - 1];
		if (parent) {
			parent.children.push(node);
		} else if (root) {
			fail(`Unexpected second root element <${tag.name}>`);
		} else {
			root = node;
		}
		stack.push(node);
	};

	parser.onclosetag = () => {
		stack.pop();
	};

	parser.ontext = appendText;
	parser.oncdata = appendText;

	parser.write(content).close();

	if (!root) {
		throw new EmptyDocumentError("Document has no root element");
	}
	return root;
}
