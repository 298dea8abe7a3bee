import { describe, expect, it } from "vitest";
import { EmptyDocumentError, MalformedDocumentError } from "../src/errors.js";
import { getAttribute, localName, parseDocument } from "../src/parser/index.js";

describe("parseDocument", () => {
	it("keeps attributes and children in document order", () => {
		const root = parseDocument('<VAST version="4.2"><Ad id="1" sequence="2"/><Ad id="2"/></VAST>');

		expect(root.name).toBe("VAST");
		expect(root.attributes).toEqual([{ name: "version", qualifiedName: "version", value: "4.2" }]);
		expect(root.children.map((child) => child.name)).toEqual(["Ad", "Ad"]);
		expect(root.children[0]?.attributes.map((attr) => attr.name)).toEqual(["id", "sequence"]);
	});

	it("strips namespace prefixes from element and attribute names", () => {
		const root = parseDocument('<v:VAST xmlns:v="urn:test" v:version="4.1"/>');

		expect(root.name).toBe("VAST");
		expect(root.attributes).toEqual([
			{ name: "v", qualifiedName: "xmlns:v", value: "urn:test" },
			{ name: "version", qualifiedName: "v:version", value: "4.1" },
		]);
	});

	it("joins trimmed text and CDATA runs with single spaces", () => {
		const root = parseDocument("<AdTitle>\n  Summer\n  <![CDATA[ Sale ]]>\n</AdTitle>");

		expect(root.text).toBe("Summer Sale");
	});

	it("ignores comments and processing instructions", () => {
		const root = parseDocument('<?xml version="1.0"?><VAST><!-- note --><Ad/></VAST>');

		expect(root.children).toHaveLength(1);
		expect(root.text).toBe("");
	});

	it("decodes byte input as UTF-8", () => {
		const root = parseDocument(new TextEncoder().encode("<AdTitle>Café</AdTitle>"));

		expect(root.text).toBe("Café");
	});

	it("rejects bytes that are not valid UTF-8", () => {
		const head = new TextEncoder().encode('<Root version="4.2">');
		const tail = new TextEncoder().encode("</Root>");
		const raw = new Uint8Array([...head, 0xff, 0xfe, ...tail]);

		expect(() => parseDocument(raw)).toThrow(MalformedDocumentError);
		expect(() => parseDocument(raw)).toThrow("Malformed markup: invalid UTF-8 byte sequence");
	});

	it("keeps every occurrence of a repeated attribute", () => {
		const root = parseDocument('<Child id="a" id="b"/>');

		expect(root.attributes).toEqual([
			{ name: "id", qualifiedName: "id", value: "a" },
			{ name: "id", qualifiedName: "id", value: "b" },
		]);
	});

	it("decodes references in repeated attribute values", () => {
		const root = parseDocument(`<Ad id="1 &lt; 2" id='say "hi" &amp; &#65;&#x42;'><Creative/></Ad>`);

		expect(root.attributes.map((attr) => attr.value)).toEqual(["1 < 2", 'say "hi" & AB']);
		expect(root.children.map((child) => child.name)).toEqual(["Creative"]);
	});

	it("rejects empty input", () => {
		expect(() => parseDocument("")).toThrow(EmptyDocumentError);
		expect(() => parseDocument(new Uint8Array(0))).toThrow(EmptyDocumentError);
	});

	it("rejects input without an element", () => {
		expect(() => parseDocument("   \n ")).toThrow("Document has no root element");
	});

	it("rejects mismatched closing tags with a position", () => {
		let caught: unknown;
		try {
			parseDocument("<VAST>\n<Ad></VAST>");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(MalformedDocumentError);
		if (caught instanceof MalformedDocumentError) {
			expect(caught.message.startsWith("Malformed markup: ")).toBe(true);
			expect(caught.line).toBe(2);
		}
	});

	it("rejects truncated input", () => {
		expect(() => parseDocument("<VAST><Ad>")).toThrow(MalformedDocumentError);
	});
});

describe("getAttribute", () => {
	it("returns the last value for a repeated local name", () => {
		const root = parseDocument('<MediaFile type="video/mp4" x:type="video/webm"/>');

		expect(getAttribute(root, "type")).toBe("video/webm");
	});

	it("returns the last value for a repeated qualified name", () => {
		const root = parseDocument('<VAST version="3.0" version="4.2"/>');

		expect(getAttribute(root, "version")).toBe("4.2");
	});

	it("returns undefined for absent attributes", () => {
		expect(getAttribute(parseDocument("<Ad/>"), "id")).toBeUndefined();
	});
});

describe("localName", () => {
	it("strips the prefix", () => {
		expect(localName("vast:Ad")).toBe("Ad");
		expect(localName("Ad")).toBe("Ad");
	});
});
