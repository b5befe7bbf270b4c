import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadPayload, parsePayload } from "../src/payload";

const dataRoot = path.join(__dirname, "fixtures", "data");

describe("payload", () => {
	it("читает блочный список и отбрасывает пустые записи", () => {
		expect(loadPayload(path.join(dataRoot, "private.txt"))).toEqual(["+.local", "localhost", "+.lan"]);
	});

	it("читает flow-последовательность", () => {
		expect(parsePayload("payload: ['+.a.com', \"b.com\",   c.com ]\n", "inline")).toEqual([
			"+.a.com",
			"b.com",
			"c.com",
		]);
	});

	it("допускает целые числа и пропускает прочие типы", () => {
		const text = "payload:\n  - 42\n  - 1.5\n  - true\n  - null\n  - { a: 1 }\n  - '  x.com  '\n";
		expect(parsePayload(text, "mixed")).toEqual(["42", "x.com"]);
	});

	it("сохраняет большие целые без потери точности", () => {
		expect(parsePayload("payload:\n  - 12345678901234567890\n", "bigint")).toEqual(["12345678901234567890"]);
	});

	it("игнорирует BOM в начале файла", () => {
		expect(parsePayload("\uFEFFpayload:\n  - a.com\n", "bom")).toEqual(["a.com"]);
	});

	it("падает без поля payload", () => {
		expect(() => loadPayload(path.join(dataRoot, "broken.txt"))).toThrow(/invalid rule-set payload/);
		expect(() => parsePayload("payload: example.com\n", "scalar")).toThrow(
			"invalid rule-set payload: scalar",
		);
		expect(() => parsePayload("- a.com\n", "list")).toThrow("invalid rule-set payload: list");
		expect(() => parsePayload("", "empty")).toThrow("invalid rule-set payload: empty");
	});

	it("падает на синтаксически битом YAML", () => {
		expect(() => parsePayload("payload: [a.com\n", "unclosed")).toThrow(
			/^invalid rule-set payload: unclosed \(/,
		);
	});
});
