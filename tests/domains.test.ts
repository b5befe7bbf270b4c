import { describe, expect, it } from "vitest";
import {
	cleanEntry,
	collectSuffixes,
	coveredBySuffix,
	normalizeDomain,
	removeIntersections,
} from "../src/domains";

describe("нормализация", () => {
	it("снимает пробелы, кавычки и маркер суффикса", () => {
		expect(normalizeDomain("  '+.example.com' ")).toBe("example.com");
		expect(normalizeDomain('"foo.com"')).toBe("foo.com");
		expect(normalizeDomain("'\"+.bar.com\"'")).toBe("bar.com");
		expect(cleanEntry(" '+.example.com' ")).toBe("+.example.com");
	});

	it("собирает только суффиксные записи", () => {
		const suffixes = collectSuffixes(["+.google.com", "gstatic.com", "'+.youtube.com'"]);
		expect([...suffixes].sort()).toEqual(["google.com", "youtube.com"]);
	});
});

describe("совпадение по границе метки", () => {
	const suffixes = new Set(["google.com"]);

	it("совпадает с самим суффиксом и его поддоменами", () => {
		expect(coveredBySuffix("google.com", suffixes)).toBe(true);
		expect(coveredBySuffix("foo.google.com", suffixes)).toBe(true);
		expect(coveredBySuffix("a.b.google.com", suffixes)).toBe(true);
	});

	it("не совпадает с подстрокой внутри метки", () => {
		expect(coveredBySuffix("notgoogle.com", suffixes)).toBe(false);
		expect(coveredBySuffix("google.com.cn", suffixes)).toBe(false);
		expect(coveredBySuffix("com", suffixes)).toBe(false);
	});
});

describe("removeIntersections", () => {
	it("убирает домены под суффиксами google", () => {
		const out = removeIntersections(
			["+.a.google.com", "notgoogle.com", "example.com"],
			new Set(["google.com"]),
		);
		expect(out).toEqual(["notgoogle.com", "example.com"]);
	});

	it("возвращает вход без изменений при пустом исключении", () => {
		const input = ["b.com", "+.a.com", " 'c.com' ", "b.com"];
		const out = removeIntersections(input, new Set());
		expect(out).toEqual(input);
		expect(out).not.toBe(input);
	});

	it("исключает точное совпадение без маркера", () => {
		expect(removeIntersections(["google.com", "+.google.com"], new Set(["google.com"]))).toEqual([]);
	});

	it("сохраняет маркер у оставшихся записей и снимает кавычки", () => {
		const out = removeIntersections(["'+.example.org'", "mail.google.com"], new Set(["google.com"]));
		expect(out).toEqual(["+.example.org"]);
	});

	it("учитывает несколько суффиксов и сохраняет порядок", () => {
		const suffixes = new Set(["google.com", "youtube.com"]);
		const out = removeIntersections(
			["z.com", "m.youtube.com", "a.com", "youtube.com.evil", "www.google.com"],
			suffixes,
		);
		expect(out).toEqual(["z.com", "a.com", "youtube.com.evil"]);
	});

	it("не мутирует входной список", () => {
		const input = ["a.google.com", "b.com"];
		removeIntersections(input, new Set(["google.com"]));
		expect(input).toEqual(["a.google.com", "b.com"]);
	});
});
