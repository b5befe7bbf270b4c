import fs from "node:fs";
import { parse } from "yaml";
import { errorMessage, isObject } from "./utils";

// Приводим элемент payload к строке; числа допускаем только целые.
function toEntry(item: unknown): string | null {
	if (typeof item === "string") return item.trim();
	if (typeof item === "bigint") return item.toString();
	if (typeof item === "number" && Number.isInteger(item)) return String(item);
	return null;
}

// Разбираем rule-provider вида `payload: [...]` в список строк.
export function parsePayload(text: string, origin: string): string[] {
	let data: unknown;
	try {
		data = parse(text.replace(/^\uFEFF/, ""), { intAsBigInt: true });
	} catch (err) {
		throw new Error(`invalid rule-set payload: ${origin} (${errorMessage(err)})`);
	}

	const payload = isObject(data) ? data.payload : undefined;
	if (!Array.isArray(payload)) {
		throw new Error(`invalid rule-set payload: ${origin}`);
	}

	const entries: string[] = [];
	for (const item of payload) {
		const entry = toEntry(item);
		if (entry) entries.push(entry);
	}
	return entries;
}

// Читаем скачанный файл и разбираем payload.
export function loadPayload(file: string): string[] {
	return parsePayload(fs.readFileSync(file, "utf8"), file);
}
