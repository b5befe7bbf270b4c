import fs from "node:fs";

export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Читаем JSON-файл; при отсутствии файла возвращаем fallback.
export function readJson<T>(file: string, fallback: T): T {
	if (!fs.existsSync(file)) return fallback;
	const text = fs.readFileSync(file, "utf8").replace(/^\uFEFF/, "");
	const data: T = JSON.parse(text);
	return data;
}

// Дедупликация с сортировкой по кодовым точкам.
export function uniqueSorted(values: Iterable<string>): string[] {
	return [...new Set(values)].sort();
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
