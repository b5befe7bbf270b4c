// Маркер суффиксного правила Clash: "+.example.com" = example.com и все поддомены.
export const SUFFIX_MARKER = "+.";

// Убираем пробелы и обрамляющие кавычки.
export function cleanEntry(entry: string): string {
	return entry
		.trim()
		.replace(/^'+|'+$/g, "")
		.replace(/^"+|"+$/g, "");
}

export function isSuffixEntry(entry: string): boolean {
	return cleanEntry(entry).startsWith(SUFFIX_MARKER);
}

// Приводим запись к голому домену для сравнения.
export function normalizeDomain(entry: string): string {
	const cleaned = cleanEntry(entry);
	return cleaned.startsWith(SUFFIX_MARKER) ? cleaned.slice(SUFFIX_MARKER.length) : cleaned;
}

// Собираем множество суффиксов из "+." записей списка.
export function collectSuffixes(entries: Iterable<string>): Set<string> {
	const suffixes = new Set<string>();
	for (const entry of entries) {
		if (isSuffixEntry(entry)) suffixes.add(normalizeDomain(entry));
	}
	return suffixes;
}

// Совпадение по границе метки: сам домен или любой его родитель.
export function coveredBySuffix(domain: string, suffixes: ReadonlySet<string>): boolean {
	if (suffixes.has(domain)) return true;

	// "a.b.example.com" -> "b.example.com", "example.com", "com"
	const labels = domain.split(".");
	for (let i = 1; i < labels.length; i++) {
		if (suffixes.has(labels.slice(i).join("."))) return true;
	}
	return false;
}

// Удаляем записи, попадающие под любой суффикс исключения.
export function removeIntersections(domains: readonly string[], suffixes: ReadonlySet<string>): string[] {
	if (!suffixes.size) return [...domains];

	const result: string[] = [];
	for (const entry of domains) {
		const raw = cleanEntry(entry);
		if (coveredBySuffix(normalizeDomain(raw), suffixes)) continue;
		result.push(raw || entry);
	}
	return result;
}
