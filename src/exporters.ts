import { stringify } from "yaml";
import { SUFFIX_MARKER, cleanEntry } from "./domains";
import type { RuleSetRule, RuleSetSource } from "./types";
import { uniqueSorted } from "./utils";

// Версия формата исходника rule-set (sing-box 1.12+).
export const RULE_SET_VERSION = 4;

export type DomainSplit = { suffixes: string[]; exacts: string[] };

// Делим домены на суффиксы (без "+.") и точные записи.
export function splitDomains(domains: readonly string[]): DomainSplit {
	const suffixes: string[] = [];
	const exacts: string[] = [];

	for (const entry of domains) {
		const value = cleanEntry(entry);
		if (value.startsWith(SUFFIX_MARKER)) {
			suffixes.push(value.slice(SUFFIX_MARKER.length));
		} else {
			exacts.push(value);
		}
	}

	return { suffixes: uniqueSorted(suffixes), exacts: uniqueSorted(exacts) };
}

// Исходник rule-set для доменов: пустые блоки не выводим.
export function toDomainRuleSet(domains: readonly string[]): RuleSetSource {
	const { suffixes, exacts } = splitDomains(domains);
	const rules: RuleSetRule[] = [];
	if (suffixes.length) rules.push({ domain_suffix: suffixes });
	if (exacts.length) rules.push({ domain: exacts });
	return { version: RULE_SET_VERSION, rules };
}

export function toCidrRuleSet(cidrs: readonly string[]): RuleSetSource {
	const values = uniqueSorted(cidrs.map(cleanEntry).filter(Boolean));
	return {
		version: RULE_SET_VERSION,
		rules: values.length ? [{ ip_cidr: values }] : [],
	};
}

export function formatRuleSet(ruleSet: RuleSetSource): string {
	return `${JSON.stringify(ruleSet, null, 2)}\n`;
}

// YAML для Clash/Mihomo: единственное поле payload.
export function toClashPayload(entries: readonly string[]): string {
	return stringify({ payload: uniqueSorted(entries) });
}
