#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { compileRuleSet, DEFAULT_COMPILER } from "./compiler";
import { collectSuffixes, removeIntersections } from "./domains";
import { formatRuleSet, toCidrRuleSet, toClashPayload, toDomainRuleSet } from "./exporters";
import { fetchSources } from "./fetcher";
import { loadPayload } from "./payload";
import type {
	BuildReport,
	CompileResult,
	Config,
	OutputDirs,
	ResolvedConfig,
	Target,
	TargetReport,
} from "./types";
import { isObject, readJson } from "./utils";

const PROJECT_ROOT = path.join(__dirname, "..");

const RELEASE_URL = "https://raw.githubusercontent.com/Loyalsoldier/clash-rules/release/";

export const DEFAULT_SOURCES: Record<string, string> = {
	direct: `${RELEASE_URL}direct.txt`,
	private: `${RELEASE_URL}private.txt`,
	cncidr: `${RELEASE_URL}cncidr.txt`,
	google: `${RELEASE_URL}google.txt`,
};

// direct без доменов, уже покрытых суффиксами google.
export const DEFAULT_TARGETS: Target[] = [
	{ name: "direct", kind: "domain", excludeSuffixesFrom: ["google"] },
	{ name: "private", kind: "domain" },
	{ name: "cncidr", kind: "ipcidr" },
];

const DEFAULT_RULES_DIR = "rules";
const DEFAULT_OUTPUT_DIRS: OutputDirs = {
	listFormat: "out/clash",
	ruleSource: "out/singbox",
	compiledArtifact: "out/srs",
};
const DEFAULT_TIMEOUT_MS = 20000;

// Проверяем, что цели ссылаются только на объявленные источники.
function validateTargets(targets: Target[], sources: Record<string, string>): void {
	const seen = new Set<string>();

	for (const target of targets) {
		if (!target.name) throw new Error("target without name");
		if (seen.has(target.name)) throw new Error(`duplicate target: ${target.name}`);
		seen.add(target.name);

		// config.json не проходит проверку типов
		const kind: string = target.kind;
		if (kind !== "domain" && kind !== "ipcidr") {
			throw new Error(`unknown kind for target ${target.name}: ${kind}`);
		}
		if (!sources[target.name]) {
			throw new Error(`unknown source for target ${target.name}`);
		}
		if (kind === "ipcidr" && target.excludeSuffixesFrom?.length) {
			throw new Error(`excludeSuffixesFrom is not supported for ipcidr target ${target.name}`);
		}
		for (const name of target.excludeSuffixesFrom ?? []) {
			if (!sources[name]) throw new Error(`unknown source ${name} excluded from ${target.name}`);
		}
	}
}

// Подставляем значения по умолчанию и приводим пути к абсолютным.
export function resolveConfig(cfg: Config): ResolvedConfig {
	const rootDir = path.resolve(cfg.rootDir ?? PROJECT_ROOT);
	const sources = cfg.sources ?? DEFAULT_SOURCES;
	const targets = cfg.targets ?? DEFAULT_TARGETS;
	const dirs: OutputDirs = { ...DEFAULT_OUTPUT_DIRS, ...cfg.outputDirs };

	validateTargets(targets, sources);

	return {
		sources,
		targets,
		rulesDir: path.resolve(rootDir, cfg.rulesDir ?? DEFAULT_RULES_DIR),
		outputDirs: {
			listFormat: path.resolve(rootDir, dirs.listFormat),
			ruleSource: path.resolve(rootDir, dirs.ruleSource),
			compiledArtifact: path.resolve(rootDir, dirs.compiledArtifact),
		},
		compiler: cfg.compiler ?? DEFAULT_COMPILER,
		timeoutMs: cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		fetchFn: cfg.fetchFn,
		execFn: cfg.execFn,
	};
}

function ensureDirs(cfg: ResolvedConfig): void {
	const { listFormat, ruleSource, compiledArtifact } = cfg.outputDirs;
	for (const dir of [cfg.rulesDir, listFormat, ruleSource, compiledArtifact]) {
		fs.mkdirSync(dir, { recursive: true });
	}
}

function payloadOf(payloads: Map<string, string[]>, name: string): string[] {
	const entries = payloads.get(name);
	if (!entries) throw new Error(`source not loaded: ${name}`);
	return entries;
}

// Записи цели после исключения чужих суффиксов.
function targetEntries(target: Target, payloads: Map<string, string[]>): string[] {
	const entries = payloadOf(payloads, target.name);
	const excluded = target.excludeSuffixesFrom ?? [];
	if (target.kind !== "domain" || !excluded.length) return entries;

	const suffixes = new Set<string>();
	for (const name of excluded) {
		for (const suffix of collectSuffixes(payloadOf(payloads, name))) suffixes.add(suffix);
	}

	const reduced = removeIntersections(entries, suffixes);
	console.log(
		`[reduce] ${target.name}: ${entries.length} -> ${reduced.length} entries, excluded by ${excluded.join(", ")} (${suffixes.size} suffix(es))`,
	);
	return reduced;
}

function logCompile(target: string, srsPath: string, result: CompileResult): void {
	switch (result.status) {
		case "compiled":
			console.log(`[compile] ${target} -> ${srsPath}`);
			break;
		case "tool-unavailable":
			console.warn(`[compile:warn] compiler not found, skipping ${srsPath}`);
			break;
		case "compile-failed":
			console.error(`[compile:error] ${target}: ${result.message}`);
			break;
	}
}

// Основной сценарий: скачать, разобрать, отфильтровать, выгрузить и скомпилировать.
export async function runBuild(cfg: Config): Promise<BuildReport> {
	const resolved = resolveConfig(cfg);
	const { outputDirs } = resolved;

	console.log(
		`[config] sources=${Object.keys(resolved.sources).join(",")}, targets=${resolved.targets
			.map((t) => t.name)
			.join(",")}, compiler=${resolved.compiler}`,
	);

	ensureDirs(resolved);

	const files = await fetchSources(resolved.sources, resolved.rulesDir, {
		timeoutMs: resolved.timeoutMs,
		fetchFn: resolved.fetchFn,
	});

	// Все источники разбираем до записи первого файла.
	const payloads = new Map<string, string[]>();
	for (const [name, file] of files) {
		const entries = loadPayload(file);
		console.log(`[load] ${name}: ${entries.length} entries`);
		payloads.set(name, entries);
	}

	const prepared = resolved.targets.map((target) => ({
		target,
		entries: targetEntries(target, payloads),
		listPath: path.join(outputDirs.listFormat, `${target.name}.yaml`),
		ruleSourcePath: path.join(outputDirs.ruleSource, `${target.name}.json`),
		compiledPath: path.join(outputDirs.compiledArtifact, `${target.name}.srs`),
	}));

	for (const item of prepared) {
		fs.writeFileSync(item.listPath, toClashPayload(item.entries), "utf8");
		console.log(`[write] ${item.listPath}`);
	}

	for (const item of prepared) {
		const ruleSet =
			item.target.kind === "domain" ? toDomainRuleSet(item.entries) : toCidrRuleSet(item.entries);
		fs.writeFileSync(item.ruleSourcePath, formatRuleSet(ruleSet), "utf8");
		console.log(`[write] ${item.ruleSourcePath}`);
	}

	const reports: TargetReport[] = [];
	for (const item of prepared) {
		const compile = compileRuleSet(item.ruleSourcePath, item.compiledPath, {
			compiler: resolved.compiler,
			execFn: resolved.execFn,
		});
		logCompile(item.target.name, item.compiledPath, compile);

		reports.push({
			name: item.target.name,
			entries: item.entries.length,
			listPath: item.listPath,
			ruleSourcePath: item.ruleSourcePath,
			compiledPath: item.compiledPath,
			compile,
		});
	}

	const count = (status: CompileResult["status"]) =>
		reports.filter((r) => r.compile.status === status).length;
	const failed = count("compile-failed");

	console.log(
		`Done. targets=${reports.length}, compiled=${count("compiled")}, skipped=${count(
			"tool-unavailable",
		)}, failed=${failed}${failed ? " (see errors above)" : ""}`,
	);

	return { targets: reports };
}

// Точка входа CLI.
async function main(): Promise<void> {
	const configPath = path.join(PROJECT_ROOT, "config.json");
	const cfg = readJson<Config | null>(configPath, null);
	if (!cfg || !isObject(cfg)) throw new Error(`Config not found or invalid JSON: ${configPath}`);
	console.log(`[config] path=${configPath}`);
	await runBuild(cfg);
}

if (require.main === module) {
	main().catch((err) => {
		console.error("ERROR:", err instanceof Error ? err.stack : String(err));
		process.exit(1);
	});
}
