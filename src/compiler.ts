import { execFileSync } from "node:child_process";
import type { CompileResult, ExecFn, ExecOpts } from "./types";

export const DEFAULT_COMPILER = "sing-box";

// Запуск бинаря; stdout и stderr перехватываем для диагностики.
const execFile: ExecFn = (file, args) =>
	execFileSync(file, args, { encoding: "utf8", stdio: ["ignore", "pipe", "pipe"] }).trim();

// Аргументы `sing-box rule-set compile` (1.12+).
export function compileArgs(jsonPath: string, srsPath: string): string[] {
	return ["rule-set", "compile", "--output", srsPath, jsonPath];
}

type ExecFailure = Partial<{
	code: string;
	status: number | string | null;
	stderr: unknown;
	message: string;
}>;

function describeFailure(error: unknown): { missing: boolean; message: string } {
	const err: ExecFailure = typeof error === "object" && error !== null ? error : {};

	if (err.code === "ENOENT" || err.code === "EACCES") {
		return { missing: true, message: err.message ?? String(error) };
	}

	const status = err.status !== undefined && err.status !== null ? String(err.status) : "";
	const stderr = String(err.stderr ?? "").trim();

	const details: string[] = [];
	if (err.message) details.push(err.message.trim());
	if (status) details.push(`status=${status}`);
	// execFileSync уже дописывает stderr в message
	if (stderr && !err.message?.includes(stderr)) details.push(`stderr=${stderr.slice(0, 200)}`);

	return { missing: false, message: details.join("; ") || String(error) };
}

// Компилируем исходник rule-set в .srs; отсутствие бинаря не считается ошибкой.
export function compileRuleSet(jsonPath: string, srsPath: string, opts: ExecOpts = {}): CompileResult {
	const compiler = opts.compiler ?? DEFAULT_COMPILER;
	const args = compileArgs(jsonPath, srsPath);

	const exec = opts.execFn ?? execFile;

	try {
		exec(compiler, args);
		return { status: "compiled" };
	} catch (error) {
		const { missing, message } = describeFailure(error);
		if (missing) return { status: "tool-unavailable" };
		return { status: "compile-failed", message };
	}
}
