// Тип категории правил: домены или подсети.
export type TargetKind = "domain" | "ipcidr";

// Выходная категория: берёт источник с тем же именем.
export type Target = {
	name: string;
	kind: TargetKind;
	excludeSuffixesFrom?: string[];
};

// Каталоги для результатов.
export type OutputDirs = {
	listFormat: string;
	ruleSource: string;
	compiledArtifact: string;
};

export type FetchFn = (url: string, timeoutMs: number) => Promise<string>;

export type ExecFn = (file: string, args: string[]) => string;

// Конфигурация приложения, загружаемая из config.json.
export type Config = {
	rootDir?: string;
	sources?: Record<string, string>;
	targets?: Target[];
	rulesDir?: string;
	outputDirs?: Partial<OutputDirs>;
	compiler?: string;
	timeoutMs?: number;
	fetchFn?: FetchFn;
	execFn?: ExecFn;
};

// Конфигурация после подстановки значений по умолчанию.
export type ResolvedConfig = {
	sources: Record<string, string>;
	targets: Target[];
	rulesDir: string;
	outputDirs: OutputDirs;
	compiler: string;
	timeoutMs: number;
	fetchFn?: FetchFn;
	execFn?: ExecFn;
};

// Опции запуска компилятора.
export type ExecOpts = {
	compiler?: string;
	execFn?: ExecFn;
};

// Контекст загрузки источников.
export type FetchContext = {
	timeoutMs: number;
	fetchFn?: FetchFn;
};

// Итог компиляции одного rule-set.
export type CompileResult =
	| { status: "compiled" }
	| { status: "tool-unavailable" }
	| { status: "compile-failed"; message: string };

// Блок правил sing-box.
export type RuleSetRule = {
	domain_suffix?: string[];
	domain?: string[];
	ip_cidr?: string[];
};

// Исходник rule-set для `sing-box rule-set compile`.
export type RuleSetSource = {
	version: number;
	rules: RuleSetRule[];
};

// Что получилось по каждой категории.
export type TargetReport = {
	name: string;
	entries: number;
	listPath: string;
	ruleSourcePath: string;
	compiledPath: string;
	compile: CompileResult;
};

export type BuildReport = {
	targets: TargetReport[];
};
