import fs from "node:fs";
import http from "node:http";
import https from "node:https";
import path from "node:path";
import type { FetchContext } from "./types";
import { errorMessage } from "./utils";

const MAX_REDIRECTS = 5;

// Простая загрузка текста по HTTP(S) с таймаутом, user-agent и редиректами.
export function httpGetText(url: string, timeoutMs: number, redirects = 0): Promise<string> {
	return new Promise((resolve, reject) => {
		const onResponse = (res: http.IncomingMessage) => {
			const status = res.statusCode ?? 0;
			const location = res.headers.location;

			if (status >= 300 && status < 400 && location) {
				res.resume();
				if (redirects >= MAX_REDIRECTS) {
					reject(new Error(`too many redirects for ${url}`));
					return;
				}
				let next: string;
				try {
					next = new URL(location, url).toString();
				} catch (err) {
					reject(new Error(`invalid redirect location "${location}" for ${url}: ${errorMessage(err)}`));
					return;
				}
				httpGetText(next, timeoutMs, redirects + 1).then(resolve, reject);
				return;
			}

			if (status >= 400) {
				res.resume();
				reject(new Error(`HTTP ${status} for ${url}`));
				return;
			}

			let body = "";
			res.setEncoding("utf8");
			res.on("data", (chunk) => {
				body += chunk;
			});
			res.on("end", () => resolve(body));
			res.on("error", reject);
		};

		const options = {
			timeout: timeoutMs,
			headers: { "user-agent": "rule-sync/1.0" },
		};
		const req = url.startsWith("http://")
			? http.get(url, options, onResponse)
			: https.get(url, options, onResponse);

		req.on("timeout", () => req.destroy(new Error(`timeout after ${timeoutMs}ms for ${url}`)));
		req.on("error", reject);
	});
}

// Скачиваем один источник в файл; любая ошибка фатальна.
export async function fetchSource(url: string, file: string, ctx: FetchContext): Promise<void> {
	const fetch = ctx.fetchFn ?? httpGetText;

	let text: string;
	try {
		text = await fetch(url, ctx.timeoutMs);
	} catch (err) {
		throw new Error(`failed to fetch ${url}: ${errorMessage(err)}`);
	}

	fs.writeFileSync(file, text, "utf8");
}

// Последовательно скачиваем все источники в dir/<name>.txt.
export async function fetchSources(
	sources: Record<string, string>,
	dir: string,
	ctx: FetchContext,
): Promise<Map<string, string>> {
	const files = new Map<string, string>();

	for (const [name, url] of Object.entries(sources)) {
		const file = path.join(dir, `${name}.txt`);
		console.log(`[fetch] ${name} -> ${file}`);
		await fetchSource(url, file, ctx);
		files.set(name, file);
	}

	return files;
}
