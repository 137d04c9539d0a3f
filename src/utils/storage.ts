import fs from "node:fs/promises";
import path from "node:path";
import { isRecord } from "./errors";

export async function readJson<T>(filePath: string, fallback: T): Promise<T> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content) as T;
	} catch (err: unknown) {
		if (isRecord(err) && err.code === "ENOENT") {
			return fallback;
		}
		throw err;
	}
}

export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmp = `${filePath}.tmp`;
	await fs.writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tmp, filePath);
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}

/**
 * Runs async writes one after another. A failed write rejects its own caller
 * but does not break the chain for the next one.
 */
export function createWriteQueue(): <T>(task: () => Promise<T>) => Promise<T> {
	let tail: Promise<unknown> = Promise.resolve();
	return <T>(task: () => Promise<T>): Promise<T> => {
		const run = tail.then(task, task);
		tail = run.catch(() => undefined);
		return run;
	};
}
