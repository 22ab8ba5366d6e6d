import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

// The calculator must stay pure: no drivers, no exchange clients, no filesystem.
const FORBIDDEN = /from\s+["'](pg|ccxt|dotenv|node:fs|node:net|@indisync\/(data|persistence|sync-engine))["']/;
const TARGETS = [
	{
		name: "indicators",
		dir: path.join(__dirname, "../../../indicators/src"),
	},
];

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	while (stack.length) {
		const current = stack.pop();
		if (current === undefined) break;
		const stat = fs.statSync(current);
		if (stat.isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
			continue;
		}
		if (current.endsWith(".ts") && !current.endsWith(".test.ts")) {
			results.push(current);
		}
	}
	return results;
};

describe("import boundaries", () => {
	for (const target of TARGETS) {
		it(`should keep ${target.name} free of I/O imports`, () => {
			const files = walkFiles(target.dir);
			expect(files.length).toBeGreaterThan(0);
			const offenders = files.filter((file) =>
				FORBIDDEN.test(fs.readFileSync(file, "utf-8"))
			);
			expect(offenders).toEqual([]);
		});
	}
});
