import { readFileSync } from "node:fs";

export function getVersion(): string {
	const pkgPath = new URL("../../package.json", import.meta.url);
	const raw = readFileSync(pkgPath, "utf8");
	const pkg = JSON.parse(raw) as { version?: string };
	return pkg.version ?? "0.0.0";
}
