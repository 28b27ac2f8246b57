#!/usr/bin/env node

import { pathToFileURL } from "node:url";
import { main } from "./main.js";

export { type CliDeps, runCli } from "./cli/index.js";

const entry = process.argv[1];

if (entry && import.meta.url === pathToFileURL(entry).href) {
	main(process.argv.slice(2)).then(
		(exitCode) => {
			process.exitCode = exitCode;
		},
		(error: unknown) => {
			const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
			console.error(`html2md: ${message}`);
			process.exitCode = 1;
		},
	);
}
