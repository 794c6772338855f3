#!/usr/bin/env node

import { run } from "./app.js";

async function main() {
	process.exitCode = await run(process.argv.slice(2));
}

main().catch((e: unknown) => {
	console.error(e);
	process.exitCode = 1;
});
