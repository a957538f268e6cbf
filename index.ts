#!/usr/bin/env node
import { main } from "./src/cli/index.js";

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err) => {
		console.error("Fatal error:", err instanceof Error ? err.message : String(err));
		process.exit(1);
	});
