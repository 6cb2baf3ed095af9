#!/usr/bin/env node
import { reportFailure } from './failure.js';
import { createConsoleLogger } from './logger.js';
import { runRoundtrip } from './pipeline.js';

async function main(): Promise<void> {
	await runRoundtrip();
}

main().catch((err: unknown) => {
	process.exit(reportFailure(err, createConsoleLogger()));
});
