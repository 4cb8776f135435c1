#!/usr/bin/env -S node --import tsx

import { COMMANDS, createKernel } from './kernel.ts'
import { resolveArgv } from './utils.ts'

async function main(): Promise<void> {
	const kernel = createKernel()

	await kernel.handle(resolveArgv(process.argv.slice(2), COMMANDS))
	if (kernel.exitCode !== undefined) {
		process.exitCode = kernel.exitCode
	}
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
