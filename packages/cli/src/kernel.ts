import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import ScanCommand from './commands/scan.ts'

export const VERSION = '0.1.0'

export const COMMANDS: ReadonlySet<string> = new Set([
	ScanCommand.commandName,
	HelpCommand.commandName,
])

/**
 * Kernel with the scan and help commands and the global `--help`/`--version` flags.
 */
export function createKernel() {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tokscope')
	kernel.info.set('version', VERSION)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.on('help', async (command, $kernel, parsed) => {
		parsed.args.unshift(command.commandName)
		const help = new HelpCommand($kernel, parsed, $kernel.ui, $kernel.prompt)
		await help.exec()
		return $kernel.shortcircuit()
	})

	kernel.on('version', async (_command, $kernel) => {
		$kernel.ui.logger.log(`tokscope v${VERSION}`)
		return $kernel.shortcircuit()
	})

	kernel.addLoader(new ListLoader([ScanCommand, HelpCommand]))
	return kernel
}
