import colors from 'colors'
import type {DecodeOptions, UnknownOpcodePolicy} from './bytecode-parser'
import {parseClassFile} from './class-file-parser'
import {listClass} from './class-listing'

export const USAGE = 'Usage: jvm-code-listing [--strict] FILE.class'
const STRICT = '--strict'

export interface ListingArgs {
	file: string
	unknownOpcodes: UnknownOpcodePolicy
}
export interface CliIO {
	readFile(file: string): Promise<Uint8Array>
	log(message: string): void
	error(message: string): void
}

//undefined when the arguments do not match USAGE
export function parseArgs(args: readonly string[]): ListingArgs | undefined {
	const flags = args.filter(arg => arg.startsWith('--'))
	const files = args.filter(arg => !arg.startsWith('--'))
	if (files.length !== 1 || flags.some(flag => flag !== STRICT)) return undefined
	return {
		file: files[0],
		unknownOpcodes: flags.includes(STRICT) ? 'abort' : 'resume'
	}
}

//Resolves to the process exit code
export function runCli(args: readonly string[], io: CliIO): Promise<number> {
	const parsed = parseArgs(args)
	if (!parsed) {
		io.error(colors.yellow(USAGE))
		return Promise.resolve(1)
	}
	const options: DecodeOptions = {
		unknownOpcodes: parsed.unknownOpcodes,
		logger: {error: message => io.error(colors.yellow(message))}
	}
	return io.readFile(parsed.file)
		.then(bytes => {
			io.log(listClass(parseClassFile(bytes), options))
			return 0
		})
		.catch((error: unknown) => {
			const message = error instanceof Error ? error.message : String(error)
			io.error(`${colors.red(colors.bold('error'))}: ${message}`)
			return 1
		})
}
