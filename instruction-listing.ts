import type {DecodedInstruction} from './bytecode-parser'

export const MAX_DESCRIPTION_LENGTH = 1000

export interface ConstantResolver {
	describe(index: number): string
}

const hexByte = (byte: number) =>
	byte.toString(16).toUpperCase().padStart(2, '0')

export const truncateDescription = (description: string) =>
	description.length > MAX_DESCRIPTION_LENGTH
		? description.slice(0, MAX_DESCRIPTION_LENGTH)
		: description

export function formatInstruction(
	{offset, opcode, text, constantPoolIndex}: DecodedInstruction,
	resolver?: ConstantResolver
): string {
	let line = `Offset ${String(offset).padStart(4, '0')}: opcode [${hexByte(opcode)}] ${text}`
	if (constantPoolIndex !== undefined) {
		line += ' ' + String(constantPoolIndex)
		if (resolver) line += ' - ' + truncateDescription(resolver.describe(constantPoolIndex))
	}
	return line
}

export const formatListing = (instructions: readonly DecodedInstruction[], resolver?: ConstantResolver) =>
	instructions.map(instruction => formatInstruction(instruction, resolver)).join('\n')
