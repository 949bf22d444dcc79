import {TruncatedStreamError, UnknownOpcodeError} from './decode-errors'
import type {DecodeError} from './decode-errors'
import {lookup} from './instruction-catalog'
import {decodeOperands} from './operand-codec'
import {UNKNOWN_OPCODE} from './operand-format'
import type {DecodedOperands} from './operand-format'
import {parseByte, slice} from './parse'

export interface DecodedInstruction {
	readonly offset: number
	readonly opcode: number
	readonly text: string
	readonly constantPoolIndex?: number
	readonly length: number //including the wide prefix and switch padding
	readonly operands: readonly number[]
}

export interface DecodeFailure {
	offset: number //of the instruction that could not be decoded
	error: DecodeError
}
export interface DecodeResult {
	instructions: DecodedInstruction[]
	failure?: DecodeFailure
}

export type UnknownOpcodePolicy = 'resume' | 'abort'
export interface DecodeOptions {
	unknownOpcodes?: UnknownOpcodePolicy
	logger?: Pick<Console, 'error'>
}

export type CodeBytes = Uint8Array | DataView

const toDataView = (code: CodeBytes) =>
	code instanceof DataView
		? code
		: new DataView(code.buffer, code.byteOffset, code.byteLength)

function decodeInstruction(data: DataView, opcodeOffset: number) {
	const {result: opcode, length} = parseByte(slice(data, opcodeOffset))
	const offset = opcodeOffset + length
	const def = lookup(opcode)
	let decoded: DecodedOperands
	if (def) decoded = decodeOperands(def, data, offset)
	else decoded = {text: UNKNOWN_OPCODE, operands: [], newOffset: offset}
	const {text, operands, constantPoolIndex, newOffset} = decoded
	const instruction: DecodedInstruction = constantPoolIndex === undefined
		? {offset: opcodeOffset, opcode, text, length: newOffset - opcodeOffset, operands}
		: {offset: opcodeOffset, opcode, text, constantPoolIndex, length: newOffset - opcodeOffset, operands}
	return {instruction: Object.freeze(instruction), known: def !== undefined}
}

export function decodeCode(code: CodeBytes | null | undefined, options: DecodeOptions = {}): DecodeResult {
	const instructions: DecodedInstruction[] = []
	if (!code || !code.byteLength) return {instructions}
	const {unknownOpcodes = 'resume'} = options
	const data = toDataView(code)
	let offset = 0
	while (offset < data.byteLength) {
		let decoded: ReturnType<typeof decodeInstruction>
		try {
			decoded = decodeInstruction(data, offset)
		}
		catch (e) {
			if (e instanceof TruncatedStreamError) return {instructions, failure: {offset, error: e}}
			throw e
		}
		const {instruction, known} = decoded
		instructions.push(instruction)
		if (!known && unknownOpcodes === 'abort') {
			return {instructions, failure: {offset, error: new UnknownOpcodeError(instruction.opcode)}}
		}
		offset += instruction.length
	}
	return {instructions}
}

export function logFailure({offset, error}: DecodeFailure, codeLength: number, {logger = console}: DecodeOptions) {
	logger.error(`Decoding stopped at offset ${offset} of ${codeLength}-byte code: ${error.message}`)
}

//Logs a failure instead of returning it
export function decode(code: CodeBytes | null | undefined, options: DecodeOptions = {}): DecodedInstruction[] {
	const {instructions, failure} = decodeCode(code, options)
	if (failure) logFailure(failure, code ? code.byteLength : 0, options)
	return instructions
}
