import {SmartBuffer} from 'smart-buffer'
import type {OperandShape} from './instruction-catalog'
import {lookup, opcodeOf} from './instruction-catalog'
import {pad} from './switch-parser'

//`operands` has the same layout as DecodedInstruction.operands
export interface AssemblyInstruction {
	mnemonic: string
	operands?: readonly number[]
}

type OperandWriter = (output: SmartBuffer, operands: readonly number[]) => void

function expectOperands(operands: readonly number[], count: number, mnemonic: string) {
	if (operands.length !== count) {
		throw new Error(`${mnemonic} takes ${count} operand${count === 1 ? '' : 's'}, got ${operands.length}`)
	}
}
const padTo4 = (output: SmartBuffer) => {
	const padding = pad(output.length) - output.length
	for (let i = 0; i < padding; i++) output.writeUInt8(0)
}
const writeWide: OperandWriter = (output, [innerOpcode, ...rest]) => {
	if (innerOpcode === undefined) throw new Error('wide needs an inner opcode')
	output.writeUInt8(innerOpcode)
	const inner = lookup(innerOpcode)
	if (!inner || !rest.length) return
	const [index, value] = rest
	output.writeUInt16BE(index)
	if (inner.mnemonic === 'iinc') {
		if (value === undefined) throw new Error('wide iinc needs a constant')
		output.writeInt16BE(value)
	}
}

const OPERAND_WRITERS: {[shape in OperandShape]: [number | undefined, OperandWriter]} = {
	'none': [0, () => {}],
	'u8': [1, (output, [value]) => output.writeUInt8(value)],
	'u16': [1, (output, [value]) => output.writeUInt16BE(value)],
	's16': [1, (output, [value]) => output.writeInt16BE(value)],
	's32': [1, (output, [value]) => output.writeInt32BE(value)],
	'local-index-and-const': [2, (output, [index, value]) => {
		output.writeUInt8(index)
		output.writeInt8(value)
	}],
	'constant-pool-u8': [1, (output, [index]) => output.writeUInt8(index)],
	'constant-pool-u16': [1, (output, [index]) => output.writeUInt16BE(index)],
	'invoke-interface': [2, (output, [index, count]) => {
		output.writeUInt16BE(index)
		output.writeUInt8(count)
		output.writeUInt8(0)
	}],
	'invoke-dynamic': [1, (output, [index]) => {
		output.writeUInt16BE(index)
		output.writeUInt16BE(0)
	}],
	'new-array-primitive': [1, (output, [type]) => output.writeUInt8(type)],
	'multi-array': [2, (output, [index, dimensions]) => {
		output.writeUInt16BE(index)
		output.writeUInt8(dimensions)
	}],
	'table-switch': [undefined, (output, operands) => {
		padTo4(output)
		for (const value of operands) output.writeInt32BE(value)
	}],
	'lookup-switch': [undefined, (output, operands) => {
		padTo4(output)
		for (const value of operands) output.writeInt32BE(value)
	}],
	'wide-prefixed': [undefined, writeWide]
}

export function assemble(instructions: readonly AssemblyInstruction[]): Uint8Array {
	const output = new SmartBuffer()
	for (const {mnemonic, operands = []} of instructions) {
		const opcode = opcodeOf(mnemonic)
		const def = lookup(opcode)
		if (!def) throw new Error('Unknown mnemonic: ' + mnemonic)
		const [count, write] = OPERAND_WRITERS[def.operands]
		if (count !== undefined) expectOperands(operands, count, mnemonic)
		output.writeUInt8(opcode)
		write(output, operands)
	}
	return output.toBuffer()
}
