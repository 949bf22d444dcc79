import opcodeTable from './opcodes.json'

const OPERAND_SHAPES = [
	'none',
	'u8',
	'u16',
	's16',
	's32',
	'local-index-and-const',
	'constant-pool-u8',
	'constant-pool-u16',
	'invoke-interface',
	'invoke-dynamic',
	'new-array-primitive',
	'multi-array',
	'table-switch',
	'lookup-switch',
	'wide-prefixed'
] as const
export type OperandShape = typeof OPERAND_SHAPES[number]

const isOperandShape = (shape: string): shape is OperandShape =>
	OPERAND_SHAPES.some(known => known === shape)

export interface InstructionDef {
	readonly opcode: number
	readonly mnemonic: string
	readonly reserved: boolean
	readonly operands: OperandShape
}

export const RESERVED_PREFIX = '[Reserved] '

function buildCatalog() {
	const byOpcode = new Map<number, InstructionDef>()
	for (const {opcode, mnemonic, operands, reserved} of opcodeTable) {
		if (!isOperandShape(operands)) {
			throw new Error(`Unknown operand shape for ${mnemonic}: ${operands}`)
		}
		if (byOpcode.has(opcode)) throw new Error('Duplicate opcode: ' + String(opcode))
		byOpcode.set(opcode, Object.freeze({opcode, mnemonic, reserved, operands}))
	}
	return byOpcode
}
const CATALOG: ReadonlyMap<number, InstructionDef> = buildCatalog()

export const catalog: readonly InstructionDef[] = Object.freeze([...CATALOG.values()])

export const lookup = (opcode: number): InstructionDef | undefined =>
	CATALOG.get(opcode)

export const mnemonicOf = ({mnemonic, reserved}: InstructionDef) =>
	reserved ? RESERVED_PREFIX + mnemonic : mnemonic

export function opcodeOf(mnemonic: string): number {
	for (const def of catalog) {
		if (def.mnemonic === mnemonic) return def.opcode
	}
	throw new Error('Unknown mnemonic: ' + mnemonic)
}
