export interface DecodedOperands {
	text: string
	operands: number[]
	constantPoolIndex?: number
	newOffset: number
}

export const UNKNOWN_OPCODE = '[Unknown opcode]'
export const UNKNOWN_ARRAY_TYPE = '[ERROR: Unknown type]'

export const formatOperand = (mnemonic: string, value: number | string) =>
	`${mnemonic} ${value}`
export const formatIinc = (mnemonic: string, index: number, value: number) =>
	`${mnemonic} index = ${index} const = ${value}`
