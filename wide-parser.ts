import {lookup} from './instruction-catalog'
import type {DecodedOperands} from './operand-format'
import {formatIinc, formatOperand} from './operand-format'
import {
	parseAndThen,
	parseByte,
	parseReturn,
	parseShort,
	parseSignedShort,
	slice
} from './parse'

const WIDE = 'wide'
export const UNKNOWN_WIDE_OPCODE = `${WIDE} [Unknown opcode]`

//Instructions whose 1-byte local index becomes 2 bytes after the prefix
const WIDENED_LOCALS = new Set([
	'iload', 'lload', 'fload', 'dload', 'aload',
	'istore', 'lstore', 'fstore', 'dstore', 'astore',
	'ret'
])
const IINC = 'iinc'

const wideName = (mnemonic: string) => `${WIDE} ${mnemonic}`

const parseWideIinc = parseAndThen(parseShort, index =>
	parseAndThen(parseSignedShort, value =>
		parseReturn({index, value})
	)
)

export function decodeWide(data: DataView, offset: number): DecodedOperands {
	const {result: innerOpcode, length} = parseByte(slice(data, offset))
	const operandOffset = offset + length
	const inner = lookup(innerOpcode)
	if (inner && WIDENED_LOCALS.has(inner.mnemonic)) {
		const {result: index, length} = parseShort(slice(data, operandOffset))
		return {
			text: formatOperand(wideName(inner.mnemonic), index),
			operands: [innerOpcode, index],
			newOffset: operandOffset + length
		}
	}
	if (inner && inner.mnemonic === IINC) {
		const {result: {index, value}, length} = parseWideIinc(slice(data, operandOffset))
		return {
			text: formatIinc(wideName(inner.mnemonic), index, value),
			operands: [innerOpcode, index, value],
			newOffset: operandOffset + length
		}
	}
	return {text: UNKNOWN_WIDE_OPCODE, operands: [innerOpcode], newOffset: operandOffset}
}
