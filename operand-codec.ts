import type {InstructionDef, OperandShape} from './instruction-catalog'
import {mnemonicOf} from './instruction-catalog'
import type {DecodedOperands} from './operand-format'
import {UNKNOWN_ARRAY_TYPE, formatIinc, formatOperand} from './operand-format'
import {
	type Parser,
	parseAndThen,
	parseByte,
	parseReturn,
	parseShort,
	parseSignedByte,
	parseSignedInt,
	parseSignedShort,
	skipBytes,
	slice
} from './parse'
import {decodeLookupSwitch, decodeTableSwitch} from './switch-parser'
import {decodeWide} from './wide-parser'

type Primitive
	= 'boolean'
	| 'char'
	| 'float'
	| 'double'
	| 'byte'
	| 'short'
	| 'int'
	| 'long'
//newarray atype codes
const ARRAY_TYPES = new Map<number, Primitive>()
	.set(4, 'boolean')
	.set(5, 'char')
	.set(6, 'float')
	.set(7, 'double')
	.set(8, 'byte')
	.set(9, 'short')
	.set(10, 'int')
	.set(11, 'long')

type OperandDecoder = (mnemonic: string, data: DataView, offset: number) => DecodedOperands

const immediate = (parser: Parser<number>): OperandDecoder => (mnemonic, data, offset) => {
	const {result, length} = parser(slice(data, offset))
	return {
		text: formatOperand(mnemonic, result),
		operands: [result],
		newOffset: offset + length
	}
}
const constantIndex = (parser: Parser<number>): OperandDecoder => (mnemonic, data, offset) => {
	const {result, length} = parser(slice(data, offset))
	return {
		text: mnemonic,
		operands: [result],
		constantPoolIndex: result,
		newOffset: offset + length
	}
}

const parseIinc = parseAndThen(parseByte, index =>
	parseAndThen(parseSignedByte, value =>
		parseReturn({index, value})
	)
)
const parseInvokeInterface = parseAndThen(parseShort, index =>
	parseAndThen(parseByte, count =>
		parseAndThen(skipBytes(1), () => parseReturn({index, count}))
	)
)
const parseInvokeDynamic = parseAndThen(parseShort, index =>
	parseAndThen(skipBytes(2), () => parseReturn(index))
)
const parseMultiArray = parseAndThen(parseShort, index =>
	parseAndThen(parseByte, dimensions =>
		parseReturn({index, dimensions})
	)
)

const OPERAND_DECODERS: {[shape in OperandShape]: OperandDecoder} = {
	'none': (mnemonic, _, offset) => ({text: mnemonic, operands: [], newOffset: offset}),
	'u8': immediate(parseByte),
	'u16': immediate(parseShort),
	's16': immediate(parseSignedShort),
	's32': immediate(parseSignedInt),
	'local-index-and-const': (mnemonic, data, offset) => {
		const {result: {index, value}, length} = parseIinc(slice(data, offset))
		return {
			text: formatIinc(mnemonic, index, value),
			operands: [index, value],
			newOffset: offset + length
		}
	},
	'constant-pool-u8': constantIndex(parseByte),
	'constant-pool-u16': constantIndex(parseShort),
	'invoke-interface': (mnemonic, data, offset) => {
		const {result: {index, count}, length} = parseInvokeInterface(slice(data, offset))
		return {
			text: `${mnemonic} interface=${index}, nargs=${count}`,
			operands: [index, count],
			constantPoolIndex: index,
			newOffset: offset + length
		}
	},
	'invoke-dynamic': (mnemonic, data, offset) => {
		const {result: index, length} = parseInvokeDynamic(slice(data, offset))
		return {
			text: mnemonic,
			operands: [index],
			constantPoolIndex: index,
			newOffset: offset + length
		}
	},
	'new-array-primitive': (mnemonic, data, offset) => {
		const {result: type, length} = parseByte(slice(data, offset))
		return {
			text: formatOperand(mnemonic, ARRAY_TYPES.get(type) || UNKNOWN_ARRAY_TYPE),
			operands: [type],
			newOffset: offset + length
		}
	},
	'multi-array': (mnemonic, data, offset) => {
		const {result: {index, dimensions}, length} = parseMultiArray(slice(data, offset))
		return {
			text: `${mnemonic} type=${index} dimensions=${dimensions}`,
			operands: [index, dimensions],
			constantPoolIndex: index,
			newOffset: offset + length
		}
	},
	'table-switch': decodeTableSwitch,
	'lookup-switch': decodeLookupSwitch,
	'wide-prefixed': (_, data, offset) => decodeWide(data, offset)
}

//`offset` is relative to the start of the code array, which switch padding aligns against
export const decodeOperands = (def: InstructionDef, data: DataView, offset: number) =>
	OPERAND_DECODERS[def.operands](mnemonicOf(def), data, offset)
