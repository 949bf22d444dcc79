import {type Parser, parseByteArray, parseInt, parseShort, parseStruct} from './parse'
import {type Attribute, attributesParser} from './attributes-parser'
import type {ConstantPool} from './constant-pool-parser'
import {type ExceptionTable, exceptionTableParser} from './exception-table-parser'

export interface CodeAttribute {
	maxStack: number
	maxLocals: number
	code: Uint8Array //undecoded, exactly code_length bytes
	exceptionTable: ExceptionTable
	attributes: Attribute[]
}

export const codeParser = (constantPool: ConstantPool): Parser<CodeAttribute> =>
	parseStruct<CodeAttribute>({
		maxStack: parseShort,
		maxLocals: parseShort,
		code: parseByteArray(parseInt),
		exceptionTable: exceptionTableParser,
		attributes: attributesParser(constantPool)
	})
