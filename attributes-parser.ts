import {
	type Parser,
	parseAndThen,
	parseByteArray,
	parseInt,
	parseRepeated,
	parseReturn,
	parseShort
} from './parse'
import type {ConstantPool} from './constant-pool-parser'

export interface Attribute {
	name: string
	info: DataView
}
export const attributesParser = (constantPool: ConstantPool): Parser<Attribute[]> =>
	parseRepeated(
		parseAndThen(parseShort, nameIndex =>
			parseAndThen(parseByteArray(parseInt), bytes =>
				parseReturn({
					name: constantPool.getUtf8(nameIndex),
					info: new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
				})
			)
		)
	)

export const findAttribute = (attributes: Attribute[], name: string) =>
	attributes.find(attribute => attribute.name === name)
