import {
	type Parser,
	parseAndThen,
	parseInt,
	parseRepeated,
	parseReturn,
	parseShort
} from './parse'
import {type AccessFlags, accessFlagsParser} from './access-flags-parser'
import {type Attribute, attributesParser} from './attributes-parser'
import {type ConstantPool, constantPoolParser} from './constant-pool-parser'
import {ClassFormatError} from './decode-errors'
import {type Member, membersParser} from './members-parser'

const MAGIC = 0xCAFEBABE

export interface ClassFile {
	minorVersion: number
	majorVersion: number
	constantPool: ConstantPool
	accessFlags: AccessFlags
	thisClass: string
	superClass?: string //absent only for java/lang/Object and module-info
	interfaces: string[]
	fields: Member[]
	methods: Member[]
	attributes: Attribute[]
}

const parseMagic = parseAndThen(parseInt, magic => {
	if (magic !== MAGIC) throw new ClassFormatError('Invalid magic bytes')
	return parseReturn(magic)
})

export const classFileParser: Parser<ClassFile> =
	parseAndThen(parseMagic, () =>
	parseAndThen(parseShort, minorVersion =>
	parseAndThen(parseShort, majorVersion =>
	parseAndThen(constantPoolParser, constantPool =>
	parseAndThen(accessFlagsParser('class'), accessFlags =>
	parseAndThen(parseShort, thisClass =>
	parseAndThen(parseShort, superClass =>
	parseAndThen(parseRepeated(parseShort), interfaces =>
	parseAndThen(membersParser('field', constantPool), fields =>
	parseAndThen(membersParser('method', constantPool), methods =>
	parseAndThen(attributesParser(constantPool), attributes =>
		parseReturn<ClassFile>({
			minorVersion,
			majorVersion,
			constantPool,
			accessFlags,
			thisClass: constantPool.getClassName(thisClass),
			superClass: superClass ? constantPool.getClassName(superClass) : undefined,
			interfaces: interfaces.map(index => constantPool.getClassName(index)),
			fields,
			methods,
			attributes
		})
	)))))))))))

export function parseClassFile(bytes: Uint8Array): ClassFile {
	return classFileParser(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)).result
}
