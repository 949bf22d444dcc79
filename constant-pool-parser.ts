import {ClassFormatError} from './decode-errors'
import type {ConstantResolver} from './instruction-listing'
import {
	type Parser,
	type ParseResult,
	parseAndThen,
	parseByte,
	parseByteArray,
	parseDouble,
	parseFloat,
	parseLong,
	parseReturn,
	parseShort,
	parseSignedInt,
	parseStruct,
	slice
} from './parse'
import utf8Decode from './utf8-decode'

const CONSTANT_Utf8 = 1
const CONSTANT_Integer = 3
const CONSTANT_Float = 4
const CONSTANT_Long = 5
const CONSTANT_Double = 6
const CONSTANT_Class = 7
const CONSTANT_String = 8
const CONSTANT_Fieldref = 9
const CONSTANT_Methodref = 10
const CONSTANT_InterfaceMethodref = 11
const CONSTANT_NameAndType = 12
const CONSTANT_MethodHandle = 15
const CONSTANT_MethodType = 16
const CONSTANT_Dynamic = 17
const CONSTANT_InvokeDynamic = 18
const CONSTANT_Module = 19
const CONSTANT_Package = 20

export type RefKind = 'Fieldref' | 'Methodref' | 'InterfaceMethodref'
export interface Ref {
	kind: RefKind
	classIndex: number
	nameAndTypeIndex: number
}
export interface NameAndType {
	kind: 'NameAndType'
	nameIndex: number
	descriptorIndex: number
}
export interface NamedConstant {
	kind: 'Class' | 'Module' | 'Package'
	nameIndex: number
}
export interface DynamicConstant {
	kind: 'Dynamic' | 'InvokeDynamic'
	bootstrapMethodAttrIndex: number
	nameAndTypeIndex: number
}
export type Constant
	= {kind: 'Utf8', value: string}
	| {kind: 'Integer' | 'Float' | 'Double', value: number}
	| {kind: 'Long', value: bigint}
	| {kind: 'String', stringIndex: number}
	| {kind: 'MethodType', descriptorIndex: number}
	| {kind: 'MethodHandle', referenceKind: number, referenceIndex: number}
	| NamedConstant
	| Ref
	| NameAndType
	| DynamicConstant

//Table 5.4.3.5-A
const REFERENCE_KINDS = [
	undefined,
	'REF_getField',
	'REF_getStatic',
	'REF_putField',
	'REF_putStatic',
	'REF_invokeVirtual',
	'REF_invokeStatic',
	'REF_invokeSpecial',
	'REF_newInvokeSpecial',
	'REF_invokeInterface'
]

export class ConstantPool implements ConstantResolver {
	private readonly pool: (Constant | undefined)[]

	constructor(public readonly count: number) {
		this.pool = new Array<Constant | undefined>(count)
	}

	public setConstant(index: number, value: Constant) {
		this.pool[index] = value
	}
	public getConstant(index: number): Constant {
		const constant = index > 0 && index < this.count ? this.pool[index] : undefined
		if (constant === undefined) throw new ClassFormatError('No constant at index ' + String(index))
		return constant
	}
	private getOfKind<K extends Constant['kind']>(index: number, kinds: readonly K[]) {
		const constant = this.getConstant(index)
		if (!isKind(constant, kinds)) {
			throw new ClassFormatError(`Expected ${kinds.join(' or ')} at index ${index}, found ${constant.kind}`)
		}
		return constant
	}
	public getUtf8(index: number): string {
		return this.getOfKind(index, ['Utf8'] as const).value
	}
	public getClassName(index: number): string {
		return this.getUtf8(this.getOfKind(index, ['Class'] as const).nameIndex)
	}
	private describeNameAndType(index: number) {
		const {nameIndex, descriptorIndex} = this.getOfKind(index, ['NameAndType'] as const)
		return `${this.getUtf8(nameIndex)}:${this.getUtf8(descriptorIndex)}`
	}
	private describeRef(index: number) {
		const {classIndex, nameAndTypeIndex} =
			this.getOfKind(index, ['Fieldref', 'Methodref', 'InterfaceMethodref'] as const)
		return `${this.getClassName(classIndex)}.${this.describeNameAndType(nameAndTypeIndex)}`
	}
	private describeConstant(index: number): string {
		const constant = this.getConstant(index)
		switch (constant.kind) {
			case 'Utf8':
				return constant.value
			case 'Integer':
			case 'Float':
			case 'Double':
			case 'Long':
				return String(constant.value)
			case 'String':
				return JSON.stringify(this.getUtf8(constant.stringIndex))
			case 'Class':
			case 'Module':
			case 'Package':
				return this.getUtf8(constant.nameIndex)
			case 'Fieldref':
			case 'Methodref':
			case 'InterfaceMethodref':
				return this.describeRef(index)
			case 'NameAndType':
				return this.describeNameAndType(index)
			case 'MethodType':
				return this.getUtf8(constant.descriptorIndex)
			case 'MethodHandle': {
				const kind = REFERENCE_KINDS[constant.referenceKind] || `REF_${constant.referenceKind}`
				return `${kind} ${this.describeRef(constant.referenceIndex)}`
			}
			case 'Dynamic':
			case 'InvokeDynamic':
				return `#${constant.bootstrapMethodAttrIndex}:${this.describeNameAndType(constant.nameAndTypeIndex)}`
		}
	}
	public describe(index: number): string {
		try {
			return this.describeConstant(index)
		}
		catch (e) {
			if (e instanceof ClassFormatError) return `[Invalid constant pool reference: ${e.message}]`
			throw e
		}
	}
}
function isKind<K extends Constant['kind']>(
	constant: Constant,
	kinds: readonly K[]
): constant is Constant & {kind: K} {
	return kinds.some(kind => kind === constant.kind)
}

interface EntryCount {
	entries: number
}
type ConstantParser = (data: DataView) => ParseResult<Constant> & EntryCount

const singleEntry = (parser: Parser<Constant>): ConstantParser => data =>
	({...parser(data), entries: 1})
//Long and double constants take up two entries in the pool
const doubleEntry = (parser: Parser<Constant>): ConstantParser => data =>
	({...parser(data), entries: 2})

const refParser = (kind: RefKind) => singleEntry(parseStruct<Ref>({
	kind: parseReturn(kind),
	classIndex: parseShort,
	nameAndTypeIndex: parseShort
}))
const namedParser = (kind: NamedConstant['kind']) => singleEntry(parseStruct<NamedConstant>({
	kind: parseReturn(kind),
	nameIndex: parseShort
}))
const dynamicParser = (kind: DynamicConstant['kind']) => singleEntry(parseStruct<DynamicConstant>({
	kind: parseReturn(kind),
	bootstrapMethodAttrIndex: parseShort,
	nameAndTypeIndex: parseShort
}))
const utf8DataParser = parseByteArray(parseShort)

const CONSTANT_PARSERS = new Map<number, ConstantParser>()
	.set(CONSTANT_Utf8, singleEntry(parseAndThen(utf8DataParser, bytes =>
		parseReturn<Constant>({kind: 'Utf8', value: utf8Decode(bytes)})
	)))
	.set(CONSTANT_Integer, singleEntry(parseAndThen(parseSignedInt, value =>
		parseReturn<Constant>({kind: 'Integer', value})
	)))
	.set(CONSTANT_Float, singleEntry(parseAndThen(parseFloat, value =>
		parseReturn<Constant>({kind: 'Float', value})
	)))
	.set(CONSTANT_Long, doubleEntry(parseAndThen(parseLong, value =>
		parseReturn<Constant>({kind: 'Long', value})
	)))
	.set(CONSTANT_Double, doubleEntry(parseAndThen(parseDouble, value =>
		parseReturn<Constant>({kind: 'Double', value})
	)))
	.set(CONSTANT_Class, namedParser('Class'))
	.set(CONSTANT_String, singleEntry(parseAndThen(parseShort, stringIndex =>
		parseReturn<Constant>({kind: 'String', stringIndex})
	)))
	.set(CONSTANT_Fieldref, refParser('Fieldref'))
	.set(CONSTANT_Methodref, refParser('Methodref'))
	.set(CONSTANT_InterfaceMethodref, refParser('InterfaceMethodref'))
	.set(CONSTANT_NameAndType, singleEntry(parseStruct<NameAndType>({
		kind: parseReturn<'NameAndType'>('NameAndType'),
		nameIndex: parseShort,
		descriptorIndex: parseShort
	})))
	.set(CONSTANT_MethodHandle, singleEntry(parseAndThen(parseByte, referenceKind =>
		parseAndThen(parseShort, referenceIndex =>
			parseReturn<Constant>({kind: 'MethodHandle', referenceKind, referenceIndex})
		)
	)))
	.set(CONSTANT_MethodType, singleEntry(parseAndThen(parseShort, descriptorIndex =>
		parseReturn<Constant>({kind: 'MethodType', descriptorIndex})
	)))
	.set(CONSTANT_Dynamic, dynamicParser('Dynamic'))
	.set(CONSTANT_InvokeDynamic, dynamicParser('InvokeDynamic'))
	.set(CONSTANT_Module, namedParser('Module'))
	.set(CONSTANT_Package, namedParser('Package'))

export const constantPoolParser: Parser<ConstantPool> =
	parseAndThen(parseShort, numConstants =>
		data => {
			let length = 0
			const pool = new ConstantPool(numConstants)
			for (let constantIndex = 1; constantIndex < numConstants;) {
				const {result: constantTag} = parseByte(slice(data, length))
				length++
				const constantParser = CONSTANT_PARSERS.get(constantTag)
				if (!constantParser) throw new ClassFormatError('Unknown constant pool type: ' + String(constantTag))
				const {result, length: valueLength, entries} = constantParser(slice(data, length))
				pool.setConstant(constantIndex, result)
				constantIndex += entries
				length += valueLength
			}
			return {
				result: pool,
				length
			}
		}
	)
