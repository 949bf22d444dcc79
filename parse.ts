import {TruncatedStreamError} from './decode-errors'

export interface ParseResult<E> {
	result: E
	length: number
}
export type Parser<E> = (data: DataView) => ParseResult<E>

export function requireBytes(data: DataView, bytes: number) {
	if (bytes > data.byteLength) throw new TruncatedStreamError(bytes, data.byteLength)
}
//Views never extend past the end of the view they were cut from
export const slice = (data: DataView, offset: number): DataView => {
	requireBytes(data, offset)
	return new DataView(data.buffer, data.byteOffset + offset, data.byteLength - offset)
}

export const parseAndThen: <A, B>(parser: Parser<A>, f: (a: A) => Parser<B>) => Parser<B> =
	(parser, f) =>
		data => {
			const {result, length} = parser(data)
			const result2 = f(result)(slice(data, length))
			return {result: result2.result, length: length + result2.length}
		}
export const parseReturn: <A>(a: A) => Parser<A> = a => _ => ({result: a, length: 0})

const fixedWidth = <E>(bytes: number, read: (data: DataView) => E): Parser<E> => data => {
	requireBytes(data, bytes)
	return {result: read(data), length: bytes}
}
export const parseByte = fixedWidth(1, data => data.getUint8(0))
export const parseSignedByte = fixedWidth(1, data => data.getInt8(0))
export const parseShort = fixedWidth(2, data => data.getUint16(0))
export const parseSignedShort = fixedWidth(2, data => data.getInt16(0))
export const parseInt = fixedWidth(4, data => data.getUint32(0))
export const parseSignedInt = fixedWidth(4, data => data.getInt32(0))
export const parseFloat = fixedWidth(4, data => data.getFloat32(0))
export const parseDouble = fixedWidth(8, data => data.getFloat64(0))
export const parseLong = fixedWidth(8, data => data.getBigInt64(0))
export const skipBytes = (bytes: number): Parser<void> =>
	fixedWidth(bytes, () => undefined)

export const parseByteArray = (lengthParser: Parser<number>): Parser<Uint8Array> =>
	parseAndThen(lengthParser, bytes =>
		data => {
			requireBytes(data, bytes)
			return {
				result: new Uint8Array(data.buffer, data.byteOffset, bytes),
				length: bytes
			}
		}
	)
export const parseTimes = <E>(parser: Parser<E>, n: number): Parser<E[]> => data => {
	let length = 0
	const result: E[] = []
	for (let i = 0; i < n; i++) {
		const parseResult = parser(slice(data, length))
		length += parseResult.length
		result.push(parseResult.result)
	}
	return {result, length}
}
export const parseRepeated = <E>(parser: Parser<E>): Parser<E[]> =>
	parseAndThen(parseShort, count => parseTimes(parser, count))

export type StructParsers<E> = {
	[field in keyof E]: Parser<E[field]>
}
//Fields are parsed in the order they are listed
export const parseStruct = <E>(parsers: StructParsers<E>): Parser<E> => data => {
	let length = 0
	const result = {} as E
	for (const field in parsers) {
		const parseResult = parsers[field](slice(data, length))
		length += parseResult.length
		result[field] = parseResult.result
	}
	return {result, length}
}
