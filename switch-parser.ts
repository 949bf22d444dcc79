import {
	type Parser,
	parseAndThen,
	parseReturn,
	parseSignedInt,
	parseStruct,
	parseTimes,
	requireBytes,
	slice
} from './parse'
import type {DecodedOperands} from './operand-format'

const CASE_INDENT = '    '

interface SwitchTable {
	text: string
	operands: number[]
}
interface MatchOffsetPair {
	match: number
	offset: number
}

export const pad = (offset: number) =>
	offset + 3 - ((offset + 3) & 3) //0-3 bytes of padding

//Checks the whole table is present before reading any of it
const parseEntries = <E>(parser: Parser<E>, entryBytes: number, count: number): Parser<E[]> =>
	data => {
		requireBytes(data, entryBytes * count)
		return parseTimes(parser, count)(data)
	}
const caseLines = (lines: string[]) =>
	lines.map(line => '\n' + CASE_INDENT + line).join('')

const parseTableSwitch = (mnemonic: string): Parser<SwitchTable> =>
	parseAndThen(parseSignedInt, defaultOffset =>
		parseAndThen(parseSignedInt, low =>
			parseAndThen(parseSignedInt, high =>
				parseAndThen(
					parseEntries(parseSignedInt, 4, Math.max(high - low + 1, 0)),
					jumpOffsets => parseReturn({
						text: `${mnemonic} ${low} to ${high}: default=${defaultOffset}` +
							caseLines(jumpOffsets.map(String)),
						operands: [defaultOffset, low, high, ...jumpOffsets]
					})
				)
			)
		)
	)
const parseMatchOffset = parseStruct<MatchOffsetPair>({
	match: parseSignedInt,
	offset: parseSignedInt
})
const parseLookupSwitch = (mnemonic: string): Parser<SwitchTable> =>
	parseAndThen(parseSignedInt, defaultOffset =>
		parseAndThen(parseSignedInt, nPairs =>
			parseAndThen(
				parseEntries(parseMatchOffset, 8, Math.max(nPairs, 0)),
				matchOffsets => {
					const operands = [defaultOffset, nPairs]
					for (const {match, offset} of matchOffsets) operands.push(match, offset)
					return parseReturn({
						text: `${mnemonic}: default=${defaultOffset}` +
							caseLines(matchOffsets.map(({match, offset}) => `case ${match}: ${offset}`)),
						operands
					})
				}
			)
		)
	)

function decodeSwitch(parser: Parser<SwitchTable>, data: DataView, offset: number): DecodedOperands {
	const tableOffset = pad(offset)
	const {result: {text, operands}, length} = parser(slice(data, tableOffset))
	return {text, operands, newOffset: tableOffset + length}
}
export const decodeTableSwitch = (mnemonic: string, data: DataView, offset: number) =>
	decodeSwitch(parseTableSwitch(mnemonic), data, offset)
export const decodeLookupSwitch = (mnemonic: string, data: DataView, offset: number) =>
	decodeSwitch(parseLookupSwitch(mnemonic), data, offset)
