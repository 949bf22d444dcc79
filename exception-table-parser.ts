import {type Parser, parseRepeated, parseShort, parseStruct} from './parse'

export interface ExceptionTableEntry {
	startPC: number
	endPC: number
	handlerPC: number
	catchType: number //0 for a handler that catches everything
}
export type ExceptionTable = ExceptionTableEntry[]
export const exceptionTableParser: Parser<ExceptionTable> =
	parseRepeated(parseStruct<ExceptionTableEntry>({
		startPC: parseShort,
		endPC: parseShort,
		handlerPC: parseShort,
		catchType: parseShort
	}))
