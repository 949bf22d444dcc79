import {type Parser, parseAndThen, parseReturn, parseShort} from './parse'

export type MemberKind = 'class' | 'field' | 'method'

//Listed in the order Java source declares modifiers
const ACCESS_FLAGS: {[kind in MemberKind]: [string, number][]} = {
	class: [
		['public',     0x0001],
		['final',      0x0010],
		['super',      0x0020],
		['interface',  0x0200],
		['abstract',   0x0400],
		['synthetic',  0x1000],
		['annotation', 0x2000],
		['enum',       0x4000],
		['module',     0x8000]
	],
	field: [
		['public',     0x0001],
		['private',    0x0002],
		['protected',  0x0004],
		['static',     0x0008],
		['final',      0x0010],
		['volatile',   0x0040],
		['transient',  0x0080],
		['synthetic',  0x1000],
		['enum',       0x4000]
	],
	method: [
		['public',       0x0001],
		['private',      0x0002],
		['protected',    0x0004],
		['static',       0x0008],
		['final',        0x0010],
		['synchronized', 0x0020],
		['bridge',       0x0040],
		['varargs',      0x0080],
		['native',       0x0100],
		['abstract',     0x0400],
		['strict',       0x0800],
		['synthetic',    0x1000]
	]
}

export interface AccessFlags {
	value: number
	names: string[]
}
export const accessFlagsParser = (kind: MemberKind): Parser<AccessFlags> =>
	parseAndThen(parseShort, value =>
		parseReturn({
			value,
			names: ACCESS_FLAGS[kind]
				.filter(([, mask]) => value & mask)
				.map(([name]) => name)
		})
	)
export const hasFlag = ({names}: AccessFlags, name: string) =>
	names.includes(name)
