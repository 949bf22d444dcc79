import {type Parser, parseAndThen, parseRepeated, parseReturn, parseShort} from './parse'
import {type AccessFlags, type MemberKind, accessFlagsParser} from './access-flags-parser'
import {type Attribute, attributesParser} from './attributes-parser'
import type {ConstantPool} from './constant-pool-parser'

export interface Member {
	accessFlags: AccessFlags
	name: string
	descriptor: string
	attributes: Attribute[]
}
export const membersParser = (kind: Exclude<MemberKind, 'class'>, constantPool: ConstantPool): Parser<Member[]> =>
	parseRepeated(
		parseAndThen(accessFlagsParser(kind), accessFlags =>
			parseAndThen(parseShort, nameIndex =>
				parseAndThen(parseShort, descriptorIndex =>
					parseAndThen(attributesParser(constantPool), attributes =>
						parseReturn({
							accessFlags,
							name: constantPool.getUtf8(nameIndex),
							descriptor: constantPool.getUtf8(descriptorIndex),
							attributes
						})
					)
				)
			)
		)
	)
