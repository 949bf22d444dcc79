import {ClassFormatError} from './decode-errors'

const BASE_TYPES = new Map<string, string>()
	.set('B', 'byte')
	.set('C', 'char')
	.set('D', 'double')
	.set('F', 'float')
	.set('I', 'int')
	.set('J', 'long')
	.set('S', 'short')
	.set('Z', 'boolean')
	.set('V', 'void')

export const javaClassName = (internalName: string) =>
	internalName.replace(/\//g, '.')

interface FieldType {
	type: string
	end: number //index just past the type
}

function readType(descriptor: string, start: number, allowVoid: boolean): FieldType {
	let dimensions = 0
	while (descriptor[start + dimensions] === '[') dimensions++
	const index = start + dimensions
	const char = descriptor[index]
	let type: string | undefined
	let end = index + 1
	if (char === 'L') {
		const semicolon = descriptor.indexOf(';', index)
		if (semicolon === -1) throw new ClassFormatError('Missing semicolon in descriptor')
		type = javaClassName(descriptor.slice(index + 1, semicolon))
		end = semicolon + 1
	}
	else type = BASE_TYPES.get(char)
	if (!type) throw new ClassFormatError('Unexpected character in descriptor: ' + char)
	if (type === 'void') {
		if (dimensions) throw new ClassFormatError('Cannot have array of type void')
		if (!allowVoid) throw new ClassFormatError('Cannot have void arg')
	}
	return {type: type + '[]'.repeat(dimensions), end}
}

export function getArgTypes(descriptor: string): string[] {
	if (descriptor[0] !== '(') throw new ClassFormatError('Expected ( in ' + descriptor)
	const types: string[] = []
	let index = 1
	while (descriptor[index] !== ')') {
		if (index >= descriptor.length) throw new ClassFormatError('Missing ) in ' + descriptor)
		const {type, end} = readType(descriptor, index, false)
		types.push(type)
		index = end
	}
	return types
}
//Return type of a method descriptor, or the type of a field descriptor
export function getType(descriptor: string): string {
	const start = descriptor.indexOf(')') + 1
	const {type, end} = readType(descriptor, start, true)
	if (end !== descriptor.length) throw new ClassFormatError('Expected 1 type in ' + descriptor)
	return type
}
