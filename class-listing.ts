import {type AccessFlags, hasFlag} from './access-flags-parser'
import {findAttribute} from './attributes-parser'
import {type DecodeOptions, decodeCode, logFailure} from './bytecode-parser'
import type {ClassFile} from './class-file-parser'
import {codeParser} from './code-parser'
import {getArgTypes, getType, javaClassName} from './descriptor'
import {formatListing} from './instruction-listing'
import type {Member} from './members-parser'

const CODE = 'Code'
const INDENT = '  '
//Flags that are not modifiers in Java source
const NON_MODIFIERS = new Set([
	'super', 'synthetic', 'bridge', 'varargs',
	'interface', 'annotation', 'enum', 'module'
])

const modifiers = ({names}: AccessFlags) =>
	names
		.filter(name => !NON_MODIFIERS.has(name))
		.map(name => (name === 'strict' ? 'strictfp' : name) + ' ')
		.join('')

function classKind(flags: AccessFlags) {
	if (hasFlag(flags, 'annotation')) return '@interface'
	if (hasFlag(flags, 'interface')) return 'interface'
	if (hasFlag(flags, 'enum')) return 'enum'
	return 'class'
}

function methodSignature(className: string, {accessFlags, name, descriptor}: Member) {
	if (name === '<clinit>') return 'static {}'
	const params = getArgTypes(descriptor).join(', ')
	const declaration = name === '<init>'
		? className.slice(className.lastIndexOf('.') + 1)
		: `${getType(descriptor)} ${name}`
	return `${modifiers(accessFlags)}${declaration}(${params})`
}

function methodLines(classFile: ClassFile, method: Member, options: DecodeOptions): string[] {
	const {constantPool} = classFile
	const codeAttribute = findAttribute(method.attributes, CODE)
	if (!codeAttribute) return [INDENT + '// no code']
	const {result: {code}} = codeParser(constantPool)(codeAttribute.info)
	const {instructions, failure} = decodeCode(code, options)
	const lines = instructions.length
		? formatListing(instructions, constantPool)
			.split('\n')
			.map(line => INDENT + line)
		: []
	if (failure) {
		logFailure(failure, code.byteLength, options)
		lines.push(`${INDENT}// decoding stopped at offset ${failure.offset}: ${failure.error.message}`)
	}
	return lines
}

export function listClass(classFile: ClassFile, options: DecodeOptions = {}): string {
	const {accessFlags, majorVersion, minorVersion, methods, superClass, thisClass} = classFile
	const className = javaClassName(thisClass)
	let header = `${modifiers(accessFlags)}${classKind(accessFlags)} ${className}`
	if (superClass) header += ' extends ' + javaClassName(superClass)
	const lines = [
		header,
		`${INDENT}minor version: ${minorVersion}`,
		`${INDENT}major version: ${majorVersion}`
	]
	for (const method of methods) {
		lines.push('', methodSignature(className, method), ...methodLines(classFile, method, options))
	}
	return lines.join('\n')
}
