import {assert} from 'chai'
import {decode, decodeCode} from '../bytecode-parser'
import {TruncatedStreamError, UnknownOpcodeError} from '../decode-errors'

const bytes = (...values: number[]) => new Uint8Array(values)
const texts = (...values: number[]) => decode(bytes(...values)).map(({text}) => text)

suite('bytecode parser', () => {
	suite('single instructions', () => {
		test('no operands', () => {
			assert.deepEqual(decode(bytes(0xB1)), [
				{offset: 0, opcode: 0xB1, text: 'return', length: 1, operands: []}
			])
			assert.notProperty(decode(bytes(0xB1))[0], 'constantPoolIndex')
		})

		test('unsigned immediates', () => {
			assert.deepEqual(decode(bytes(0x10, 0x64)), [
				{offset: 0, opcode: 0x10, text: 'bipush 100', length: 2, operands: [100]}
			])
			assert.deepEqual(texts(0x10, 0xFF), ['bipush 255'])
			assert.deepEqual(texts(0x11, 0xFF, 0xFF), ['sipush 65535'])
			assert.deepEqual(texts(0x19, 0x04), ['aload 4'])
			assert.deepEqual(texts(0x3A, 0xC8), ['astore 200'])
			assert.deepEqual(texts(0xA9, 0x02), ['ret 2'])
		})

		test('iinc', () => {
			assert.deepEqual(decode(bytes(0x84, 0x03, 0xFF)), [
				{offset: 0, opcode: 0x84, text: 'iinc index = 3 const = -1', length: 3, operands: [3, -1]}
			])
		})

		test('signed branch offsets', () => {
			assert.deepEqual(texts(0x99, 0xFF, 0xFB), ['ifeq -5'])
			assert.deepEqual(texts(0xA7, 0x00, 0x10), ['goto 16'])
			assert.deepEqual(texts(0xC6, 0x80, 0x00), ['ifnull -32768'])
			assert.deepEqual(texts(0xC8, 0x00, 0x01, 0x00, 0x00), ['goto_w 65536'])
			assert.deepEqual(texts(0xC9, 0xFF, 0xFF, 0xFF, 0xFE), ['jsr_w -2'])
		})

		test('constant pool references', () => {
			assert.deepEqual(decode(bytes(0x12, 0x07)), [
				{offset: 0, opcode: 0x12, text: 'ldc', constantPoolIndex: 7, length: 2, operands: [7]}
			])
			assert.deepEqual(decode(bytes(0x13, 0x01, 0x00)), [
				{offset: 0, opcode: 0x13, text: 'ldc_w', constantPoolIndex: 256, length: 3, operands: [256]}
			])
			assert.deepEqual(decode(bytes(0xBB, 0x00, 0x02)), [
				{offset: 0, opcode: 0xBB, text: 'new', constantPoolIndex: 2, length: 3, operands: [2]}
			])
		})

		test('invokeinterface', () => {
			assert.deepEqual(decode(bytes(0xB9, 0x00, 0x0A, 0x02, 0x00)), [{
				offset: 0,
				opcode: 0xB9,
				text: 'invokeinterface interface=10, nargs=2',
				constantPoolIndex: 10,
				length: 5,
				operands: [10, 2]
			}])
		})

		test('invokedynamic skips its two reserved bytes', () => {
			assert.deepEqual(decode(bytes(0xBA, 0x00, 0x0C, 0x00, 0x00, 0xB1)), [
				{offset: 0, opcode: 0xBA, text: 'invokedynamic', constantPoolIndex: 12, length: 5, operands: [12]},
				{offset: 5, opcode: 0xB1, text: 'return', length: 1, operands: []}
			])
		})

		test('newarray', () => {
			assert.deepEqual(texts(0xBC, 0x04), ['newarray boolean'])
			assert.deepEqual(texts(0xBC, 0x0A), ['newarray int'])
			assert.deepEqual(texts(0xBC, 0x0B), ['newarray long'])
		})

		test('newarray with an unknown type keeps decoding', () => {
			assert.deepEqual(decode(bytes(0xBC, 0x0C, 0xB1)), [
				{offset: 0, opcode: 0xBC, text: 'newarray [ERROR: Unknown type]', length: 2, operands: [12]},
				{offset: 2, opcode: 0xB1, text: 'return', length: 1, operands: []}
			])
		})

		test('multianewarray', () => {
			assert.deepEqual(decode(bytes(0xC5, 0x00, 0x05, 0x02)), [{
				offset: 0,
				opcode: 0xC5,
				text: 'multianewarray type=5 dimensions=2',
				constantPoolIndex: 5,
				length: 4,
				operands: [5, 2]
			}])
		})

		test('reserved opcodes', () => {
			assert.deepEqual(texts(0xCA, 0xFE, 0xFF), [
				'[Reserved] breakpoint',
				'[Reserved] impdep1',
				'[Reserved] impdep2'
			])
		})
	})

	suite('streams', () => {
		test('records the offset of each opcode', () => {
			//aload_0; invokespecial #1; return
			const instructions = decode(bytes(0x2A, 0xB7, 0x00, 0x01, 0xB1))
			assert.deepEqual(instructions.map(({offset}) => offset), [0, 1, 4])
			assert.deepEqual(instructions.map(({text}) => text), ['aload_0', 'invokespecial', 'return'])
		})

		test('empty input', () => {
			assert.deepEqual(decode(bytes()), [])
			assert.deepEqual(decode(null), [])
			assert.deepEqual(decodeCode(undefined), {instructions: []})
		})

		test('decoding is repeatable', () => {
			const code = bytes(0x03, 0x3C, 0x84, 0x01, 0x01, 0x1B, 0x10, 0x0A, 0xA1, 0xFF, 0xF9, 0xB1)
			assert.deepEqual(decode(code), decode(code))
		})

		test('decoded instructions are frozen', () => {
			const [instruction] = decode(bytes(0x10, 0x01))
			assert.isTrue(Object.isFrozen(instruction))
		})

		test('reads only the declared window of a DataView', () => {
			const buffer = bytes(0xB1, 0x10, 0x05, 0xFF).buffer
			assert.deepEqual(
				decode(new DataView(buffer, 1, 2)).map(({text}) => text),
				['bipush 5']
			)
			const {instructions, failure} = decodeCode(new DataView(buffer, 1, 1))
			assert.deepEqual(instructions, [])
			assert.instanceOf(failure && failure.error, TruncatedStreamError)
		})
	})

	suite('unknown opcodes', () => {
		test('resume at the next byte by default', () => {
			assert.deepEqual(decodeCode(bytes(0xCB, 0xB1)), {
				instructions: [
					{offset: 0, opcode: 0xCB, text: '[Unknown opcode]', length: 1, operands: []},
					{offset: 1, opcode: 0xB1, text: 'return', length: 1, operands: []}
				]
			})
		})

		test('abort when asked to', () => {
			const {instructions, failure} = decodeCode(bytes(0x00, 0xCB, 0xB1), {unknownOpcodes: 'abort'})
			assert.deepEqual(instructions.map(({text}) => text), ['nop', '[Unknown opcode]'])
			assert.strictEqual(failure && failure.offset, 1)
			const error = failure && failure.error
			assert.instanceOf(error, UnknownOpcodeError)
			assert.strictEqual(error && error.message, 'Unknown opcode: 0xcb')
		})
	})

	suite('truncation', () => {
		test('stops before an instruction missing its operands', () => {
			const {instructions, failure} = decodeCode(bytes(0xB1, 0x11))
			assert.deepEqual(instructions, [
				{offset: 0, opcode: 0xB1, text: 'return', length: 1, operands: []}
			])
			assert.isDefined(failure)
			if (!failure) return
			assert.strictEqual(failure.offset, 1)
			assert.instanceOf(failure.error, TruncatedStreamError)
			assert.strictEqual(failure.error.message, 'Needed 2 bytes but only 0 remain')
		})

		test('reports partially present operands', () => {
			const {instructions, failure} = decodeCode(bytes(0x11, 0x01))
			assert.deepEqual(instructions, [])
			const error = failure && failure.error
			assert.instanceOf(error, TruncatedStreamError)
			if (!(error instanceof TruncatedStreamError)) return
			assert.strictEqual(error.needed, 2)
			assert.strictEqual(error.available, 1)
		})

		test('decode logs the failure and returns what it decoded', () => {
			const messages: string[] = []
			const instructions = decode(bytes(0xB1, 0x11), {logger: {error: (message: string) => messages.push(message)}})
			assert.deepEqual(instructions.map(({text}) => text), ['return'])
			assert.deepEqual(messages, [
				'Decoding stopped at offset 1 of 2-byte code: Needed 2 bytes but only 0 remain'
			])
		})

		test('decode does not log complete streams', () => {
			const messages: string[] = []
			decode(bytes(0xB1), {logger: {error: (message: string) => messages.push(message)}})
			decode(bytes(), {logger: {error: (message: string) => messages.push(message)}})
			assert.deepEqual(messages, [])
		})
	})
})
