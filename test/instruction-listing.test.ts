import {assert} from 'chai'
import {decode} from '../bytecode-parser'
import {
	type ConstantResolver,
	formatInstruction,
	formatListing,
	truncateDescription
} from '../instruction-listing'

const bytes = (...values: number[]) => new Uint8Array(values)

suite('instruction listing', () => {
	test('formats offset, opcode and text', () => {
		const [instruction] = decode(bytes(0x0A))
		assert.strictEqual(formatInstruction(instruction), 'Offset 0000: opcode [0A] lconst_1')
		assert.strictEqual(
			formatInstruction({offset: 12345, opcode: 0xB1, text: 'return', length: 1, operands: []}),
			'Offset 12345: opcode [B1] return'
		)
	})

	test('appends the constant pool index', () => {
		const [instruction] = decode(bytes(0xB2, 0x00, 0x02))
		assert.strictEqual(formatInstruction(instruction), 'Offset 0000: opcode [B2] getstatic 2')
	})

	test('appends resolved descriptions', () => {
		const requested: number[] = []
		const resolver: ConstantResolver = {
			describe: index => {
				requested.push(index)
				return `constant ${index}`
			}
		}
		const instructions = decode(bytes(0x2A, 0xB4, 0x00, 0x07, 0xB0))
		assert.strictEqual(formatListing(instructions, resolver), [
			'Offset 0000: opcode [2A] aload_0',
			'Offset 0001: opcode [B4] getfield 7 - constant 7',
			'Offset 0004: opcode [B0] areturn'
		].join('\n'))
		assert.deepEqual(requested, [7])
	})

	test('truncates long descriptions to 1000 characters', () => {
		const [instruction] = decode(bytes(0x12, 0x01))
		const line = formatInstruction(instruction, {describe: () => 'x'.repeat(1500)})
		assert.strictEqual(line, 'Offset 0000: opcode [12] ldc 1 - ' + 'x'.repeat(1000))
		assert.strictEqual(truncateDescription('y'.repeat(1000)), 'y'.repeat(1000))
		assert.strictEqual(truncateDescription('short'), 'short')
	})

	test('keeps switch tables on their own lines', () => {
		const listing = formatListing(decode(bytes(
			0xAB, 0x00, 0x00, 0x00,
			0x00, 0x00, 0x00, 0x10,
			0x00, 0x00, 0x00, 0x01,
			0x00, 0x00, 0x00, 0x03,
			0x00, 0x00, 0x00, 0x14
		)))
		assert.strictEqual(listing, 'Offset 0000: opcode [AB] lookupswitch: default=16\n    case 3: 20')
	})
})
