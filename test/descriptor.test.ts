import {assert} from 'chai'
import {ClassFormatError} from '../decode-errors'
import {getArgTypes, getType, javaClassName} from '../descriptor'

suite('descriptors', () => {
	test('argument types', () => {
		assert.deepEqual(getArgTypes('()V'), [])
		assert.deepEqual(getArgTypes('(IJ[[Ljava/lang/String;Z)V'), ['int', 'long', 'java.lang.String[][]', 'boolean'])
	})

	test('return and field types', () => {
		assert.strictEqual(getType('()V'), 'void')
		assert.strictEqual(getType('(I)[D'), 'double[]')
		assert.strictEqual(getType('Ljava/util/List;'), 'java.util.List')
	})

	test('invalid descriptors', () => {
		assert.throws(() => getArgTypes('V'), ClassFormatError, 'Expected ( in V')
		assert.throws(() => getArgTypes('(Ljava/lang/String)V'), ClassFormatError, 'Missing semicolon')
		assert.throws(() => getType('()[V'), ClassFormatError, 'Cannot have array of type void')
		assert.throws(() => getType('(I)Q'), ClassFormatError, 'Unexpected character in descriptor: Q')
	})

	test('class names', () => {
		assert.strictEqual(javaClassName('java/lang/Object'), 'java.lang.Object')
	})
})
