const MAX_ARGUMENTS_LENGTH = 0x1000
const REPLACEMENT_CHARACTER = 0xFFFD

const isContinuation = (byte: number | undefined) =>
	byte !== undefined && (byte & 0xC0) === 0x80

//Modified UTF-8 (JVMS 4.4.7): U+0000 is C0 80, and each surrogate gets its own 3-byte sequence
export default (buffer: Uint8Array): string => {
	const codeUnits: number[] = []
	for (let i = 0; i < buffer.length;) {
		const firstByte = buffer[i]
		let codeUnit: number | undefined
		let bytesPerSequence: 1 | 2 | 3 = 1
		if (firstByte > 0 && firstByte < 0x80) codeUnit = firstByte
		else if ((firstByte & 0xE0) === 0xC0) {
			const secondByte = buffer[i + 1]
			if (isContinuation(secondByte)) {
				codeUnit = (firstByte & 0x1F) << 6 | (secondByte & 0x3F)
				bytesPerSequence = 2
			}
		}
		else if ((firstByte & 0xF0) === 0xE0) {
			const secondByte = buffer[i + 1],
			      thirdByte = buffer[i + 2]
			if (isContinuation(secondByte) && isContinuation(thirdByte)) {
				codeUnit = (firstByte & 0xF) << 12 | (secondByte & 0x3F) << 6 | (thirdByte & 0x3F)
				bytesPerSequence = 3
			}
		}
		codeUnits.push(codeUnit === undefined ? REPLACEMENT_CHARACTER : codeUnit)
		i += bytesPerSequence
	}
	let str = ''
	for (let i = 0; i < codeUnits.length; i += MAX_ARGUMENTS_LENGTH) {
		str += String.fromCharCode(...codeUnits.slice(i, i + MAX_ARGUMENTS_LENGTH))
	}
	return str
}
