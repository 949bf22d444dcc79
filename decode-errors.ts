export class TruncatedStreamError extends Error {
	constructor(
		public readonly needed: number,
		public readonly available: number
	) {
		super(`Needed ${needed} byte${needed === 1 ? '' : 's'} but only ${available} remain`)
		this.name = 'TruncatedStreamError'
	}
}

export class UnknownOpcodeError extends Error {
	constructor(public readonly opcode: number) {
		super('Unknown opcode: 0x' + opcode.toString(16))
		this.name = 'UnknownOpcodeError'
	}
}

export class ClassFormatError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ClassFormatError'
	}
}

export type DecodeError = TruncatedStreamError | UnknownOpcodeError
