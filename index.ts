export {
	type CodeBytes,
	type DecodeFailure,
	type DecodeOptions,
	type DecodeResult,
	type DecodedInstruction,
	type UnknownOpcodePolicy,
	decode,
	decodeCode,
	logFailure
} from './bytecode-parser'
export {type AssemblyInstruction, assemble} from './bytecode-assembler'
export {type ClassFile, classFileParser, parseClassFile} from './class-file-parser'
export {listClass} from './class-listing'
export {type Constant, ConstantPool} from './constant-pool-parser'
export {ClassFormatError, type DecodeError, TruncatedStreamError, UnknownOpcodeError} from './decode-errors'
export {
	type InstructionDef,
	type OperandShape,
	RESERVED_PREFIX,
	catalog,
	lookup,
	mnemonicOf,
	opcodeOf
} from './instruction-catalog'
export {
	type ConstantResolver,
	MAX_DESCRIPTION_LENGTH,
	formatInstruction,
	formatListing,
	truncateDescription
} from './instruction-listing'
export {UNKNOWN_ARRAY_TYPE, UNKNOWN_OPCODE} from './operand-format'
export {UNKNOWN_WIDE_OPCODE} from './wide-parser'
