export { formatValue, formatScalar } from './ValueFormatter';
export { disassemble, formatInstruction } from './Disassembler';
