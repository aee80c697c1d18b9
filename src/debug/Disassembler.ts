import type { Instruction } from '../vm/Instruction';
import { OpCode } from '../vm/Instruction';
import type { Program } from '../vm/Program';
import type { Transformer } from '../transformer/Transformer';
import { typeName } from '../reflect/TypeRef';
import { describeType } from '../errors/Errors';

const OPCODE_WIDTH = 24;

/**
 * Listing of a program, one instruction per line after a `; label` header
 * 程序清单：`; 标签`行之后每行一条指令
 *
 * @example
 * ```typescript
 * disassemble(compiler.serializeProgramFor(Point));
 * // ; serialize Point
 * //    0  CreateObject
 * //    1  PushField                x
 * //    2  CreateNumber
 * //    3  ModifyObjectWithConstKey "x"
 * ```
 */
export function disassemble(program: Program): string {
  const lines = [`; ${program.label}`];
  program.instructions.forEach((instruction, index) => {
    lines.push(formatInstruction(instruction, index));
  });
  return lines.join('\n');
}

export function formatInstruction(instruction: Instruction, index: number): string {
  const line = `${String(index).padStart(4)}  ${instruction.op.padEnd(OPCODE_WIDTH)} ${formatOperands(instruction)}`;
  return line.trimEnd();
}

function formatOperands(instruction: Instruction): string {
  switch (instruction.op) {
    case OpCode.CreateArray:
      return String(instruction.length);
    case OpCode.ModifyObjectWithConstKey:
      return JSON.stringify(instruction.key);
    case OpCode.ModifyArrayWithIndex:
    case OpCode.PushItem:
    case OpCode.LoadItem:
    case OpCode.StoreItem:
      return String(instruction.index);
    case OpCode.PushConst:
      return formatConst(instruction.value);
    case OpCode.PushField:
    case OpCode.StoreField:
      return instruction.field.name;
    case OpCode.Transform:
    case OpCode.Revert:
      return `${formatTransformers(instruction.transformers)} ${typeName(instruction.type)}`;
    case OpCode.LoadEntry:
      return `${JSON.stringify(instruction.key)} else -> ${instruction.skipTo}`;
    case OpCode.Unwrap:
      return `${instruction.kind} ${typeName(instruction.type)}`;
    case OpCode.BranchNone:
      return `-> ${instruction.target}`;
    case OpCode.BranchScalar:
      return `${typeName(instruction.type)} -> ${instruction.target}`;
    case OpCode.Instantiate:
    case OpCode.CallPopulate:
      return typeName(instruction.type);
    default:
      return '';
  }
}

function formatConst(value: string | number | bigint | boolean | null): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  return String(value);
}

function formatTransformers(transformers: readonly Transformer[]): string {
  return `[${transformers.map(transformer => describeType(transformer)).join(', ')}]`;
}
