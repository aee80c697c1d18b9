import type { Instruction } from './Instruction';
import { OpCode } from './Instruction';

/**
 * Frozen instruction sequence
 * 冻结的指令序列
 */
export interface Program {
  /** Label used in diagnostics, e.g. `serialize Point` 诊断标签 */
  readonly label: string;
  /** Class the program was compiled for, if any 程序对应的类 */
  readonly owner: string | undefined;
  readonly instructions: readonly Instruction[];
}

/**
 * Incremental program assembly with forward jump patching
 * 增量组装程序，支持前向跳转回填
 *
 * @example
 * ```typescript
 * const builder = new ProgramBuilder('deserialize Point', 'Point');
 * const load = builder.reserve();
 * builder.emit({ op: OpCode.Unwrap, kind: 'number', type: Number });
 * builder.emit({ op: OpCode.StoreField, field });
 * builder.patch(load, { op: OpCode.LoadEntry, key: 'x', skipTo: builder.position });
 * ```
 */
export class ProgramBuilder {
  private readonly _instructions: Instruction[] = [];

  constructor(
    private readonly _label: string,
    private readonly _owner?: string
  ) {}

  /**
   * Index the next emitted instruction will get
   */
  get position(): number {
    return this._instructions.length;
  }

  emit(instruction: Instruction): number {
    this._instructions.push(instruction);
    return this._instructions.length - 1;
  }

  /**
   * Reserve a slot for an instruction whose operands are not known yet
   * 预留一个稍后回填的指令位
   */
  reserve(): number {
    return this.emit({ op: OpCode.PushBound });
  }

  patch(index: number, instruction: Instruction): void {
    if (index < 0 || index >= this._instructions.length) {
      throw new RangeError(`Cannot patch instruction ${index} of ${this._instructions.length}`);
    }
    this._instructions[index] = instruction;
  }

  build(): Program {
    const instructions = this._instructions.map(instruction => Object.freeze(instruction));
    return Object.freeze({
      label: this._label,
      owner: this._owner,
      instructions: Object.freeze(instructions)
    });
  }
}

/**
 * Build a program from a fixed instruction list
 */
export function createProgram(label: string, instructions: readonly Instruction[], owner?: string): Program {
  const builder = new ProgramBuilder(label, owner);
  for (const instruction of instructions) builder.emit(instruction);
  return builder.build();
}
