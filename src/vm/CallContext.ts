import type { GenericValue } from '../value/GenericValue';
import type { Instruction } from './Instruction';
import type { Program } from './Program';

/**
 * Virtual machine frame: a native object bound to a cursor in its program
 * 虚拟机帧：绑定到程序游标的原生对象
 *
 * Frames are recycled by the machine that created them and never shared between runs.
 * 帧由创建它的虚拟机回收复用，不在多次运行之间共享。
 */
export class CallContext {
  private _object: unknown = null;
  private _input: GenericValue | null = null;
  private _program: Program | null = null;
  private _cursor = 0;

  /**
   * Bind this frame to an object, a program and, when deserializing, an input value
   */
  bind(object: unknown, program: Program, input: GenericValue | null): this {
    this._object = object;
    this._program = program;
    this._input = input;
    this._cursor = 0;
    return this;
  }

  /**
   * Drop references so a pooled frame does not keep objects alive
   */
  release(): void {
    this._object = null;
    this._input = null;
    this._program = null;
    this._cursor = 0;
  }

  get object(): unknown {
    return this._object;
  }

  get input(): GenericValue | null {
    return this._input;
  }

  get program(): Program | null {
    return this._program;
  }

  /** Index of the next instruction 下一条指令的位置 */
  get cursor(): number {
    return this._cursor;
  }

  /**
   * Next instruction, advancing the cursor; `null` once the program is exhausted
   * 取下一条指令并前移游标；程序结束时返回null
   */
  take(): Instruction | null {
    const instructions = this._program?.instructions;
    if (!instructions || this._cursor >= instructions.length) return null;
    return instructions[this._cursor++];
  }

  /**
   * Continue at an absolute instruction index
   * 跳转到指定指令位置
   */
  jump(target: number): void {
    this._cursor = target;
  }
}
