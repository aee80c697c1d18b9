/**
 * Error taxonomy for serialization
 * 序列化错误类型
 *
 * Every failure raised while baking types or running programs is one of these classes.
 * Virtual machine runs attach a {@link ErrorContext} describing where the failure happened.
 * 所有烘焙或执行期间的失败都属于以下类别，虚拟机会附加发生位置的上下文。
 */

/**
 * Where an error happened
 * 错误发生位置
 */
export interface ErrorContext {
  /** Class whose program was running 正在执行程序的类 */
  className?: string;
  /** Field being read or written 正在读写的字段 */
  fieldName?: string;
  /** Opcode name of the failing instruction 失败指令的操作码 */
  opcode?: string;
  /** Index of the failing instruction in its program 指令在程序中的位置 */
  instructionIndex?: number;
  /** Program label 程序标签 */
  program?: string;
}

/**
 * Base class of all serialization errors
 * 所有序列化错误的基类
 */
export abstract class SerializationError extends Error {
  /** Stable machine readable code 稳定的错误码 */
  abstract readonly code: string;

  private _context: ErrorContext | undefined;
  private readonly _detail: string;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.name = new.target.name;
    this._detail = message;
    this._context = context;
    this.refreshMessage();
  }

  get context(): ErrorContext | undefined {
    return this._context;
  }

  /**
   * Fill in location details that were unknown where the error was raised.
   * Already known details are kept.
   * 补充抛出时未知的位置信息，已有信息保持不变
   */
  attachContext(context: ErrorContext): this {
    this._context = { ...context, ...this._context };
    this.refreshMessage();
    return this;
  }

  /**
   * Human readable location, e.g. `Point.x at CreateNumber#3`
   */
  describeContext(): string {
    const ctx = this._context;
    if (!ctx) return '';

    let where = ctx.className ?? '';
    if (ctx.fieldName !== undefined) {
      where += `${where ? '.' : ''}${ctx.fieldName}`;
    }
    if (ctx.opcode !== undefined) {
      where += `${where ? ' at ' : ''}${ctx.opcode}`;
      if (ctx.instructionIndex !== undefined) where += `#${ctx.instructionIndex}`;
    }
    return where;
  }

  private refreshMessage(): void {
    const where = this.describeContext();
    this.message = where ? `${this._detail} (${where})` : this._detail;
  }
}

/**
 * A value or type outside the permitted set
 * 值或类型不在允许范围内
 */
export class TypeNotAllowedError extends SerializationError {
  readonly code = 'TYPE_NOT_ALLOWED';
}

/**
 * Baking or instantiating something that cannot be instantiated
 * 烘焙或实例化了不可实例化的类型
 */
export class NotInstantiableError extends SerializationError {
  readonly code = 'NOT_INSTANTIABLE';
}

/**
 * Reading or writing a field failed
 * 字段读写失败
 */
export class FieldAccessError extends SerializationError {
  readonly code = 'FIELD_ACCESS';

  constructor(
    message: string,
    readonly className: string,
    readonly fieldName: string,
    readonly reason?: unknown
  ) {
    super(message, { className, fieldName });
  }
}

/**
 * Array container mutation out of bounds
 * 数组容器越界修改
 */
export class IndexOutOfRangeError extends SerializationError {
  readonly code = 'INDEX_OUT_OF_RANGE';

  constructor(readonly index: number, readonly length: number) {
    super(`Index ${index} out of range for array of length ${length}`);
  }
}

/**
 * Stack discipline or shape violation while executing a program
 * 程序执行时违反栈规则或形状约定
 */
export class MalformedProgramError extends SerializationError {
  readonly code = 'MALFORMED_PROGRAM';
}

/**
 * Frame stack grew past the configured bound
 * 帧栈超过配置的深度上限
 */
export class DepthExceededError extends SerializationError {
  readonly code = 'DEPTH_EXCEEDED';

  constructor(readonly maxDepth: number) {
    super(`Traversal depth exceeded ${maxDepth} frames (is the object graph cyclic?)`);
  }
}

/**
 * Readable name of a runtime value's type, used in messages
 * 运行时值类型的可读名称
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'function') return value.name || 'anonymous function';
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
  }
  return typeof value;
}
