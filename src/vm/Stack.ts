import { MalformedProgramError } from '../errors/Errors';

/**
 * Growable stack whose underflow is a program consistency error
 * 可增长的栈，下溢视为程序不一致错误
 */
export class Stack<T> {
  private readonly _items: T[] = [];

  constructor(private readonly _name: string) {}

  get size(): number {
    return this._items.length;
  }

  isEmpty(): boolean {
    return this._items.length === 0;
  }

  push(item: T): void {
    this._items.push(item);
  }

  /**
   * @throws MalformedProgramError when empty
   */
  pop(): T {
    if (this._items.length === 0) {
      throw new MalformedProgramError(`${this._name} stack underflow`);
    }
    const item = this._items[this._items.length - 1];
    this._items.length--;
    return item;
  }

  /**
   * @throws MalformedProgramError when empty
   */
  peek(): T {
    if (this._items.length === 0) {
      throw new MalformedProgramError(`${this._name} stack is empty`);
    }
    return this._items[this._items.length - 1];
  }

  clear(): void {
    this._items.length = 0;
  }
}
