/**
 * Instruction vocabulary of the virtual machine
 * 虚拟机指令集
 *
 * Serialize programs build a generic value tree from a live object; deserialize programs
 * populate a live object from an input value. Both share the same three stacks:
 * frames, scratch (raw natives) and results (generic values).
 * 序列化程序由对象构建值树，反序列化程序由输入值填充对象；二者共享帧栈、暂存栈与结果栈。
 */

import type { FieldHandle } from '../reflect/ReflectionUtil';
import type { TypeRef } from '../reflect/TypeRef';
import type { Transformer } from '../transformer/Transformer';

export enum OpCode {
  // value construction 构造值
  CreateObject = 'CreateObject',
  CreateArray = 'CreateArray',
  CreateNone = 'CreateNone',
  CreateBool = 'CreateBool',
  CreateNumber = 'CreateNumber',
  CreateString = 'CreateString',
  ModifyObject = 'ModifyObject',
  ModifyObjectWithConstKey = 'ModifyObjectWithConstKey',
  ModifyArray = 'ModifyArray',
  ModifyArrayWithIndex = 'ModifyArrayWithIndex',
  // reading natives 读取原生值
  PushConst = 'PushConst',
  PushField = 'PushField',
  PushBound = 'PushBound',
  PushItem = 'PushItem',
  PushValue = 'PushValue',
  Transform = 'Transform',
  Call = 'Call',
  // populating natives 填充原生值
  LoadInput = 'LoadInput',
  LoadEntry = 'LoadEntry',
  LoadItem = 'LoadItem',
  Unwrap = 'Unwrap',
  BranchNone = 'BranchNone',
  BranchScalar = 'BranchScalar',
  Instantiate = 'Instantiate',
  CallPopulate = 'CallPopulate',
  Revert = 'Revert',
  StoreField = 'StoreField',
  StoreItem = 'StoreItem'
}

/**
 * Literal scalar carried by `PushConst`
 */
export type ConstScalar = string | number | bigint | boolean | null;

/**
 * Native kind produced by `Unwrap`
 */
export type UnwrapKind = 'number' | 'bigint' | 'string' | 'boolean' | 'value';

export type Instruction =
  | { readonly op: OpCode.CreateObject }
  | { readonly op: OpCode.CreateArray; readonly length: number }
  | { readonly op: OpCode.CreateNone }
  | { readonly op: OpCode.CreateBool }
  | { readonly op: OpCode.CreateNumber }
  | { readonly op: OpCode.CreateString }
  | { readonly op: OpCode.ModifyObject }
  | { readonly op: OpCode.ModifyObjectWithConstKey; readonly key: string }
  | { readonly op: OpCode.ModifyArray }
  | { readonly op: OpCode.ModifyArrayWithIndex; readonly index: number }
  | { readonly op: OpCode.PushConst; readonly value: ConstScalar }
  | { readonly op: OpCode.PushField; readonly field: FieldHandle }
  | { readonly op: OpCode.PushBound }
  | { readonly op: OpCode.PushItem; readonly index: number }
  | { readonly op: OpCode.PushValue }
  | { readonly op: OpCode.Transform; readonly transformers: readonly Transformer[]; readonly type: TypeRef }
  | { readonly op: OpCode.Call }
  | { readonly op: OpCode.LoadInput }
  | { readonly op: OpCode.LoadEntry; readonly key: string | number; readonly skipTo: number }
  | { readonly op: OpCode.LoadItem; readonly index: number }
  | { readonly op: OpCode.Unwrap; readonly kind: UnwrapKind; readonly type: TypeRef }
  | { readonly op: OpCode.BranchNone; readonly target: number }
  | { readonly op: OpCode.BranchScalar; readonly type: TypeRef; readonly target: number }
  | { readonly op: OpCode.Instantiate; readonly type: TypeRef }
  | { readonly op: OpCode.CallPopulate; readonly type: TypeRef }
  | { readonly op: OpCode.Revert; readonly transformers: readonly Transformer[]; readonly type: TypeRef }
  | { readonly op: OpCode.StoreField; readonly field: FieldHandle }
  | { readonly op: OpCode.StoreItem; readonly index: number };
