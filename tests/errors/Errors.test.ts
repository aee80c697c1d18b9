import { describe, test, expect } from 'vitest';
import {
  DepthExceededError,
  FieldAccessError,
  MalformedProgramError,
  SerializationError,
  TypeNotAllowedError,
  describeType
} from '../../src/errors/Errors';

describe('SerializationError', () => {
  test('should expose name and code', () => {
    const error = new TypeNotAllowedError('Promise is not allowed');

    expect(error).toBeInstanceOf(SerializationError);
    expect(error.name).toBe('TypeNotAllowedError');
    expect(error.code).toBe('TYPE_NOT_ALLOWED');
    expect(error.message).toBe('Promise is not allowed');
    expect(error.context).toBeUndefined();
  });

  test('should append attached context to the message', () => {
    const error = new MalformedProgramError('result stack underflow');

    error.attachContext({ className: 'Point', opcode: 'ModifyArray', instructionIndex: 2 });

    expect(error.message).toBe('result stack underflow (Point at ModifyArray#2)');
  });

  test('should keep context known where the error was raised', () => {
    const error = new FieldAccessError('Reading field failed: boom', 'Point', 'x');

    error.attachContext({ className: 'Segment', fieldName: 'from', opcode: 'PushField', instructionIndex: 1 });

    expect(error.context).toEqual({ className: 'Point', fieldName: 'x', opcode: 'PushField', instructionIndex: 1 });
    expect(error.message).toBe('Reading field failed: boom (Point.x at PushField#1)');
  });

  test('should describe the depth bound', () => {
    const error = new DepthExceededError(8);
    expect(error.maxDepth).toBe(8);
    expect(error.message).toBe('Traversal depth exceeded 8 frames (is the object graph cyclic?)');
  });
});

describe('describeType', () => {
  test('should name values by their runtime type', () => {
    expect(describeType(null)).toBe('null');
    expect(describeType(undefined)).toBe('undefined');
    expect(describeType(1n)).toBe('bigint');
    expect(describeType(new Map())).toBe('Map');
    expect(describeType(Object.create(null))).toBe('Object');
    expect(describeType(class Point {})).toBe('Point');
  });
});
