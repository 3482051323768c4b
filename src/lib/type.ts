import { validate as isUUID } from 'uuid';

import { ValidationError } from './errors.js';
import type { SqlType } from './model.js';

export type ValidatorFunction<TValue> = (value: TValue) => boolean | void;

/**
 * Anything that can validate a value, such as a query parameter.
 */
export interface ValueValidator {
  validate(value: unknown, fieldName?: string): unknown;
}

/**
 * Base type class used to validate manifest entries and query parameters.
 */
export abstract class Type<TBase> implements ValueValidator {
  validators: ValidatorFunction<TBase>[];
  protected _required: boolean;

  constructor() {
    this.validators = [];
    this._required = false;
  }

  /**
   * Add a validator function that will receive the normalized value.
   */
  validator(validator: ValidatorFunction<TBase>): this {
    if (typeof validator === 'function') {
      this.validators.push(validator);
    }
    return this;
  }

  /**
   * Mark the value as required or optional.
   */
  required(isRequired = true): this {
    this._required = isRequired;
    return this;
  }

  /**
   * Check the shape of a present value and return it in its normalized form.
   */
  protected abstract normalize(value: unknown, fieldName: string): TBase;

  protected runValidators(value: TBase, fieldName: string): void {
    for (const validator of this.validators) {
      try {
        const result = validator(value);
        if (result === false) {
          throw new ValidationError(`Validation failed for ${fieldName}`, fieldName);
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Validation error for ${fieldName}: ${message}`, fieldName);
      }
    }
  }

  /**
   * Validate the supplied value and return the normalized result.
   */
  validate(value: unknown, fieldName = 'field'): TBase | null | undefined {
    if (value === null || value === undefined) {
      if (this._required) {
        throw new ValidationError(`${fieldName} is required`, fieldName);
      }
      return value;
    }

    const normalized = this.normalize(value, fieldName);
    this.runValidators(normalized, fieldName);
    return normalized;
  }

  /**
   * Validate a value that must be present.
   */
  expect(value: unknown, fieldName = 'field'): TBase {
    const result = this.required().validate(value, fieldName);
    if (result === null || result === undefined) {
      throw new ValidationError(`${fieldName} is required`, fieldName);
    }
    return result;
  }
}

/**
 * Accepts any present value.
 */
export class AnyType extends Type<unknown> {
  protected normalize(value: unknown): unknown {
    return value;
  }
}

/**
 * String type definition with common helpers.
 */
export class StringType extends Type<string> {
  maxLength: number | null;
  minLength: number | null;
  pattern: RegExp | null;

  constructor() {
    super();
    this.maxLength = null;
    this.minLength = null;
    this.pattern = null;
  }

  max(length: number): this {
    this.maxLength = length;
    return this;
  }

  min(length: number): this {
    this.minLength = length;
    return this;
  }

  /**
   * Require the value to match a pattern, e.g. a SQL identifier.
   */
  matches(pattern: RegExp): this {
    this.pattern = pattern;
    return this;
  }

  uuid(): this {
    this.validator(value => {
      if (!isUUID(value)) {
        throw new Error('Must be a valid UUID');
      }
      return true;
    });
    return this;
  }

  protected normalize(value: unknown, fieldName: string): string {
    if (typeof value !== 'string') {
      throw new ValidationError(`${fieldName} must be a string`, fieldName);
    }

    if (this.maxLength !== null && value.length > this.maxLength) {
      throw new ValidationError(
        `${fieldName} must be shorter than ${this.maxLength} characters`,
        fieldName
      );
    }

    if (this.minLength !== null && value.length < this.minLength) {
      throw new ValidationError(
        `${fieldName} must be longer than ${this.minLength} characters`,
        fieldName
      );
    }

    if (this.pattern && !this.pattern.test(value)) {
      throw new ValidationError(`${fieldName} has an invalid format`, fieldName);
    }

    return value;
  }
}

/**
 * One of a fixed set of string values.
 */
export class EnumType<TValue extends string> extends Type<TValue> {
  values: readonly TValue[];

  constructor(values: readonly TValue[]) {
    super();
    this.values = values;
  }

  private isMember(value: unknown): value is TValue {
    return this.values.some(candidate => candidate === value);
  }

  protected normalize(value: unknown, fieldName: string): TValue {
    if (!this.isMember(value)) {
      throw new ValidationError(
        `${fieldName} must be one of: ${this.values.join(', ')}`,
        fieldName
      );
    }
    return value;
  }
}

/**
 * Number type definition with optional range/integer constraints.
 */
export class NumberType extends Type<number> {
  minValue: number | null;
  maxValue: number | null;
  isInteger: boolean;

  constructor() {
    super();
    this.minValue = null;
    this.maxValue = null;
    this.isInteger = false;
  }

  min(value: number): this {
    this.minValue = value;
    return this;
  }

  max(value: number): this {
    this.maxValue = value;
    return this;
  }

  integer(): this {
    this.isInteger = true;
    return this;
  }

  protected normalize(value: unknown, fieldName: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(`${fieldName} must be a finite number`, fieldName);
    }

    if (this.isInteger && !Number.isInteger(value)) {
      throw new ValidationError(`${fieldName} must be an integer`, fieldName);
    }

    if (this.minValue !== null && value < this.minValue) {
      throw new ValidationError(
        `${fieldName} must be greater than or equal to ${this.minValue}`,
        fieldName
      );
    }

    if (this.maxValue !== null && value > this.maxValue) {
      throw new ValidationError(
        `${fieldName} must be less than or equal to ${this.maxValue}`,
        fieldName
      );
    }

    return value;
  }
}

/**
 * 64-bit integer. Values beyond the safe integer range must arrive as a
 * decimal string (the form pg returns for BIGINT) or a `bigint`; they are
 * passed through unchanged.
 */
export class BigIntType extends Type<bigint | number | string> {
  protected normalize(value: unknown, fieldName: string): bigint | number | string {
    if (typeof value === 'bigint') {
      return value;
    }

    if (typeof value === 'string' && /^-?\d+$/.test(value)) {
      return value;
    }

    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ValidationError(`${fieldName} must be an integer`, fieldName);
    }

    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(
        `${fieldName} is outside the safe integer range; pass it as a string or bigint`,
        fieldName
      );
    }

    return value;
  }
}

/**
 * Boolean type definition.
 */
export class BooleanType extends Type<boolean> {
  protected normalize(value: unknown, fieldName: string): boolean {
    if (typeof value !== 'boolean') {
      throw new ValidationError(`${fieldName} must be a boolean`, fieldName);
    }
    return value;
  }
}

/**
 * Date type definition with ISO parsing support.
 */
export class DateType extends Type<Date> {
  protected normalize(value: unknown, fieldName: string): Date {
    let normalized: Date;

    if (value instanceof Date) {
      normalized = value;
    } else if (typeof value === 'string') {
      normalized = new Date(value);
    } else {
      throw new ValidationError(`${fieldName} must be a Date object`, fieldName);
    }

    if (Number.isNaN(normalized.getTime())) {
      throw new ValidationError(`${fieldName} must be a valid date`, fieldName);
    }

    return normalized;
  }
}

/**
 * Array type definition that can optionally enforce an element type.
 */
export class ArrayType<TElement = unknown> extends Type<TElement[]> {
  elementType: Type<TElement>;

  constructor(elementType: Type<TElement>) {
    super();
    this.elementType = elementType;
  }

  protected normalize(value: unknown, fieldName: string): TElement[] {
    if (!Array.isArray(value)) {
      throw new ValidationError(`${fieldName} must be an array`, fieldName);
    }

    return value.map((item: unknown, index) =>
      this.elementType.expect(item, `${fieldName}[${index}]`)
    );
  }
}

/**
 * Plain object type definition.
 */
export class ObjectType extends Type<Record<string, unknown>> {
  protected normalize(value: unknown, fieldName: string): Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ValidationError(`${fieldName} must be an object`, fieldName);
    }

    const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
    return record;
  }
}

/**
 * Validator for values bound to a column of the given type.
 */
export function parameterType(type: SqlType): ValueValidator {
  switch (type) {
    case 'text':
      return types.string();
    case 'int':
      return types.number().integer();
    case 'bigint':
      return types.bigint();
    case 'float':
      return types.number();
    case 'uuid':
      return types.string().uuid();
    case 'boolean':
      return types.boolean();
    case 'timestamp':
      return types.date();
    case 'json':
      return types.any();
  }
}

// Factory helpers used by the manifest loader and the binding helper.
const types = {
  string: () => new StringType(),
  enum: <TValue extends string>(values: readonly TValue[]) => new EnumType(values),
  number: () => new NumberType(),
  bigint: () => new BigIntType(),
  boolean: () => new BooleanType(),
  date: () => new DateType(),
  array: <TElement>(elementType: Type<TElement>) => new ArrayType(elementType),
  object: () => new ObjectType(),
  any: () => new AnyType(),
} as const;

export default types;
