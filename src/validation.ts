// Option value validation for cache configuration
import { ValidationError } from './errors';

export interface ValidationRule<T> {
  validate(value: T): boolean;
  message: string;
}

export abstract class Validator<T> {
  protected rules: ValidationRule<T>[] = [];

  validate(value: T): void {
    for (const rule of this.rules) {
      if (!rule.validate(value)) {
        throw new ValidationError(rule.message);
      }
    }
  }
}

export class StringValidator extends Validator<string> {
  required(message: string = 'Field is required'): this {
    this.rules.push({
      validate: (value: string) => typeof value === 'string' && value.trim().length > 0,
      message
    });
    return this;
  }
}

export class NumberValidator extends Validator<number> {
  constructor(private readonly field: string) {
    super();
    this.rules.push({
      validate: (value: number) => typeof value === 'number' && Number.isFinite(value),
      message: `${field} must be a finite number`
    });
  }

  integer(message?: string): this {
    this.rules.push({
      validate: (value: number) => Number.isInteger(value),
      message: message || `${this.field} must be an integer`
    });
    return this;
  }

  min(min: number, message?: string): this {
    this.rules.push({
      validate: (value: number) => value >= min,
      message: message || `${this.field} must be at least ${min}`
    });
    return this;
  }

  greaterThan(bound: number, message?: string): this {
    this.rules.push({
      validate: (value: number) => value > bound,
      message: message || `${this.field} must be greater than ${bound}`
    });
    return this;
  }
}

export const validators = {
  maxCacheSize: () => new NumberValidator('maxCacheSize').integer().min(0),
  exceptionRetryDelayBase: () => new NumberValidator('exceptionRetryDelayBase').min(0),
  exceptionRetryGrowthFactor: () => new NumberValidator('exceptionRetryGrowthFactor').min(1),
  exceptionRetryDelayMax: () => new NumberValidator('exceptionRetryDelayMax').min(0),
  secretRefreshInterval: () => new NumberValidator('secretRefreshInterval').greaterThan(0),
  defaultVersionStage: () => new StringValidator().required('defaultVersionStage must be a non-empty string')
};
