// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  errorMessage,
  LinkError,
  NotFoundError,
  OperationalError,
  toLinkError,
  ValidationError,
} from './index.js';

describe('error classes', () => {
  it('should carry a default code on the base class', () => {
    const error = new LinkError('boom');

    expect(error.code).toBe('LINK_ERROR');
    expect(error.name).toBe('LinkError');
    expect(error).toBeInstanceOf(Error);
  });

  it.each([
    [new ConfigurationError('x'), 'CONFIGURATION_ERROR', 'ConfigurationError'],
    [new ValidationError('x'), 'VALIDATION_ERROR', 'ValidationError'],
    [new OperationalError('x'), 'OPERATIONAL_ERROR', 'OperationalError'],
    [new NotFoundError('x'), 'NOT_FOUND_ERROR', 'NotFoundError'],
  ])('should keep code and name on subclasses (%#)', (error, code, name) => {
    expect(error).toBeInstanceOf(LinkError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });
});

describe('toLinkError', () => {
  it('should pass LinkErrors through', () => {
    const error = new NotFoundError('missing');

    expect(toLinkError(error)).toBe(error);
  });

  it('should wrap plain errors in the fallback type', () => {
    const wrapped = toLinkError(new Error('EACCES'), OperationalError);

    expect(wrapped).toBeInstanceOf(OperationalError);
    expect(wrapped.message).toBe('EACCES');
  });

  it('should stringify non-error values', () => {
    expect(toLinkError('plain').message).toBe('plain');
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
