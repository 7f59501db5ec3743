import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { hasBeenCreated, parseWithSchema, withCreationGuard } from '../../src/models/validation.js';
import { CreationGuardError, ModelValidationError } from '../../src/lib/errors.js';

describe('parseWithSchema', () => {
  const schema = z.object({ name: z.string(), size: z.number().int().positive() });

  it('should return the parsed value', () => {
    expect(parseWithSchema('Sample', schema, { name: 'a', size: 2, extra: true })).toEqual({ name: 'a', size: 2 });
  });

  it('should collect every issue', () => {
    try {
      parseWithSchema('Sample', schema, { size: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ModelValidationError);
      expect(error).toMatchObject({
        model: 'Sample',
        issues: [
          { path: 'name', message: 'Required' },
          { path: 'size', message: 'Number must be greater than 0' },
        ],
      });
    }
  });
});

describe('withCreationGuard', () => {
  it('should allow a new object to be created once', async () => {
    const newObject = { name: 'event' };

    await expect(withCreationGuard('Event', newObject, async () => 'created')).resolves.toBe('created');
    expect(hasBeenCreated(newObject)).toBe(true);
    await expect(withCreationGuard('Event', newObject, async () => 'again')).rejects.toThrow(
      new CreationGuardError('Event')
    );
  });

  it('should report the model in the error message', async () => {
    const newObject = {};
    await withCreationGuard('Program', newObject, async () => undefined);

    await expect(withCreationGuard('Program', newObject, async () => undefined)).rejects.toThrow(
      'NewProgram has already been created.'
    );
  });

  it('should not call create a second time', async () => {
    const newObject = {};
    let calls = 0;
    const create = async () => {
      calls += 1;
    };

    await withCreationGuard('Ven', newObject, create);
    await expect(withCreationGuard('Ven', newObject, create)).rejects.toBeInstanceOf(CreationGuardError);
    expect(calls).toBe(1);
  });

  it('should release the guard when creation fails', async () => {
    const newObject = {};

    await expect(
      withCreationGuard('Report', newObject, async () => {
        throw new Error('VTN unavailable');
      })
    ).rejects.toThrow('VTN unavailable');
    expect(hasBeenCreated(newObject)).toBe(false);
    await expect(withCreationGuard('Report', newObject, async () => 'created')).resolves.toBe('created');
  });

  it('should guard distinct objects independently', async () => {
    await withCreationGuard('Event', { id: 1 }, async () => undefined);
    await expect(withCreationGuard('Event', { id: 1 }, async () => 'second')).resolves.toBe('second');
  });

  it('should reject a concurrent second creation of the same object', async () => {
    const newObject = {};
    let release: () => void = () => {};
    const pending = withCreationGuard(
      'Event',
      newObject,
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    await expect(withCreationGuard('Event', newObject, async () => undefined)).rejects.toBeInstanceOf(
      CreationGuardError
    );
    release();
    await pending;
  });
});
