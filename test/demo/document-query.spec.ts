import { BadRequestException } from '@nestjs/common';
import { DocumentQuerySchema } from '../../demo/documents/document-query';
import { validateInput, validInputOrThrow } from '../../demo/validation';

describe('document query validation', () => {
  test('whenActionAbsentThenRead', () => {
    expect(validateInput(DocumentQuerySchema, {}, 'query')).toEqual({ ok: true, value: { action: 'read' } });
  });

  test('whenSingleActionThenKept', () => {
    expect(validateInput(DocumentQuerySchema, { action: 'write' }, 'query')).toEqual({
      ok: true,
      value: { action: 'write' },
    });
  });

  test('whenActionRepeatedThenTypeError', () => {
    expect(validateInput(DocumentQuerySchema, { action: ['read', 'write'] }, 'query')).toEqual({
      ok: false,
      errors: { action: 'action must be a string' },
    });
  });

  test('whenActionBlankThenThrowsBadRequest', () => {
    try {
      validInputOrThrow(DocumentQuerySchema, { action: ' ' }, 'query');
      throw new Error('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(BadRequestException);
      expect(error instanceof BadRequestException && error.getResponse()).toEqual({
        message: 'Validation failed',
        code: 'VALIDATION_FAILED',
        validationErrors: { action: 'action must not be blank' },
      });
    }
  });

  test('whenQueryMissingThenReportedUnderRoot', () => {
    const result = validateInput(DocumentQuerySchema, undefined, 'query');

    expect(result.ok ? [] : Object.keys(result.errors)).toEqual(['query']);
  });
});
