import { AppError } from '../../src/utils/AppError';
import {
  CatalogUnavailableError,
  describeError,
  DomainError,
  InvalidMatchTargetError,
  MalformedDocumentError,
  PersistenceFailureError,
} from '../../src/utils/errors';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and status code', () => {
      const error = new AppError('Test error', 400);

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.isOperational).toBe(true);
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 500, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 400);

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 400);

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create bad request error', () => {
      const error = AppError.badRequest('Invalid input');

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Invalid input');
    });

    it('should create not found error', () => {
      const error = AppError.notFound();

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Resource not found');
    });

    it('should create not found error with custom message', () => {
      const error = AppError.notFound('Catalog item i-1 not found');

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Catalog item i-1 not found');
    });
  });
});

describe('Domain errors', () => {
  it('should keep subclass prototypes for instanceof checks', () => {
    const error = new InvalidMatchTargetError('"Кухня" is a category', 'g-kitchen');

    expect(error).toBeInstanceOf(InvalidMatchTargetError);
    expect(error).toBeInstanceOf(DomainError);
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should map each kind to its status code', () => {
    expect(new MalformedDocumentError('bad file')).toMatchObject({
      kind: 'MalformedDocument',
      statusCode: 422,
      isOperational: true,
    });
    expect(new CatalogUnavailableError()).toMatchObject({
      kind: 'CatalogUnavailable',
      statusCode: 503,
      message: 'Catalog is unavailable',
    });
    expect(new InvalidMatchTargetError('group', 'g-1')).toMatchObject({
      kind: 'InvalidMatchTarget',
      statusCode: 422,
      itemId: 'g-1',
    });
    expect(new PersistenceFailureError('disk full')).toMatchObject({
      kind: 'PersistenceFailure',
      statusCode: 500,
      isOperational: false,
    });
  });

  it('should keep the underlying reason', () => {
    const reason = new Error('ECONNREFUSED');
    const error = new CatalogUnavailableError('Catalog API is unreachable', reason);

    expect(error.reason).toBe(reason);
  });

  describe('describeError', () => {
    it('should return the message of an Error', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
    });

    it('should fall back for non-errors', () => {
      expect(describeError('boom')).toBe('Unknown error');
    });
  });
});
