import {
  createTypedError,
  errorMessage,
  invariant,
  isNotFound,
  PayloadInvariantError,
  RpcError,
  rpcTypedError,
  validationError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError fills defaults', () => {
    expect(createTypedError({ code: 'RPC.TRANSPORT', message: 'down' })).toEqual({
      code: 'RPC.TRANSPORT',
      message: 'down',
      executionId: undefined,
      retryable: false,
      details: undefined,
    });
  });

  test('validationError uses the config code', () => {
    const error = validationError('bad', { field: 'pageSize' });
    expect(error.code).toBe('VALIDATION.CONFIG');
    expect(error.details).toEqual({ field: 'pageSize' });
  });

  test('recognises NotFound only on RpcError', () => {
    expect(isNotFound(new RpcError('NOT_FOUND', 'gone'))).toBe(true);
    expect(isNotFound(new RpcError('INTERNAL', 'boom'))).toBe(false);
    expect(isNotFound(new Error('NOT_FOUND'))).toBe(false);
  });

  test('errorMessage accepts anything', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('rpcTypedError', () => {
  test('marks transport failures retryable', () => {
    const error = rpcTypedError('GetBacktrace', new RpcError('UNAVAILABLE', 'down'), 'E_1');
    expect(error).toMatchObject({
      code: 'RPC.TRANSPORT',
      message: 'GetBacktrace: down',
      executionId: 'E_1',
      retryable: true,
      details: { rpcCode: 'UNAVAILABLE' },
    });
  });

  test('maps NotFound and unknown errors', () => {
    expect(rpcTypedError('GetBacktrace', new RpcError('NOT_FOUND', 'gone'))).toMatchObject({
      code: 'RPC.NOT_FOUND',
      retryable: false,
    });
    const unknown = rpcTypedError('ListLogs', new Error('socket closed'));
    expect(unknown.details).toEqual({ rpcCode: 'UNKNOWN' });
    expect(unknown.retryable).toBe(false);
  });
});

describe('invariant', () => {
  test('throws PayloadInvariantError when the condition fails', () => {
    expect(() => invariant(false, 'missing field')).toThrow(PayloadInvariantError);
    expect(() => invariant(true, 'never')).not.toThrow();
  });
});
