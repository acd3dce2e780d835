import { ArgumentsHost, BadRequestException, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { HttpErrorFilter, statusForException } from '../../../src/common/filters/http-error.filter';
import {
  AclConnectionError,
  AclUnknownError,
  AuthorizationDeniedError
} from '../../../src/authorization/authorization.errors';
import { Action, Resource } from '../../../src/authorization/authorization.types';
import { RepositoryError } from '../../../src/database/repository.errors';
import type { JsonLogger } from '../../../src/logging/json-logger.service';

function makeHost(request: Record<string, unknown>) {
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  const host = {
    switchToHttp: () => ({
      getResponse: () => ({ status }),
      getRequest: () => request
    })
  } as unknown as ArgumentsHost;
  return { host, status, json };
}

function makeLogger() {
  return { error: jest.fn(), warn: jest.fn() };
}

describe('statusForException', () => {
  it.each([
    [new UnauthorizedException(), 401],
    [new AuthorizationDeniedError(Resource.USERS, Action.UPDATE), 403],
    [new AclConnectionError('Role store unreachable: x'), 503],
    [new AclUnknownError('Role resolution failed: x'), 500],
    [RepositoryError.notFound('User 1 not found'), 404],
    [RepositoryError.connection('down'), 503],
    [new RepositoryError('constraint_violation', 'dup'), 409],
    [new RepositoryError('unknown', 'x'), 500],
    [new Error('anything'), 500],
    ['thrown string', 500]
  ])('maps %p to %p', (exception, expected) => {
    expect(statusForException(exception)).toBe(expected);
  });
});

describe('HttpErrorFilter', () => {
  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(new Date('2024-05-01T10:00:00.000Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('answers an authorization denial with a generic 403 body', () => {
    const logger = makeLogger();
    const filter = new HttpErrorFilter(logger as unknown as JsonLogger);
    const { host, status, json } = makeHost({ originalUrl: '/users/5', method: 'PUT', requestId: 'req-1' });

    filter.catch(new AuthorizationDeniedError(Resource.USERS, Action.UPDATE), host);

    expect(status).toHaveBeenCalledWith(403);
    expect(json).toHaveBeenCalledWith({
      statusCode: 403,
      errorCode: 'FORBIDDEN',
      message: 'Forbidden',
      timestamp: '2024-05-01T10:00:00.000Z',
      path: '/users/5',
      requestId: 'req-1'
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Request failed',
      expect.objectContaining({ errorName: 'AuthorizationDeniedError', statusCode: 403 })
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('hides driver details of a 503 and logs it as an error', () => {
    const logger = makeLogger();
    const filter = new HttpErrorFilter(logger as unknown as JsonLogger);
    const { host, json } = makeHost({ originalUrl: '/users', method: 'GET' });

    filter.catch(new AclConnectionError('Role store unreachable: connect ECONNREFUSED 10.0.0.5:3306'), host);

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 503, errorCode: 'SERVICE_UNAVAILABLE', message: 'Service Unavailable' })
    );
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('uses the generic message for validation failures', () => {
    const filter = new HttpErrorFilter(makeLogger() as unknown as JsonLogger);
    const { host, json } = makeHost({ url: '/users', method: 'POST' });

    filter.catch(new BadRequestException(['email must be an email']), host);

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 400, errorCode: 'BAD_REQUEST', message: 'Bad Request', path: '/users' })
    );
  });

  it('includes the acting user id in the log line', () => {
    const logger = makeLogger();
    const filter = new HttpErrorFilter(logger as unknown as JsonLogger);
    const { host } = makeHost({ originalUrl: '/users/9', method: 'GET', user: { userId: 4, claims: { sub: '4' } } });

    filter.catch(new NotFoundException(), host);

    expect(logger.warn).toHaveBeenCalledWith('Request failed', expect.objectContaining({ userId: 4, statusCode: 404 }));
  });
});
