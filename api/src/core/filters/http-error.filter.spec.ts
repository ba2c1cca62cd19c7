import type { ArgumentsHost } from '@nestjs/common';
import {
  BadRequestException,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { toHttpException } from '../../modules/ledger/ledger.errors';
import { HttpErrorFilter } from './http-error.filter';

type MockFn<Return = unknown, Args extends unknown[] = unknown[]> = jest.Mock<
  Return,
  Args
>;
type ResponseStub = {
  status: MockFn<{ json: MockFn<void, [unknown]> }, [number]>;
  json: MockFn<void, [unknown]>;
};

const createHost = (url: string) => {
  const json = jest.fn<void, [unknown]>();
  const res: ResponseStub = {
    json,
    status: jest.fn<{ json: MockFn<void, [unknown]> }, [number]>(() => ({ json })),
  };
  const host = {
    switchToHttp: () => ({
      getResponse: () => res,
      getRequest: () => ({ originalUrl: url }),
    }),
  };
  return { res, host: host as unknown as ArgumentsHost };
};

describe('HttpErrorFilter', () => {
  const filter = new HttpErrorFilter();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders ledger errors with their kind and extra fields', () => {
    const { res, host } = createHost('/admin/tenants/acme-coffee/sync');

    filter.catch(
      toHttpException({
        kind: 'cap_exceeded',
        message: 'Discount cap of 20% would be exceeded',
        currentPercent: 15,
        requestedPercent: 10,
        maxPercent: 20,
      }),
      host,
    );

    expect(res.status).toHaveBeenCalledWith(422);
    expect(res.json).toHaveBeenCalledWith({
      error: 'cap_exceeded',
      code: 'cap_exceeded',
      message: 'Discount cap of 20% would be exceeded',
      statusCode: 422,
      path: '/admin/tenants/acme-coffee/sync',
      timestamp: expect.any(String),
      details: { currentPercent: 15, requestedPercent: 10, maxPercent: 20 },
    });
  });

  it('leaves undefined fields out of details', () => {
    const { res, host } = createHost('/x');

    filter.catch(
      toHttpException({ kind: 'validation', message: 'expiry must be in the future' }),
      host,
    );

    const body: unknown = res.json.mock.calls[0]?.[0];
    expect(body).toMatchObject({ code: 'validation', statusCode: 400 });
    expect(body).not.toHaveProperty('details');
  });

  it('joins validation pipe messages and keeps them as details', () => {
    const { res, host } = createHost('/x');

    filter.catch(
      new BadRequestException(['days must not be greater than 365', 'days must be an integer number']),
      host,
    );

    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        code: 'BadRequest',
        message: 'days must not be greater than 365; days must be an integer number',
        details: ['days must not be greater than 365', 'days must be an integer number'],
      }),
    );
  });

  it('names plain HTTP errors by status', () => {
    const { res, host } = createHost('/x');

    filter.catch(new NotFoundException('nothing here'), host);
    filter.catch(new UnprocessableEntityException('nope'), host);

    expect(res.json.mock.calls.map(([body]) => body)).toEqual([
      expect.objectContaining({ code: 'NotFound', message: 'nothing here', statusCode: 404 }),
      expect.objectContaining({ code: 'ValidationFailed', message: 'nope', statusCode: 422 }),
    ]);
  });

  it('hides the message of unexpected errors', () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const { res, host } = createHost('/x');

    filter.catch(new Error('pg: connection refused'), host);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        code: 'InternalError',
        message: 'Internal Server Error',
        statusCode: 500,
      }),
    );
  });
});
