import type { Context } from 'hono';
import { ZodError } from 'zod';
import { isLedgerError, type LedgerErrorCode } from '../../domain/errors';
import { logger } from '../../utils/logger';

export type ResponseStatus = 200 | 201 | 400 | 404 | 409 | 422 | 500 | 502 | 503;

function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// Pretty-print JSON when `?pretty=1` or `x-pretty: 1` is supplied. bigint
// values are always rendered as decimal strings.
export function jsonRespond(c: Context, data: unknown, status: ResponseStatus = 200) {
  const pretty = c.req.query('pretty') ?? c.req.header('x-pretty');
  const body = JSON.stringify(data, replacer, pretty ? 2 : undefined);
  return new Response(body, { status, headers: { 'content-type': 'application/json; charset=utf-8' } });
}

const STATUS_BY_CODE: Record<LedgerErrorCode, ResponseStatus> = {
  NoSuchVault: 404,
  AlreadyExists: 409,
  ZeroAmount: 422,
  InsufficientCollateral: 422,
  ExceedsDebt: 422,
  RatioViolation: 422,
  NotLiquidatable: 422,
  InvalidPrice: 503,
  TransferFailed: 502,
  ReentrantCall: 409,
};

export function errorRespond(c: Context, err: unknown) {
  if (isLedgerError(err)) {
    return jsonRespond(c, { error: err.code, message: err.message }, STATUS_BY_CODE[err.code]);
  }
  if (err instanceof ZodError) {
    return jsonRespond(c, { error: 'BadRequest', issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) }, 400);
  }
  logger.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  return jsonRespond(c, { error: 'Internal error' }, 500);
}
