import type { NextFunction, Request, Response } from 'express';
import { MountError, type MountErrorCode, errorMessage } from '../../common/errors';
import { logError } from '../logger';

const STATUS_BY_CODE: Record<MountErrorCode, number> = {
  INVALID_COORDINATE: 400,
  OBJECT_NOT_FOUND: 404,
  UNSUPPORTED_FORMAT: 415,
  COMMUNICATION: 502,
  PROTOCOL: 502
};

export class BadRequestError extends Error {}

export function sendError(req: Request, res: Response, err: unknown): void {
  if (err instanceof BadRequestError) {
    res.status(400).json({ error: err.message, code: 'BAD_REQUEST' });
    return;
  }
  const status = err instanceof MountError ? STATUS_BY_CODE[err.code] : 500;
  const code = err instanceof MountError ? err.code : 'INTERNAL';
  logError('api_request_failed', { method: req.method, path: req.originalUrl, status, error: errorMessage(err) });
  res.status(status).json({ error: errorMessage(err), code });
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not await handlers; failures are turned into JSON errors here. */
export function route(handler: AsyncHandler): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res) => {
    void handler(req, res).catch((err: unknown) => sendError(req, res, err));
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function optionalBoolean(body: Record<string, unknown>, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new BadRequestError(`"${key}" must be a boolean.`);
  }
  return value;
}

export function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function queryNumber(req: Request, key: string): number | undefined {
  const value = queryString(req, key);
  if (value === undefined) {
    return undefined;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new BadRequestError(`"${key}" must be a number.`);
  }
  return n;
}
