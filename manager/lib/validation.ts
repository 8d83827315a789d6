/**
 * Request validation
 * Joi schemas for API input plus helpers that turn Joi failures into ValidationError
 */

import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ValidationError } from './errors';

export interface OpenSessionInput {
  target_ip: string;
  target_port: number;
}

export interface CloseSessionInput {
  session_id: string;
}

export interface SessionIdParam {
  id: string;
}

type RequestProperty = 'body' | 'query' | 'params';

// Session ids are UUIDs; anything else well-formed simply won't be found
const sessionId = Joi.string().max(64).pattern(/^[A-Za-z0-9-]+$/);

// ============================================
// Joi Schemas for API Validation
// ============================================

export const schemas = {
  // Open a forwarding session (POST body or /open_proxy query)
  openSession: Joi.object<OpenSessionInput>({
    target_ip: Joi.string().ip({ cidr: 'forbidden' }).required(),
    target_port: Joi.number().integer().min(1).max(65535).required(),
  }),

  // /close_proxy query
  closeSession: Joi.object<CloseSessionInput>({
    session_id: sessionId.required(),
  }),

  // :id route param
  sessionIdParam: Joi.object<SessionIdParam>({
    id: sessionId.required(),
  }),
};

/**
 * Validate input against a schema
 * @returns The validated (converted, unknown keys stripped) value
 * @throws {ValidationError} Listing every failing field
 */
export function parseInput<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const { error, value } = schema.validate(input, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const details = error.details.map(d => ({
      field: d.path.join('.'),
      message: d.message,
    }));
    throw new ValidationError('Validation failed', { fields: details });
  }

  return value;
}

/**
 * Express middleware factory for Joi validation
 * @param schema - Joi schema
 * @param property - Request property to validate ('body', 'query', 'params')
 * @returns Express middleware that forwards a ValidationError on failure
 */
export function validate<T>(
  schema: Joi.ObjectSchema<T>,
  property: RequestProperty = 'body'
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      parseInput(schema, req[property]);
      next();
    } catch (err) {
      next(err);
    }
  };
}
