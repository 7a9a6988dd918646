//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import crypto from 'crypto';
import { isAxiosError } from 'axios';

export class StatusCodeError extends Error {
  status: number;
  innerError?: unknown;
  url?: string;

  constructor(status: number, message?: string) {
    super(message);
    this.status = status;
  }
}

export function assertUnreachable(nothing: never): never {
  throw new Error(`This is never expected: ${String(nothing)}`);
}

export class CreateError {
  static CreateStatusCodeError(code: number, message?: string): StatusCodeError {
    return new StatusCodeError(code, message);
  }

  static NotFound(message?: string, innerError?: unknown): StatusCodeError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(404, message), innerError);
  }

  static Conflict(message: string, innerError?: unknown): StatusCodeError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(409, message), innerError);
  }

  static ParameterRequired(parameterName: string, optionalDetails?: string): StatusCodeError {
    const msg = `${parameterName} required`;
    return CreateError.CreateStatusCodeError(400, optionalDetails ? `${msg}: ${optionalDetails}` : msg);
  }

  static InvalidParameters(message: string, innerError?: unknown): StatusCodeError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(400, message), innerError);
  }

  static NotAuthenticated(message: string, innerError?: unknown): StatusCodeError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(401, message), innerError);
  }

  static NotAuthorized(message: string, innerError?: unknown): StatusCodeError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(403, message), innerError);
  }

  static ServerError(message: string, innerError?: unknown): StatusCodeError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(500, message), innerError);
  }

  static Wrap(message: string, innerError?: unknown): StatusCodeError {
    const status = ErrorHelper.GetStatus(innerError) || 500;
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(status, message), innerError);
  }
}

export class ErrorHelper {
  public static SetInnerError<T extends StatusCodeError>(error: T, innerError?: unknown): T {
    if (error && innerError) {
      error.innerError = innerError;
    }
    return error;
  }

  public static HasStatus(error: unknown): boolean {
    return !!ErrorHelper.GetStatus(error);
  }

  public static IsNotFound(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 404;
  }

  public static IsNotAuthorized(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 403;
  }

  public static IsNotAuthenticated(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 401;
  }

  public static IsConflict(error: unknown): boolean {
    if (ErrorHelper.GetStatus(error) === 409) {
      return true;
    }
    // would be nice to be able to get rid of this clause someday
    return ErrorHelper.GetMessage(error).includes('already exists');
  }

  // Graph replies 400 with "One or more added object references already exist"
  // when the principal is a member already.
  public static IsAlreadyMember(error: unknown): boolean {
    if (ErrorHelper.IsConflict(error)) {
      return true;
    }
    const status = ErrorHelper.GetStatus(error);
    return status === 400 && ErrorHelper.GetMessage(error).includes('already exist');
  }

  public static GetMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message || '';
    }
    return typeof error === 'string' ? error : '';
  }

  public static GetStatus(error: unknown): number | null {
    if (!error || typeof error !== 'object') {
      return null;
    }
    if (isAxiosError(error) && error.response?.status) {
      return error.response.status;
    }
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode;
    }
    if ('status' in error) {
      const status = error.status;
      if (typeof status === 'number') {
        return status;
      } else if (typeof status === 'string') {
        return Number(status);
      }
      console.warn(`Unsupported error.status type: ${typeof status}`);
    }
    return null;
  }
}

export function sha256(str: string) {
  const hash = crypto.createHash('sha256').update(str).digest('base64');
  return hash;
}

export function splitSemiColonCommas(value: string | undefined): string[] {
  return value ? value.replace(/;/g, ',').split(',').map((entry) => entry.trim()).filter(Boolean) : [];
}
