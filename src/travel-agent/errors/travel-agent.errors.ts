import {
  BadRequestException,
  InternalServerErrorException,
  MethodNotAllowedException,
} from '@nestjs/common';
import { isAxiosError } from 'axios';

/** Request body is not a JSON object carrying the required fields. */
export class ValidationError extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

export class MethodError extends MethodNotAllowedException {
  constructor() {
    super('Method not allowed');
  }
}

/**
 * The model provider (or a tool call it requested) failed. Terminal for the
 * request: nothing retries it.
 */
export class ModelInvocationError extends InternalServerErrorException {
  constructor(message: string) {
    super(message);
  }
}

interface ProviderErrorBody {
  error?: { message?: string } | string;
}

/** Best-effort human readable description of an unknown thrown value. */
export function describeError(error: unknown): string {
  if (isAxiosError<ProviderErrorBody>(error)) {
    const body = error.response?.data?.error;
    const detail = typeof body === 'string' ? body : body?.message;
    if (detail) {
      return `${error.message}: ${detail}`;
    }
    return error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
