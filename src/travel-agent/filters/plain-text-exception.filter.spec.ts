import { BadRequestException, NotFoundException } from '@nestjs/common';
import {
  MethodError,
  ModelInvocationError,
  ValidationError,
} from '../errors/travel-agent.errors';
import { toPlainTextError } from './plain-text-exception.filter';

describe('toPlainTextError', () => {
  it('keeps validation messages as they are', () => {
    expect(toPlainTextError(new ValidationError('Invalid JSON: bad body'))).toEqual({
      status: 400,
      message: 'Invalid JSON: bad body',
    });
  });

  it('prefixes body parser failures', () => {
    expect(toPlainTextError(new BadRequestException('Unexpected end of JSON input'))).toEqual({
      status: 400,
      message: 'Invalid JSON: Unexpected end of JSON input',
    });
  });

  it('maps method errors to 405', () => {
    expect(toPlainTextError(new MethodError())).toEqual({
      status: 405,
      message: 'Method not allowed',
    });
  });

  it('maps model failures to 500 with the provider description', () => {
    expect(toPlainTextError(new ModelInvocationError('Gemini request failed: quota'))).toEqual({
      status: 500,
      message: 'Gemini request failed: quota',
    });
  });

  it('passes other HTTP exceptions through', () => {
    expect(toPlainTextError(new NotFoundException('Cannot GET /nowhere'))).toEqual({
      status: 404,
      message: 'Cannot GET /nowhere',
    });
  });

  it('keeps the status of body parser client errors', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), {
      status: 413,
      statusCode: 413,
    });
    const badCharset = Object.assign(new Error('unsupported charset "KOI8-R"'), {
      statusCode: 415,
    });

    expect(toPlainTextError(tooLarge)).toEqual({ status: 413, message: 'request entity too large' });
    expect(toPlainTextError(badCharset)).toEqual({
      status: 415,
      message: 'unsupported charset "KOI8-R"',
    });
  });

  it('does not trust a 5xx or non-numeric status on a plain error', () => {
    const upstream = Object.assign(new Error('bad gateway'), { status: 502 });
    const odd = Object.assign(new Error('odd'), { status: '404' });

    expect(toPlainTextError(upstream)).toEqual({ status: 500, message: 'bad gateway' });
    expect(toPlainTextError(odd)).toEqual({ status: 500, message: 'odd' });
  });

  it('treats unknown errors as 500', () => {
    expect(toPlainTextError(new Error('boom'))).toEqual({ status: 500, message: 'boom' });
    expect(toPlainTextError('bare string')).toEqual({ status: 500, message: 'bare string' });
  });
});
