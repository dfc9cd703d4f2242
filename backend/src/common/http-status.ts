import { HttpStatus } from '@nestjs/common';
import type { RagError } from './rag.errors.js';

export function httpStatusFor(
  error: Pick<RagError, 'code' | 'kind'>,
): HttpStatus {
  switch (error.kind) {
    case 'input':
      return error.code === 'PARSER_UNSUPPORTED_FORMAT'
        ? HttpStatus.UNSUPPORTED_MEDIA_TYPE
        : HttpStatus.UNPROCESSABLE_ENTITY;
    case 'resource_exhausted':
      return HttpStatus.PAYLOAD_TOO_LARGE;
    case 'backend_unavailable':
      return HttpStatus.SERVICE_UNAVAILABLE;
    case 'timeout':
      return HttpStatus.GATEWAY_TIMEOUT;
    case 'cancelled':
      return HttpStatus.REQUEST_TIMEOUT;
    case 'internal':
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}
