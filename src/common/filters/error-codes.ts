import { HttpStatus } from '@nestjs/common';

export enum ErrorCodes {
  // 외부 API
  API_CALL_FAILED = 'API_CALL_FAILED',
  RAWG_API_ERROR = 'RAWG_API_ERROR',
  STEAM_API_ERROR = 'STEAM_API_ERROR',

  // 데이터
  DATA_NOT_FOUND = 'DATA_NOT_FOUND',

  // 일반
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export function errorCodeFromStatus(status: number): ErrorCodes {
  switch (status) {
    case HttpStatus.BAD_REQUEST:
    case HttpStatus.UNPROCESSABLE_ENTITY:
      return ErrorCodes.VALIDATION_ERROR;
    case HttpStatus.NOT_FOUND:
      return ErrorCodes.DATA_NOT_FOUND;
    case HttpStatus.REQUEST_TIMEOUT:
    case HttpStatus.GATEWAY_TIMEOUT:
      return ErrorCodes.TIMEOUT_ERROR;
    case HttpStatus.BAD_GATEWAY:
    case HttpStatus.SERVICE_UNAVAILABLE:
      return ErrorCodes.API_CALL_FAILED;
    default:
      return ErrorCodes.INTERNAL_SERVER_ERROR;
  }
}
