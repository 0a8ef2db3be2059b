import { HttpStatus } from "@nestjs/common";
import { OracleErrorKind } from "../oracle/oracle.types";

/**
 * Body of an HttpException raised by the API layer, before the exception filter
 * wraps it into the error envelope
 */
export interface ApiErrorResponse {
  error: string;
  code: ApiErrorCodes;
  message: string;
  timestamp: number;
  requestId: string;
  details?: Record<string, unknown>;
}

export enum ApiErrorCodes {
  // Client errors (4xxx)
  INVALID_REQUEST = 4000,
  UNSUPPORTED_ASSET = 4001,
  CALLER_NOT_AUTHORIZED = 4031,
  ASSET_NOT_FOUND = 4041,
  VOLUME_BELOW_MINIMUM = 4221,
  PRICE_DEVIATION_TOO_HIGH = 4222,
  PRICE_STALE = 4223,
  RATE_LIMIT_EXCEEDED = 4291,

  // Server errors (5xxx)
  INTERNAL_ERROR = 5001,
  TIME_SOURCE_UNAVAILABLE = 5031,
  INSUFFICIENT_SOURCES = 5032,
  AGGREGATION_WEIGHT_INVALID = 5041,
}

export interface OracleErrorMapping {
  status: HttpStatus;
  code: ApiErrorCodes;
  message: string;
}

export const ORACLE_ERROR_MAPPINGS: Record<OracleErrorKind, OracleErrorMapping> = {
  [OracleErrorKind.NotAuthorized]: {
    status: HttpStatus.FORBIDDEN,
    code: ApiErrorCodes.CALLER_NOT_AUTHORIZED,
    message: "Caller is not authorized for this operation",
  },
  [OracleErrorKind.InvalidChain]: {
    status: HttpStatus.BAD_REQUEST,
    code: ApiErrorCodes.UNSUPPORTED_ASSET,
    message: "Asset is not supported",
  },
  [OracleErrorKind.BelowMinVolume]: {
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    code: ApiErrorCodes.VOLUME_BELOW_MINIMUM,
    message: "Reported volume is below the minimum threshold",
  },
  [OracleErrorKind.HighDeviation]: {
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    code: ApiErrorCodes.PRICE_DEVIATION_TOO_HIGH,
    message: "Price deviates too far from the last accepted price",
  },
  [OracleErrorKind.StalePrice]: {
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    code: ApiErrorCodes.PRICE_STALE,
    message: "Price is stale",
  },
  [OracleErrorKind.InvalidPrice]: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    code: ApiErrorCodes.TIME_SOURCE_UNAVAILABLE,
    message: "Current time is unavailable",
  },
  [OracleErrorKind.InsufficientSources]: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    code: ApiErrorCodes.INSUFFICIENT_SOURCES,
    message: "Not enough valid sources to aggregate a price",
  },
  [OracleErrorKind.InvalidWeight]: {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    code: ApiErrorCodes.AGGREGATION_WEIGHT_INVALID,
    message: "Total weight of valid sources is zero",
  },
};
