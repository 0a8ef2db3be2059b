import { ApiProperty } from "@nestjs/swagger";
import { ErrorSeverity } from "@/common/types/error-handling";

export class ErrorDetailsDto {
  @ApiProperty({
    description: "Error name; for oracle failures the name of the API error code",
    example: "PRICE_DEVIATION_TOO_HIGH",
  })
  code!: string;

  @ApiProperty({
    description: "Human-readable error message",
    example: "Price deviates too far from the last accepted price",
  })
  message!: string;

  @ApiProperty({ description: "Error severity level", enum: ErrorSeverity, example: ErrorSeverity.MEDIUM })
  severity!: ErrorSeverity;

  @ApiProperty({ description: "Component where the error occurred", example: "HttpFilter", required: false })
  module?: string;

  @ApiProperty({ description: "Error timestamp in milliseconds", example: 1703123456789, required: false })
  timestamp?: number;

  @ApiProperty({
    description: "Classification, HTTP status, numeric API code and the oracle error kind where one applies",
    additionalProperties: true,
    required: false,
    example: { classification: "VALIDATION_ERROR", httpStatus: 422, apiCode: 4222, details: { kind: "HighDeviation" } },
  })
  context?: Record<string, unknown>;
}

/**
 * Envelope of every non-2xx response
 */
export class HttpErrorResponseDto {
  @ApiProperty({ description: "Always false for errors", example: false })
  success!: false;

  @ApiProperty({ type: ErrorDetailsDto })
  error!: ErrorDetailsDto;

  @ApiProperty({ description: "Response timestamp in milliseconds", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Request ID for tracing", required: false })
  requestId?: string;

  @ApiProperty({ description: "Whether repeating the request may succeed", example: false })
  retryable!: boolean;

  @ApiProperty({ description: "Suggested wait before retrying, in milliseconds", required: false, example: 30000 })
  retryAfter?: number;
}
