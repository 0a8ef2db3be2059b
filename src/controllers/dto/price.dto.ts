import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsOptional, IsString, Matches, MaxLength } from "class-validator";
import type { AggregationBreakdown, FeedEntry, PriceHistory } from "@/common/types/oracle";

/** Unsigned integer in decimal digits */
export const DIGITS_PATTERN = /^\d+$/;
/** Even-length hex, with or without 0x */
export const HEX_PATTERN = /^(0x)?([0-9a-fA-F]{2})*$/;

const AMOUNT_MAX_LENGTH = 78;

export class SubmitPriceDto {
  @ApiProperty({ description: "Price in 6-decimal fixed point (USD)", example: "50000000000" })
  @IsString()
  @MaxLength(AMOUNT_MAX_LENGTH)
  @Matches(DIGITS_PATTERN, { message: "price must be a non-negative integer in decimal digits" })
  price!: string;

  @ApiProperty({ description: "Traded volume backing the observation", example: "25000" })
  @IsString()
  @MaxLength(AMOUNT_MAX_LENGTH)
  @Matches(DIGITS_PATTERN, { message: "volume must be a non-negative integer in decimal digits" })
  volume!: string;

  @ApiPropertyOptional({ description: "Cross-source proof, hex encoded", example: "0xdeadbeef" })
  @IsOptional()
  @IsString()
  @MaxLength(16_384)
  @Matches(HEX_PATTERN, { message: "proof must be an even-length hex string" })
  proof?: string;
}

export class SlippageCheckDto {
  @ApiProperty({ example: "50100000000" })
  @IsString()
  @MaxLength(AMOUNT_MAX_LENGTH)
  @Matches(DIGITS_PATTERN, { message: "price must be a non-negative integer in decimal digits" })
  price!: string;

  @ApiProperty({ example: "50000000000" })
  @IsString()
  @MaxLength(AMOUNT_MAX_LENGTH)
  @Matches(DIGITS_PATTERN, { message: "expectedPrice must be a non-negative integer in decimal digits" })
  expectedPrice!: string;
}

export function hexToBytes(hex: string): Uint8Array {
  return Uint8Array.from(Buffer.from(hex.replace(/^0x/, ""), "hex"));
}

export class FeedEntryViewDto {
  @ApiProperty({ example: "BTC" })
  assetId!: string;

  @ApiProperty({ example: "reporter-a" })
  reporterId!: string;

  @ApiProperty({ example: "50000000000" })
  price!: string;

  @ApiProperty({ description: "Seconds since epoch", example: 1700000000 })
  timestamp!: number;

  @ApiProperty({ example: "25000" })
  volume!: string;

  @ApiProperty({ minimum: 0, maximum: 100, example: 50 })
  weight!: number;

  @ApiProperty({ example: true })
  verified!: boolean;

  static from(entry: FeedEntry): FeedEntryViewDto {
    return Object.assign(new FeedEntryViewDto(), {
      ...entry,
      price: entry.price.toString(),
      volume: entry.volume.toString(),
    });
  }
}

export class ExcludedSourceDto {
  @ApiProperty({ example: "reporter-c" })
  reporterId!: string;

  @ApiProperty({ enum: ["stale", "unverified", "low_volume"] })
  reason!: string;
}

export class WeightedPriceViewDto {
  @ApiProperty({ example: "BTC" })
  assetId!: string;

  @ApiProperty({ example: "50050000000" })
  price!: string;

  @ApiProperty({ example: "100" })
  totalWeight!: string;

  @ApiProperty({ example: 1700000000 })
  evaluatedAt!: number;

  @ApiProperty({ type: [String] })
  contributors!: string[];

  @ApiProperty({ type: [ExcludedSourceDto] })
  excluded!: ExcludedSourceDto[];

  static from(breakdown: AggregationBreakdown): WeightedPriceViewDto {
    return Object.assign(new WeightedPriceViewDto(), {
      ...breakdown,
      price: breakdown.price.toString(),
      totalWeight: breakdown.totalWeight.toString(),
      excluded: breakdown.excluded.map(source => ({ ...source })),
    });
  }
}

export class NormalizedPriceViewDto {
  @ApiProperty({ example: "BTC" })
  assetId!: string;

  @ApiProperty({ example: "50050000000" })
  price!: string;
}

export class PriceHistoryViewDto {
  @ApiProperty({ example: "BTC" })
  assetId!: string;

  @ApiProperty({ example: "50100000000" })
  lastPrice!: string;

  @ApiProperty({ example: 1700000000 })
  lastUpdate!: number;

  @ApiProperty({ example: "500000000" })
  volatilityIndex!: string;

  static from(assetId: string, history: PriceHistory): PriceHistoryViewDto {
    return Object.assign(new PriceHistoryViewDto(), {
      assetId,
      lastPrice: history.lastPrice.toString(),
      lastUpdate: history.lastUpdate,
      volatilityIndex: history.volatilityIndex.toString(),
    });
  }
}

export class SlippageResultDto {
  @ApiProperty({ example: true })
  withinSlippage!: boolean;
}
