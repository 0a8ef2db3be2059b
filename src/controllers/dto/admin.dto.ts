import { ApiProperty } from "@nestjs/swagger";
import { IsBoolean, IsInt, IsNotEmpty, IsString, Matches, MaxLength, Min } from "class-validator";
import type { OracleParameters } from "@/common/types/oracle";
import { DIGITS_PATTERN } from "./price.dto";

const IDENTITY_MAX_LENGTH = 128;

export class SetProviderDto {
  @ApiProperty({ example: "reporter-a" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(IDENTITY_MAX_LENGTH)
  reporterId!: string;

  @ApiProperty({ example: true })
  @IsBoolean()
  authorized!: boolean;
}

export class ProviderStatusDto {
  @ApiProperty({ example: "reporter-a" })
  reporterId!: string;

  @ApiProperty({ example: true })
  authorized!: boolean;
}

export class TransferAdministrationDto {
  @ApiProperty({ example: "ops-admin" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(IDENTITY_MAX_LENGTH)
  administrator!: string;
}

export class AdministratorDto {
  @ApiProperty({ example: "ops-admin" })
  administrator!: string;
}

/**
 * The five oracle parameters. bigint fields travel as digit strings.
 */
export class OracleParametersDto {
  @ApiProperty({ description: "Seconds an entry stays eligible", example: 300 })
  @IsInt()
  @Min(0)
  validityPeriod!: number;

  @ApiProperty({ example: "1000" })
  @IsString()
  @Matches(DIGITS_PATTERN, { message: "maxPriceDeviation must be a non-negative integer in decimal digits" })
  maxPriceDeviation!: string;

  @ApiProperty({ example: 3 })
  @IsInt()
  @Min(0)
  minRequiredSources!: number;

  @ApiProperty({ example: "10000" })
  @IsString()
  @Matches(DIGITS_PATTERN, { message: "minVolumeThreshold must be a non-negative integer in decimal digits" })
  minVolumeThreshold!: string;

  @ApiProperty({ description: "Basis points", example: "100" })
  @IsString()
  @Matches(DIGITS_PATTERN, { message: "slippageTolerance must be a non-negative integer in decimal digits" })
  slippageTolerance!: string;

  static from(parameters: OracleParameters): OracleParametersDto {
    return Object.assign(new OracleParametersDto(), {
      validityPeriod: parameters.validityPeriod,
      maxPriceDeviation: parameters.maxPriceDeviation.toString(),
      minRequiredSources: parameters.minRequiredSources,
      minVolumeThreshold: parameters.minVolumeThreshold.toString(),
      slippageTolerance: parameters.slippageTolerance.toString(),
    });
  }

  toParameters(): OracleParameters {
    return {
      validityPeriod: this.validityPeriod,
      maxPriceDeviation: BigInt(this.maxPriceDeviation),
      minRequiredSources: this.minRequiredSources,
      minVolumeThreshold: BigInt(this.minVolumeThreshold),
      slippageTolerance: BigInt(this.slippageTolerance),
    };
  }
}
