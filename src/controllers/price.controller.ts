import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from "@nestjs/common";
import { ApiHeader, ApiOperation, ApiParam, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { CallerIdentity } from "@/common/decorators/caller-identity.decorator";
import { RateLimitGuard } from "@/common/rate-limiting/rate-limit.guard";
import type { ApiResponse as ApiEnvelope } from "@/common/types/http";
import { OracleService } from "@/oracle/oracle.service";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import {
  FeedEntryViewDto,
  hexToBytes,
  NormalizedPriceViewDto,
  PriceHistoryViewDto,
  SlippageCheckDto,
  SlippageResultDto,
  SubmitPriceDto,
  WeightedPriceViewDto,
} from "./dto/price.dto";

@ApiTags("Prices")
@Controller()
@UseGuards(RateLimitGuard)
export class PriceController extends BaseController {
  constructor(private readonly oracle: OracleService) {
    super();
  }

  @Post("prices/:assetId")
  @HttpCode(200)
  @ApiOperation({
    summary: "Submit a price observation",
    description: "Authorized reporters only. Replaces the reporter's previous entry for the asset.",
  })
  @ApiHeader({ name: "X-Oracle-Caller", description: "Authenticated reporter identity", required: true })
  @ApiParam({ name: "assetId", example: "BTC" })
  @ApiResponse({ status: 200, description: "Observation accepted", type: FeedEntryViewDto })
  @ApiResponse({ status: 403, description: "Caller is not an authorized reporter", type: HttpErrorResponseDto })
  @ApiResponse({ status: 422, description: "Volume or deviation rule failed", type: HttpErrorResponseDto })
  submitPrice(
    @Param("assetId") assetId: string,
    @Body() body: SubmitPriceDto,
    @CallerIdentity() caller: string | undefined
  ): ApiEnvelope<FeedEntryViewDto> {
    return this.handleControllerOperation(
      requestId => {
        const proof = body.proof === undefined ? undefined : hexToBytes(body.proof);
        const result = this.oracle.submitPrice(caller, assetId, BigInt(body.price), BigInt(body.volume), proof);
        return FeedEntryViewDto.from(this.unwrapResult(result, requestId, { assetId }));
      },
      "submitPrice",
      "POST",
      `/prices/${assetId}`,
      { body }
    );
  }

  @Get("prices/:assetId/weighted")
  @ApiOperation({
    summary: "Weighted price",
    description: "Weight-weighted mean of the fresh, verified, sufficiently traded entries",
  })
  @ApiParam({ name: "assetId", example: "BTC" })
  @ApiResponse({ status: 200, type: WeightedPriceViewDto })
  @ApiResponse({ status: 503, description: "Not enough eligible sources", type: HttpErrorResponseDto })
  getWeightedPrice(@Param("assetId") assetId: string): ApiEnvelope<WeightedPriceViewDto> {
    return this.handleControllerOperation(
      requestId => WeightedPriceViewDto.from(this.unwrapResult(this.oracle.getAggregation(assetId), requestId)),
      "getWeightedPrice",
      "GET",
      `/prices/${assetId}/weighted`
    );
  }

  @Get("prices/:assetId/normalized")
  @ApiOperation({ summary: "Volatility-normalized price" })
  @ApiParam({ name: "assetId", example: "BTC" })
  @ApiResponse({ status: 200, type: NormalizedPriceViewDto })
  @ApiResponse({ status: 503, description: "Not enough eligible sources", type: HttpErrorResponseDto })
  getNormalizedPrice(@Param("assetId") assetId: string): ApiEnvelope<NormalizedPriceViewDto> {
    return this.handleControllerOperation(
      requestId => {
        const price = this.unwrapResult(this.oracle.getNormalizedPrice(assetId), requestId);
        return Object.assign(new NormalizedPriceViewDto(), { assetId, price: price.toString() });
      },
      "getNormalizedPrice",
      "GET",
      `/prices/${assetId}/normalized`
    );
  }

  @Get("prices/:assetId/history")
  @ApiOperation({ summary: "Last accepted price and volatility index" })
  @ApiParam({ name: "assetId", example: "BTC" })
  @ApiResponse({ status: 200, type: PriceHistoryViewDto })
  getPriceHistory(@Param("assetId") assetId: string): ApiEnvelope<PriceHistoryViewDto> {
    return this.handleControllerOperation(
      requestId => {
        const history = this.unwrapResult(this.oracle.getPriceHistory(assetId), requestId);
        return PriceHistoryViewDto.from(assetId, history);
      },
      "getPriceHistory",
      "GET",
      `/prices/${assetId}/history`
    );
  }

  @Get("prices/:assetId/entries")
  @ApiOperation({ summary: "Current feed entries", description: "Operator view of the raw per-reporter entries" })
  @ApiParam({ name: "assetId", example: "BTC" })
  @ApiResponse({ status: 200, type: [FeedEntryViewDto] })
  getFeedEntries(@Param("assetId") assetId: string): ApiEnvelope<FeedEntryViewDto[]> {
    return this.handleControllerOperation(
      requestId => this.unwrapResult(this.oracle.getFeedEntries(assetId), requestId).map(FeedEntryViewDto.from),
      "getFeedEntries",
      "GET",
      `/prices/${assetId}/entries`
    );
  }

  @Post("slippage/check")
  @HttpCode(200)
  @ApiOperation({ summary: "Check a price against the slippage band around an expected price" })
  @ApiResponse({ status: 200, type: SlippageResultDto })
  checkSlippage(@Body() body: SlippageCheckDto): ApiEnvelope<SlippageResultDto> {
    return this.handleControllerOperation(
      () =>
        Object.assign(new SlippageResultDto(), {
          withinSlippage: this.oracle.withinSlippage(BigInt(body.price), BigInt(body.expectedPrice)),
        }),
      "checkSlippage",
      "POST",
      "/slippage/check",
      { body }
    );
  }
}
