import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from "@nestjs/common";
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { CallerIdentity } from "@/common/decorators/caller-identity.decorator";
import { ErrorResponseBuilder } from "@/common/errors/error-response.builder";
import { toError } from "@/common/types/services/mixins";
import type { OracleParameters, OracleResult } from "@/common/types/oracle";
import { RateLimitGuard } from "@/common/rate-limiting/rate-limit.guard";
import type { ApiResponse as ApiEnvelope } from "@/common/types/http";
import { OracleService } from "@/oracle/oracle.service";
import {
  AdministratorDto,
  OracleParametersDto,
  ProviderStatusDto,
  SetProviderDto,
  TransferAdministrationDto,
} from "./dto/admin.dto";
import { HttpErrorResponseDto } from "./dto/common-error.dto";

/**
 * Administrator operations. Writes require the caller to be the current administrator.
 */
@ApiTags("Administration")
@ApiHeader({ name: "X-Oracle-Caller", description: "Authenticated caller identity", required: false })
@Controller("admin")
@UseGuards(RateLimitGuard)
export class AdminController extends BaseController {
  constructor(private readonly oracle: OracleService) {
    super();
  }

  @Post("providers")
  @HttpCode(200)
  @ApiOperation({ summary: "Grant or revoke a reporter's authorization" })
  @ApiResponse({ status: 200, type: ProviderStatusDto })
  @ApiResponse({ status: 403, description: "Caller is not the administrator", type: HttpErrorResponseDto })
  setAuthorizedProvider(
    @Body() body: SetProviderDto,
    @CallerIdentity() caller: string | undefined
  ): ApiEnvelope<ProviderStatusDto> {
    return this.handleControllerOperation(
      requestId => {
        this.unwrapResult(this.oracle.setAuthorizedProvider(caller, body.reporterId, body.authorized), requestId);
        return Object.assign(new ProviderStatusDto(), { reporterId: body.reporterId, authorized: body.authorized });
      },
      "setAuthorizedProvider",
      "POST",
      "/admin/providers",
      { body }
    );
  }

  @Get("providers/:reporterId")
  @ApiOperation({ summary: "Whether a reporter is authorized" })
  @ApiResponse({ status: 200, type: ProviderStatusDto })
  getProvider(@Param("reporterId") reporterId: string): ApiEnvelope<ProviderStatusDto> {
    return this.handleControllerOperation(
      () =>
        Object.assign(new ProviderStatusDto(), {
          reporterId,
          authorized: this.oracle.isAuthorizedProvider(reporterId),
        }),
      "getProvider",
      "GET",
      `/admin/providers/${reporterId}`
    );
  }

  @Post("configuration")
  @HttpCode(200)
  @ApiOperation({ summary: "Replace all oracle parameters at once" })
  @ApiResponse({ status: 200, type: OracleParametersDto })
  @ApiResponse({ status: 400, description: "Invalid parameter values", type: HttpErrorResponseDto })
  @ApiResponse({ status: 403, description: "Caller is not the administrator", type: HttpErrorResponseDto })
  setConfiguration(
    @Body() body: OracleParametersDto,
    @CallerIdentity() caller: string | undefined
  ): ApiEnvelope<OracleParametersDto> {
    return this.handleControllerOperation(
      requestId => {
        const parameters = this.unwrapResult(this.applyConfiguration(caller, body, requestId), requestId);
        return OracleParametersDto.from(parameters);
      },
      "setConfiguration",
      "POST",
      "/admin/configuration",
      { body }
    );
  }

  /**
   * The store rejects values the DTO cannot rule out, such as integers past the safe range
   */
  private applyConfiguration(
    caller: string | undefined,
    body: OracleParametersDto,
    requestId: string
  ): OracleResult<OracleParameters> {
    try {
      return this.oracle.setConfiguration(caller, body.toParameters());
    } catch (error) {
      throw ErrorResponseBuilder.createValidationError(toError(error).message, requestId);
    }
  }

  @Get("configuration")
  @ApiOperation({ summary: "Current oracle parameters" })
  @ApiResponse({ status: 200, type: OracleParametersDto })
  getConfiguration(): ApiEnvelope<OracleParametersDto> {
    return this.handleControllerOperation(
      () => OracleParametersDto.from(this.oracle.getConfiguration()),
      "getConfiguration",
      "GET",
      "/admin/configuration"
    );
  }

  @Post("administrator")
  @HttpCode(200)
  @ApiOperation({ summary: "Hand the administrator role to another identity" })
  @ApiResponse({ status: 200, type: AdministratorDto })
  @ApiResponse({ status: 403, description: "Caller is not the administrator", type: HttpErrorResponseDto })
  transferAdministration(
    @Body() body: TransferAdministrationDto,
    @CallerIdentity() caller: string | undefined
  ): ApiEnvelope<AdministratorDto> {
    return this.handleControllerOperation(
      requestId => {
        const administrator = this.unwrapResult(
          this.oracle.transferAdministration(caller, body.administrator),
          requestId
        );
        return Object.assign(new AdministratorDto(), { administrator });
      },
      "transferAdministration",
      "POST",
      "/admin/administrator",
      { body }
    );
  }

  @Get("administrator")
  @ApiOperation({ summary: "Current administrator identity" })
  @ApiResponse({ status: 200, type: AdministratorDto })
  getAdministrator(): ApiEnvelope<AdministratorDto> {
    return this.handleControllerOperation(
      () => Object.assign(new AdministratorDto(), { administrator: this.oracle.getAdministrator() }),
      "getAdministrator",
      "GET",
      "/admin/administrator"
    );
  }
}
