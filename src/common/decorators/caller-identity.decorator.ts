import { createParamDecorator, type ExecutionContext } from "@nestjs/common";
import type { Request } from "express";
import { ClientIdentificationUtils } from "../utils/client-identification.utils";

/**
 * Identity forwarded by the authenticating gateway in X-Oracle-Caller, or undefined
 */
export const CallerIdentity = createParamDecorator((_data: unknown, context: ExecutionContext): string | undefined => {
  const request = context.switchToHttp().getRequest<Request>();
  return ClientIdentificationUtils.extractCaller(request);
});
