import { Test, TestingModule } from "@nestjs/testing";
import { CallHandler, ExecutionContext, HttpException, HttpStatus } from "@nestjs/common";
import { lastValueFrom, of, throwError } from "rxjs";
import { ResponseTimeInterceptor } from "../response-time.interceptor";

describe("ResponseTimeInterceptor", () => {
  let interceptor: ResponseTimeInterceptor;
  let setHeader: jest.Mock;
  let context: ExecutionContext;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ResponseTimeInterceptor],
    }).compile();

    interceptor = module.get(ResponseTimeInterceptor);
    setHeader = jest.fn();

    const request = {
      method: "GET",
      url: "/prices/BTC/weighted",
      headers: { "user-agent": "jest", "x-oracle-caller": "reporter-1" },
    };
    const response = { statusCode: 200, setHeader };
    context = {
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => response,
      }),
    } as unknown as ExecutionContext;
  });

  it("should set X-Response-Time and count completed requests", async () => {
    const handler: CallHandler = { handle: () => of({ price: "1" }) };

    const result = await lastValueFrom(interceptor.intercept(context, handler));

    expect(result).toEqual({ price: "1" });
    expect(setHeader).toHaveBeenCalledWith("X-Response-Time", expect.stringMatching(/^\d+ms$/));
    expect(interceptor.getCounters()).toEqual({ requests_completed: 1 });
    expect(interceptor.getMetrics()).toHaveProperty("response_time_ms");
  });

  it("should count failed requests and rethrow the error", async () => {
    const error = new HttpException("nope", HttpStatus.FORBIDDEN);
    const handler: CallHandler = { handle: () => throwError(() => error) };

    await expect(lastValueFrom(interceptor.intercept(context, handler))).rejects.toBe(error);
    expect(setHeader).toHaveBeenCalledWith("X-Response-Time", expect.stringMatching(/^\d+ms$/));
    expect(interceptor.getCounters()).toEqual({ requests_failed: 1 });
  });
});
