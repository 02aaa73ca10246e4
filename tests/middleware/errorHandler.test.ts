/**
 * 에러 핸들러 미들웨어 테스트
 */

import { describe, it, expect, jest } from "@jest/globals";
import {
  errorHandler,
  notFoundHandler,
  toErrorBody,
  toHttpStatus,
} from "@/middleware/errorHandler";
import {
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from "@/core/errors/ProductError";
import { MockResponse, mockRequest } from "../helpers/mockHttp";

function bodyParseError(): SyntaxError {
  return Object.assign(new SyntaxError("Unexpected token } in JSON"), {
    type: "entity.parse.failed",
  });
}

function httpError(message: string, status: number, expose: boolean): Error {
  return Object.assign(new Error(message), { status, statusCode: status, expose });
}

describe("toHttpStatus", () => {
  it.each([
    ["ValidationError", new ValidationError("name", "is required"), 400],
    ["NotFoundError", new NotFoundError(3), 404],
    ["StorageUnavailableError", new StorageUnavailableError("findById", "timeout"), 503],
    ["본문 파싱 실패", bodyParseError(), 400],
    ["본문 크기 초과", httpError("request entity too large", 413, true), 413],
    ["지원하지 않는 인코딩", httpError("unsupported charset \"LATIN1\"", 415, true), 415],
    ["노출 불가 에러", httpError("stream not readable", 500, false), 500],
    ["일반 Error", new Error("boom"), 500],
    ["문자열", "boom", 500],
  ])("%s → %p", (_label, error, status) => {
    expect(toHttpStatus(error)).toBe(status);
  });
});

describe("toErrorBody", () => {
  it("저장소 장애 상세는 응답에 노출하지 않음", () => {
    const error = new StorageUnavailableError("insert", "connect ECONNREFUSED 10.0.0.1:5432");

    expect(toErrorBody(error)).toEqual({
      success: false,
      error: { code: "STORAGE_UNAVAILABLE", message: "storage unavailable" },
    });
  });

  it("본문 파싱 실패는 VALIDATION_ERROR(body)", () => {
    expect(toErrorBody(bodyParseError())).toEqual({
      success: false,
      error: {
        code: "VALIDATION_ERROR",
        message: "body: malformed JSON",
        field: "body",
      },
    });
  });

  it("노출 가능한 4xx 에러는 메시지 그대로 BAD_REQUEST", () => {
    expect(toErrorBody(httpError("request entity too large", 413, true))).toEqual({
      success: false,
      error: { code: "BAD_REQUEST", message: "request entity too large" },
    });
  });

  it("알 수 없는 에러는 INTERNAL_ERROR", () => {
    expect(toErrorBody(new TypeError("x is undefined"))).toEqual({
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});

describe("errorHandler", () => {
  it("상태 코드와 본문 전송", () => {
    const res = new MockResponse();
    const next = jest.fn<(err?: unknown) => void>();

    errorHandler(
      new StorageUnavailableError("queryByCategory", "timeout"),
      mockRequest({ path: "/api/v1/products" }),
      res.asResponse(),
      next,
    );

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      success: false,
      error: { code: "STORAGE_UNAVAILABLE", message: "storage unavailable" },
    });
    expect(next).not.toHaveBeenCalled();
  });

  it("본문 크기 초과는 413", () => {
    const res = new MockResponse();

    errorHandler(
      httpError("request entity too large", 413, true),
      mockRequest({ method: "POST", path: "/api/v1/products" }),
      res.asResponse(),
      jest.fn<(err?: unknown) => void>(),
    );

    expect(res.statusCode).toBe(413);
  });

  it("이미 응답을 보냈으면 next로 위임", () => {
    const res = new MockResponse();
    res.headersSent = true;
    const next = jest.fn<(err?: unknown) => void>();
    const error = new Error("late failure");

    errorHandler(error, mockRequest(), res.asResponse(), next);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.body).toBeUndefined();
  });
});

describe("notFoundHandler", () => {
  it("404 + ROUTE_NOT_FOUND", () => {
    const res = new MockResponse();

    notFoundHandler(mockRequest({ method: "PATCH", path: "/api/v1/products/1" }), res.asResponse());

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: {
        code: "ROUTE_NOT_FOUND",
        message: "Cannot PATCH /api/v1/products/1",
      },
    });
  });
});
