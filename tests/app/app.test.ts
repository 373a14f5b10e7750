/**
 * Express アプリケーションの結線テスト
 *
 * ループバックで一時的に listen し、ミドルウェアの順序と変換結果を確認する
 */

import { Server } from "http";
import { z } from "zod";
import { createApp, isOriginAllowed, toErrorResponse } from "../../src/app";
import { loadEnvConfig } from "../../src/config";
import { AppError, EmptyBatchError, ErrorCode } from "../../src/errors";
import { SAMPLE_RECORDS } from "../helpers/placement-fixtures";

describe("isOriginAllowed", () => {
  it("ローカル開発・追加オリジン・オリジンなしは許可", () => {
    expect(isOriginAllowed("http://localhost:3000", [])).toBe(true);
    expect(isOriginAllowed("https://dashboard.example", ["https://dashboard.example"])).toBe(true);
    expect(isOriginAllowed(undefined, [])).toBe(true);
  });

  it("それ以外は拒否", () => {
    expect(isOriginAllowed("https://other.example", ["https://dashboard.example"])).toBe(false);
  });
});

describe("toErrorResponse", () => {
  it("JSONパースエラーは 400", () => {
    const response = toErrorResponse(new SyntaxError("Unexpected token"), "production", "trace-1");

    expect(response.statusCode).toBe(400);
    expect(response.error?.details).toEqual({
      errors: [{ field: "body", message: "Malformed JSON body" }],
    });
    expect(response.meta?.requestId).toBe("trace-1");
  });

  it("AppError はそのステータスを使う", () => {
    expect(toErrorResponse(new EmptyBatchError(), "production").statusCode).toBe(422);
  });

  it("本番では一般エラーのメッセージを隠す", () => {
    expect(toErrorResponse(new Error("db password leaked"), "production").error?.message).toBe(
      "An error occurred"
    );
    expect(toErrorResponse(new Error("boom"), "development").error?.message).toBe("boom");
  });
});

const AnalysisBodySchema = z.object({
  data: z.object({ verdicts: z.array(z.unknown()) }),
});

describe("createApp", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);

    const app = createApp(
      loadEnvConfig({ API_KEY: "test-secret", CORS_ALLOWED_ORIGINS: "https://dashboard.example" })
    );
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server address is not available");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    jest.restoreAllMocks();
  });

  function postAnalysis(body: string, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}/analysis`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body,
    });
  }

  it("GET /health は認証なしで 200", async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: "healthy" });
  });

  it("POST /analysis はキーがなければ 401", async () => {
    const response = await postAnalysis(JSON.stringify({ placements: SAMPLE_RECORDS }));
    const body: unknown = await response.json();

    expect(response.status).toBe(401);
    expect(body).toMatchObject({ error: { code: ErrorCode.UNAUTHORIZED } });
  });

  it("POST /analysis は正しいキーで 200", async () => {
    const response = await postAnalysis(JSON.stringify({ placements: SAMPLE_RECORDS }), {
      "X-API-Key": "test-secret",
    });
    const body = AnalysisBodySchema.parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.data.verdicts).toHaveLength(3);
  });

  it("壊れたJSONは 400", async () => {
    const response = await postAnalysis("{\"placements\": [", { "X-API-Key": "test-secret" });
    const body: unknown = await response.json();

    expect(response.status).toBe(400);
    expect(body).toMatchObject({
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        details: { errors: [{ field: "body", message: "Malformed JSON body" }] },
      },
    });
  });

  it("許可されていないオリジンは 403", async () => {
    const response = await fetch(`${baseUrl}/health`, {
      headers: { Origin: "https://other.example" },
    });
    const body: unknown = await response.json();

    expect(response.status).toBe(403);
    expect(body).toMatchObject({ error: { code: ErrorCode.FORBIDDEN } });
  });

  it("追加オリジンは CORS ヘッダー付きで許可", async () => {
    const response = await fetch(`${baseUrl}/health`, {
      headers: { Origin: "https://dashboard.example" },
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-origin")).toBe("https://dashboard.example");
  });

  it("AppError を投げた CORS 拒否も統一形式", () => {
    const error = new AppError({ code: ErrorCode.FORBIDDEN, message: "Not allowed by CORS", statusCode: 403 });
    expect(toErrorResponse(error, "production").error?.message).toBe("Not allowed by CORS");
  });
});
