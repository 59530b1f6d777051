import { ValidationError } from "unfurl-shared";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3001,
      LOG_LEVEL: "info",
      DEFAULT_MODEL: "gpt-3.5-turbo",
      REQUEST_BODY_LIMIT: "10mb",
      RATE_LIMIT_WINDOW_MS: 900000,
      RATE_LIMIT_MAX: 100,
    });
  });

  it("should coerce and keep provided values", () => {
    const config = loadConfig({
      PORT: "8080",
      LOG_LEVEL: "debug",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:9999/v1",
      DEFAULT_MODEL: "gpt-4",
      RATE_LIMIT_WINDOW_MS: "60000",
      RATE_LIMIT_MAX: "0",
    });

    expect(config).toMatchObject({
      PORT: 8080,
      LOG_LEVEL: "debug",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:9999/v1",
      DEFAULT_MODEL: "gpt-4",
      RATE_LIMIT_WINDOW_MS: 60000,
      RATE_LIMIT_MAX: 0,
    });
  });

  it("should treat blank strings as unset", () => {
    expect(loadConfig({ OPENAI_API_KEY: "  " }).OPENAI_API_KEY).toBeUndefined();
  });

  it("should name invalid variables", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ValidationError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
