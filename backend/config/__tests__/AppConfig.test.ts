import { parseAppConfig } from "../AppConfig";

describe("parseAppConfig", () => {
  it("applies defaults", () => {
    const config = parseAppConfig({});

    expect(config.port).toBe(3001);
    expect(config.ai.model).toBe("gemini-2.5-flash");
    expect(config.ai.project).toBeUndefined();
    expect(config.directory.radiusMeters).toEqual({ min: 500, max: 5000, default: 2000 });
    expect(config.directory.maxResults).toEqual({ min: 1, max: 20, default: 10 });
    expect(config.directory.closingSoonThresholdMinutes).toEqual({ min: 5, max: 90, default: 30 });
    expect(config.session.ttlMinutes).toBe(120);
    expect(config.session.databaseUrl).toBeUndefined();
  });

  it("reads overrides and clamps the default into its bounds", () => {
    const config = parseAppConfig({
      PORT: "8080",
      CORS_ORIGINS: "https://a.example, https://b.example",
      GEMINI_API_KEY: "  test-key  ",
      SEARCH_RADIUS_MAX_M: "1500",
      RESULT_COUNT_DEFAULT: "50",
    });

    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(["https://a.example", "https://b.example"]);
    expect(config.ai.apiKey).toBe("test-key");
    expect(config.directory.radiusMeters).toEqual({ min: 500, max: 1500, default: 1500 });
    expect(config.directory.maxResults.default).toBe(20);
  });

  it("rejects malformed numbers", () => {
    expect(() => parseAppConfig({ PORT: "eighty" })).toThrow(/^Invalid configuration: PORT: /);
  });

  it("rejects inverted bounds", () => {
    expect(() => parseAppConfig({ SEARCH_RADIUS_MIN_M: "3000", SEARCH_RADIUS_MAX_M: "1000" })).toThrow(
      "Invalid search radius bounds: min 3000 exceeds max 1000.",
    );
  });
});
