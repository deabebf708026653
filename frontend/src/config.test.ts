import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to local defaults", () => {
    expect(loadConfig({})).toEqual({
      apiBaseUrl: "http://localhost:8000",
      defaultImageUrl: "",
      logLevel: "info",
    });
  });

  it("strips trailing slashes from the API base URL", () => {
    const cfg = loadConfig({
      VITE_API_BASE_URL: "https://qa.example.test/api//",
      VITE_DEFAULT_IMAGE_URL: "https://cdn.example.test/default.png",
      VITE_LOG_LEVEL: "warn",
    });
    expect(cfg).toEqual({
      apiBaseUrl: "https://qa.example.test/api",
      defaultImageUrl: "https://cdn.example.test/default.png",
      logLevel: "warn",
    });
  });

  it("falls back to info for an unknown log level", () => {
    expect(loadConfig({ VITE_LOG_LEVEL: "loud" }).logLevel).toBe("info");
  });

  it("falls back to the local API for a blank base URL", () => {
    expect(loadConfig({ VITE_API_BASE_URL: "   " }).apiBaseUrl).toBe("http://localhost:8000");
  });
});
