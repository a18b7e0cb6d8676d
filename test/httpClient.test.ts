import { AxiosError, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { createLoggingHttpClient } from "../src/httpClient.js";
import { recordingLogger } from "./support/recordingLogger.js";

describe("createLoggingHttpClient", () => {
  it("logs one summary line per successful request", async () => {
    const logger = recordingLogger("http");
    const http = createLoggingHttpClient(
      {
        baseURL: "http://status.test/",
        adapter: async (config: InternalAxiosRequestConfig) => ({ data: "abc", status: 200, statusText: "OK", headers: {}, config }),
      },
      logger,
    );

    const response = await http.get("/incidents");

    expect(response.data).toBe("abc");
    const [line] = logger.messages("info");
    expect(line).toMatch(/^GET http:\/\/status\.test\/incidents status=200 bytes=3 latencyMs=\d+$/);
  });

  it("logs failed requests as warnings and rethrows", async () => {
    const logger = recordingLogger("http");
    const http = createLoggingHttpClient(
      {
        adapter: async (config: InternalAxiosRequestConfig) => {
          throw new AxiosError("Request failed with status code 503", "ERR_BAD_RESPONSE", config, null, {
            data: "down",
            status: 503,
            statusText: "Service Unavailable",
            headers: {},
            config,
          });
        },
      },
      logger,
    );

    await expect(http.post("http://status.test/feed", { page: 1 })).rejects.toThrow("Request failed with status code 503");
    const [line] = logger.messages("warn");
    expect(line).toMatch(
      /^POST http:\/\/status\.test\/feed status=503 bytes=4 latencyMs=\d+ error=Request failed with status code 503$/,
    );
  });
});
