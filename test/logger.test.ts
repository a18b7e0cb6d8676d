import { describe, expect, it } from "vitest";
import { DEBUG_PAYLOAD_LIMIT, formatErrorMessage, formatPayloadForDebug, payloadByteLength, summarizeText } from "../src/logger.js";

describe("payload helpers", () => {
  it("measures bodies in UTF-8 bytes", () => {
    expect(payloadByteLength(undefined)).toBe(0);
    expect(payloadByteLength("caído")).toBe(6);
    expect(payloadByteLength({ prompt: "ñ" })).toBe(JSON.stringify({ prompt: "ñ" }).length + 1);
    expect(payloadByteLength(42)).toBe(2);
  });

  it("copies small JSON bodies and cuts large ones", () => {
    const small = { model: "m", prompt: "vpn" };
    const copy = formatPayloadForDebug(small);
    expect(copy).toEqual(small);
    expect(copy).not.toBe(small);

    const embedding = { embedding: new Array<number>(1000).fill(0.125) };
    const text = JSON.stringify(embedding);
    expect(formatPayloadForDebug(embedding)).toBe(`${text.slice(0, DEBUG_PAYLOAD_LIMIT)}... (${text.length} bytes)`);
    expect(formatPayloadForDebug("ok")).toBe("ok");
  });
});

describe("formatErrorMessage", () => {
  it("collapses whitespace and describes non-errors", () => {
    expect(formatErrorMessage(new Error("connect\n  ECONNREFUSED"))).toBe("connect ECONNREFUSED");
    expect(formatErrorMessage(undefined)).toBe("unknown error");
    expect(formatErrorMessage("plain")).toBe("plain");
  });
});

describe("summarizeText", () => {
  it("keeps the first words of a query", () => {
    expect(summarizeText("  la  VPN no conecta desde la oficina central hoy ")).toBe("la VPN no conecta desde la");
    expect(summarizeText("   ")).toBe("");
    expect(summarizeText("x".repeat(80))).toBe(`${"x".repeat(61)}...`);
  });
});
