import { describe, it, expect } from "vitest";
import { MockEmailProvider } from "../../../providers/mock-provider.js";
import type { SendEmailRequest } from "../../../providers/types.js";

const request: SendEmailRequest = {
  to: "ada@example.com",
  from: "news@example.com",
  fromName: "Newsletter",
  subject: "Hello",
  html: "<p>Hello</p>",
  text: "Hello",
};

describe("MockEmailProvider", () => {
  it("should succeed with sequential message ids in success mode", async () => {
    const provider = new MockEmailProvider({ mode: "success", latencyMs: 0 });

    expect(await provider.send(request)).toEqual({ success: true, providerMessageId: "mock-000001" });
    expect(await provider.send(request)).toEqual({ success: true, providerMessageId: "mock-000002" });
    expect(provider.sent).toEqual([request, request]);
  });

  it("should fail permanently in fail mode", async () => {
    const provider = new MockEmailProvider({ mode: "fail", latencyMs: 0 });

    expect(await provider.send(request)).toEqual({
      success: false,
      error: "Simulated rejection",
      retryable: false,
    });
  });

  it("should fail transiently in transient mode", async () => {
    const provider = new MockEmailProvider({ mode: "transient", latencyMs: 0 });

    expect(await provider.send(request)).toEqual({
      success: false,
      error: "Simulated outage",
      retryable: true,
    });
  });

  it("should fail below the failure rate in random mode", async () => {
    const failing = new MockEmailProvider({ mode: "random", failureRate: 0.5, latencyMs: 0, random: () => 0.2 });
    const passing = new MockEmailProvider({ mode: "random", failureRate: 0.5, latencyMs: 0, random: () => 0.8 });

    expect(await failing.send(request)).toEqual({ success: false, error: "Simulated failure", retryable: true });
    expect((await passing.send(request)).success).toBe(true);
  });

  it("should record requests even when they fail", async () => {
    const provider = new MockEmailProvider({ mode: "fail", latencyMs: 0 });

    await provider.send(request);

    expect(provider.sent).toHaveLength(1);
  });

  it("should keep only the most recent requests", async () => {
    const provider = new MockEmailProvider({ mode: "success", latencyMs: 0, historyLimit: 2 });

    for (const subject of ["first", "second", "third"]) {
      await provider.send({ ...request, subject });
    }

    expect(provider.sent.map((r) => r.subject)).toEqual(["second", "third"]);
  });
});
