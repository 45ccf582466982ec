/**
 * UndiciHttpClient against undici's MockAgent (no network).
 */
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { MockAgent } from "undici";
import { UndiciHttpClient } from "../src/source/http.js";
import { VALID_CSV } from "./fixtures.js";

describe("UndiciHttpClient", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  test("returns status, content type and body", async () => {
    agent
      .get("https://capacity.test")
      .intercept({ path: (p: string) => p.startsWith("/oac?"), method: "GET" })
      .reply(200, VALID_CSV, { headers: { "content-type": "text/csv" } });

    const client = new UndiciHttpClient(agent);
    const res = await client.get("https://capacity.test/oac?cycle=0", { timeoutMs: 1_000 });

    expect(res).toEqual({
      status: 200,
      ok: true,
      contentType: "text/csv",
      body: VALID_CSV,
    });
  });

  test("non-2xx is reported, not thrown", async () => {
    agent
      .get("https://capacity.test")
      .intercept({ path: "/oac", method: "GET" })
      .reply(404, "Not Found");

    const client = new UndiciHttpClient(agent);
    const res = await client.get("https://capacity.test/oac", { timeoutMs: 1_000 });
    expect(res.status).toBe(404);
    expect(res.ok).toBe(false);
  });

  test("connection errors reject", async () => {
    agent
      .get("https://capacity.test")
      .intercept({ path: "/oac", method: "GET" })
      .replyWithError(new Error("socket hang up"));

    const client = new UndiciHttpClient(agent);
    await expect(
      client.get("https://capacity.test/oac", { timeoutMs: 1_000 }),
    ).rejects.toThrow();
  });
});
