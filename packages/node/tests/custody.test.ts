/**
 * Tests for custody account routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZERO_ADDRESS } from "@coinwrap/types";
import { ALICE, createTestApp, callerRequest, depositThroughApi } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

interface AccountBody {
  data: { user: string; account: string; exists: boolean; balance: string };
}

describe("POST /api/v1/custody-accounts", () => {
  it("creates the caller's account and returns 201", async () => {
    const res = await instance.app.request(callerRequest("/api/v1/custody-accounts", ALICE));

    expect(res.status).toBe(201);
    const body = (await res.json()) as AccountBody;
    expect(body.data.user).toBe(ALICE);
    expect(body.data.exists).toBe(true);
    expect(body.data.balance).toBe("0");
    expect(body.data.account).toBe(instance.service.wrapper.getCustodyAccount(ALICE));
  });

  it("returns 409 ALREADY_EXISTS the second time", async () => {
    await instance.app.request(callerRequest("/api/v1/custody-accounts", ALICE));
    const res = await instance.app.request(callerRequest("/api/v1/custody-accounts", ALICE));

    expect(res.status).toBe(409);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("ALREADY_EXISTS");
  });

  it("returns 401 without a caller", async () => {
    const res = await instance.app.request("/api/v1/custody-accounts", { method: "POST" });

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "UNAUTHORIZED",
      message: "Missing X-Caller-Address header",
    });
  });

  it("returns 400 for a malformed caller", async () => {
    const res = await instance.app.request(callerRequest("/api/v1/custody-accounts", "0x1234"));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 for the zero address as caller", async () => {
    const res = await instance.app.request(
      callerRequest("/api/v1/custody-accounts", ZERO_ADDRESS),
    );

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/custody-accounts/:user", () => {
  it("reports a missing account with the zero address", async () => {
    const res = await instance.app.request(`/api/v1/custody-accounts/${ALICE}`);

    expect(res.status).toBe(200);
    const body = (await res.json()) as AccountBody;
    expect(body.data).toEqual({ user: ALICE, account: ZERO_ADDRESS, exists: false, balance: "0" });
  });

  it("shows deposited coins awaiting wrap", async () => {
    const account = await depositThroughApi(instance, ALICE, "100");

    const res = await instance.app.request(`/api/v1/custody-accounts/${ALICE}`);
    const body = (await res.json()) as AccountBody;
    expect(body.data).toEqual({ user: ALICE, account, exists: true, balance: "100" });
  });

  it("accepts upper-case hex", async () => {
    await instance.app.request(callerRequest("/api/v1/custody-accounts", ALICE));

    const res = await instance.app.request(`/api/v1/custody-accounts/0x${"A".repeat(40)}`);
    const body = (await res.json()) as AccountBody;
    expect(body.data.user).toBe(ALICE);
    expect(body.data.exists).toBe(true);
  });

  it("returns 400 for a malformed address", async () => {
    const res = await instance.app.request("/api/v1/custody-accounts/alice");
    expect(res.status).toBe(400);
  });
});
