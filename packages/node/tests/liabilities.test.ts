/**
 * Tests for liability and payment routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import { cashAccount, create, createTestApp, jsonRequest } from "./setup.js";
import type { DataBody, ErrorBody, PageBody } from "./setup.js";

interface LiabilityBody {
  id: string;
  principal: string;
  outstanding: string;
}

interface PaymentBody {
  id: string;
  requested: string;
  applied: string;
}

let instance: AppInstance;
let bank: { id: string };
let loan: LiabilityBody;

beforeEach(async () => {
  instance = createTestApp();
  bank = await cashAccount(instance, "Bank", "3000");
  loan = await create<LiabilityBody>(instance, "/api/v1/liabilities", { name: "Car loan", principal: "5000" });
});

async function outstanding(): Promise<string> {
  const res = await instance.app.request(`/api/v1/liabilities/${loan.id}`);
  return ((await res.json()) as DataBody<LiabilityBody>).data.outstanding;
}

describe("liability routes", () => {
  it("creates a liability with everything outstanding", () => {
    expect(loan).toMatchObject({ principal: "5000.00", outstanding: "5000.00" });
  });

  it("records a payment against the liability", async () => {
    const payment = await create<PaymentBody>(instance, `/api/v1/liabilities/${loan.id}/payments`, {
      accountId: bank.id,
      amount: "1200",
    });

    expect(payment).toMatchObject({ requested: "1200.00", applied: "1200.00" });
    expect(await outstanding()).toBe("3800.00");

    const list = await instance.app.request(`/api/v1/liabilities/${loan.id}/payments`);
    const body = (await list.json()) as PageBody<PaymentBody>;
    expect(body.data.map((p) => p.id)).toEqual([payment.id]);
  });

  it("returns 422 OVERPAYMENT_REJECTED by default", async () => {
    const rich = await cashAccount(instance, "Savings", "9000");
    const res = await instance.app.request(
      jsonRequest(`/api/v1/liabilities/${loan.id}/payments`, "POST", { accountId: rich.id, amount: "6000" }),
    );

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("OVERPAYMENT_REJECTED");
    expect(await outstanding()).toBe("5000.00");
  });

  it("reverses a payment on DELETE /payments/:id", async () => {
    const payment = await create<PaymentBody>(instance, `/api/v1/liabilities/${loan.id}/payments`, {
      accountId: bank.id,
      amount: "1000",
    });

    const res = await instance.app.request(jsonRequest(`/api/v1/payments/${payment.id}`, "DELETE"));
    expect(res.status).toBe(204);
    expect(await outstanding()).toBe("5000.00");

    const again = await instance.app.request(jsonRequest(`/api/v1/payments/${payment.id}`, "DELETE"));
    expect(again.status).toBe(404);
    expect(((await again.json()) as ErrorBody).error.code).toBe("PAYMENT_NOT_FOUND");
  });

  it("deletes a liability once no payment references it", async () => {
    const payment = await create<PaymentBody>(instance, `/api/v1/liabilities/${loan.id}/payments`, {
      accountId: bank.id,
      amount: "100",
    });

    const blocked = await instance.app.request(jsonRequest(`/api/v1/liabilities/${loan.id}`, "DELETE"));
    expect(blocked.status).toBe(409);
    expect(((await blocked.json()) as ErrorBody).error.code).toBe("LIABILITY_IN_USE");

    await instance.app.request(jsonRequest(`/api/v1/payments/${payment.id}`, "DELETE"));
    const res = await instance.app.request(jsonRequest(`/api/v1/liabilities/${loan.id}`, "DELETE"));
    expect(res.status).toBe(204);

    const gone = await instance.app.request(`/api/v1/liabilities/${loan.id}`);
    expect(gone.status).toBe(404);
  });

  it("returns 404 for payments of an unknown liability", async () => {
    const res = await instance.app.request("/api/v1/liabilities/missing/payments");
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error.code).toBe("LIABILITY_NOT_FOUND");
  });
});
