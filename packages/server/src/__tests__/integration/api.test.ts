import { describe, it, expect, beforeAll } from "vitest";
import { createEmitter, sequenceRandom } from "@switchyard/core";
import { createApp } from "../../app.js";
import { parseConfig, setConfig } from "../../config.js";
import { NotificationService, type NotificationResult } from "../../lib/notification/index.js";
import { PaymentService, type PaymentResult } from "../../lib/payment/index.js";
import type { Services } from "../../services.js";

const clock = () => Date.UTC(2026, 5, 15, 12);

function buildApp(overrides: { paymentDraws?: number[]; notificationDraws?: number[] } = {}) {
  const emitter = createEmitter();
  const services: Services = {
    emitter,
    payments: new PaymentService({
      emitter,
      clock,
      random: sequenceRandom(overrides.paymentDraws ?? [0.9, 0.3]),
    }),
    notifications: new NotificationService({
      emitter,
      clock,
      random: sequenceRandom(overrides.notificationDraws ?? [0.5]),
    }),
  };
  return createApp(services, { requestLogging: false });
}

interface HealthBody {
  status: string;
  paymentMethods: string[];
  channels: string[];
}

async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

function post(app: ReturnType<typeof buildApp>, path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

const cardBody = {
  amount: 100,
  currency: "EUR",
  method: "CREDIT_CARD",
  paymentDetails: {
    cardNumber: "4111 1111 1111 1111",
    cvv: 123,
    expiryDate: "12/2030",
    cardHolderName: "Test Holder",
  },
};

describe("HTTP API", () => {
  beforeAll(() => {
    setConfig(parseConfig({ nodeEnv: "test", logLevel: "silent" }));
  });

  describe("GET /health", () => {
    it("should list the registered discriminants", async () => {
      const res = await buildApp().request("/health");
      expect(res.status).toBe(200);
      const body = await readJson<HealthBody>(res);
      expect(body.status).toBe("ok");
      expect(body.paymentMethods).toEqual(["CREDIT_CARD", "PAYPAL", "CRYPTO", "BANK_TRANSFER"]);
      expect(body.channels).toEqual(["EMAIL", "SMS", "PUSH", "SLACK"]);
    });
  });

  describe("POST /api/payments/process", () => {
    it("should process a card payment", async () => {
      const res = await post(buildApp(), "/api/payments/process", cardBody);
      expect(res.status).toBe(200);
      const body = await readJson<PaymentResult>(res);
      expect(body).toMatchObject({
        status: "COMPLETED",
        cost: 3.2,
        netAmount: 100,
        grossAmount: 103.2,
        method: "CREDIT_CARD",
        currency: "EUR",
        timestamp: clock(),
      });
      expect(body.id).toMatch(/^TXN-[0-9A-F]{8}$/);
    });

    it("should return 400 with validation errors", async () => {
      const res = await post(buildApp(), "/api/payments/process", {
        ...cardBody,
        method: "PAYPAL",
        paymentDetails: { email: "buyer@example.com", token: "Bearer 0123456789" },
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "FAILED",
        errors: ["Email must be in format: smth@gmail.com"],
      });
    });

    it("should return 400 for a missing detail", async () => {
      const res = await post(buildApp(), "/api/payments/process", {
        ...cardBody,
        method: "BANK_TRANSFER",
        paymentDetails: { iban: "GR123", bicCode: "12345" },
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ status: "FAILED", errors: ["accountHolderName is required"] });
    });

    it("should return 400 for an unsupported method", async () => {
      const res = await post(buildApp(), "/api/payments/process", { ...cardBody, method: "CASH" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "FAILED",
        errors: ["Payment method CASH is not currently supported"],
      });
    });

    it("should return 400 for a malformed body", async () => {
      const res = await post(buildApp(), "/api/payments/process", {
        ...cardBody,
        amount: -5,
        currency: "JPY",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "FAILED",
        errors: [
          "amount: Amount must be greater than zero",
          "currency: Currency must be one of EUR, USD, GBP",
        ],
      });
    });

    it("should return 400 for invalid JSON", async () => {
      const res = await buildApp().request("/api/payments/process", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ status: "FAILED", errors: ["Request body must be valid JSON"] });
    });

    it("should return 500 when processing fails", async () => {
      const res = await post(buildApp({ paymentDraws: [0.01] }), "/api/payments/process", cardBody);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        status: "FAILED",
        error: "Payment processing failed: Insufficient funds",
      });
    });
  });

  describe("POST /api/payments/fee", () => {
    it("should estimate a crypto fee", async () => {
      const res = await post(buildApp({ paymentDraws: [0.6] }), "/api/payments/fee", {
        amount: 100,
        currency: "USD",
        method: "CRYPTO",
        paymentDetails: {},
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ method: "CRYPTO", amount: 100, fee: 3.5 });
    });
  });

  describe("POST /api/notifications/send", () => {
    it("should send a push notification", async () => {
      const res = await post(buildApp(), "/api/notifications/send", {
        channel: "PUSH",
        recipient: "ab".repeat(32),
        message: "Build finished",
        metadata: { badge: 3 },
      });
      expect(res.status).toBe(200);
      const body = await readJson<NotificationResult>(res);
      expect(body).toMatchObject({ status: "COMPLETED", channel: "PUSH", cost: 0.0001 });
      expect(body.providerReference).toMatch(/^PUSH-[0-9A-F]{8}$/);
    });

    it("should report a missing recipient", async () => {
      const res = await post(buildApp(), "/api/notifications/send", { channel: "SMS", message: "Hi" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ status: "FAILED", errors: ["recipient is required"] });
    });

    it("should return 500 when delivery fails", async () => {
      const res = await post(buildApp({ notificationDraws: [0.01] }), "/api/notifications/send", {
        channel: "SLACK",
        recipient: "#ops",
        message: "deployed",
      });
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        status: "FAILED",
        error: "Notification processing failed: Slack API unavailable",
      });
    });

    it("should return 400 for an unsupported channel", async () => {
      const res = await post(buildApp(), "/api/notifications/send", {
        channel: "FAX",
        recipient: "+301234567",
        message: "Hi",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        status: "FAILED",
        errors: ["Channel FAX is not currently supported"],
      });
    });
  });

  describe("POST /api/notifications/cost", () => {
    it("should price an SMS by segments", async () => {
      const res = await post(buildApp(), "/api/notifications/cost", {
        channel: "SMS",
        recipient: "+301234567",
        message: "x".repeat(321),
      });
      expect(await res.json()).toEqual({ channel: "SMS", cost: 0.15 });
    });
  });

  it("should return 404 for unknown routes", async () => {
    const res = await buildApp().request("/api/unknown");
    expect(res.status).toBe(404);
  });
});
