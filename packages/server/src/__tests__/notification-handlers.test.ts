import { describe, it, expect } from "vitest";
import { sequenceRandom } from "@switchyard/core";
import {
  EmailHandler,
  PushHandler,
  SlackHandler,
  SmsHandler,
  notificationField,
  pushPayloadSize,
  smsSegments,
  type NotificationChannel,
  type NotificationRequest,
} from "../lib/notification/index.js";

const clock = () => 1_750_000_000_000;
const ids = () => "NOTIF-0000ABCD";
const options = { clock, ids, random: sequenceRandom([0.5]) };

const deviceToken = "ab".repeat(32);

function request(
  channel: NotificationChannel,
  fields: Partial<Omit<NotificationRequest, "channel">> = {}
): NotificationRequest {
  return {
    channel,
    recipient: "",
    message: "Hello",
    metadata: {},
    priority: "normal",
    ...fields,
  };
}

describe("notificationField", () => {
  it("should read top-level fields and fall back to metadata", () => {
    const req = request("EMAIL", { recipient: "a@b.io", subject: "Hi", metadata: { threadId: "t-1" } });
    expect(notificationField(req, "recipient")).toBe("a@b.io");
    expect(notificationField(req, "subject")).toBe("Hi");
    expect(notificationField(req, "message")).toBe("Hello");
    expect(notificationField(req, "threadId")).toBe("t-1");
    expect(notificationField(req, "missing")).toBeUndefined();
  });

  it("should treat blank values as absent", () => {
    expect(notificationField(request("SMS", { recipient: "   " }), "recipient")).toBeUndefined();
  });
});

describe("EmailHandler", () => {
  const handler = new EmailHandler(options);

  it("should accept a valid email", () => {
    const result = handler.validate(request("EMAIL", { recipient: "user@example.com", subject: "Hi" }));
    expect(result.valid).toBe(true);
  });

  it("should accept an email without a subject", () => {
    const result = handler.validate(request("EMAIL", { recipient: "user@example.com" }));
    expect(result).toEqual({ valid: true, errors: [] });
  });

  it("should require a recipient", () => {
    const result = handler.validate(request("EMAIL"));
    expect(result.errors).toEqual(["recipient is required"]);
  });

  it("should check address and lengths", () => {
    const result = handler.validate(
      request("EMAIL", {
        recipient: "not-an-email",
        subject: "s".repeat(201),
        message: "m".repeat(10_001),
      })
    );
    expect(result.errors).toEqual([
      "Invalid email address",
      "Subject must not exceed 200 characters",
      "Message must not exceed 10000 characters",
    ]);
  });

  it("should send with a provider reference", () => {
    const result = handler.execute(request("EMAIL", { recipient: "user@example.com", subject: "Hi" }));
    expect(result).toEqual({
      status: "COMPLETED",
      id: "NOTIF-0000ABCD",
      cost: 0.001,
      timestamp: clock(),
      channel: "EMAIL",
      providerReference: "MAIL-0000ABCD",
    });
  });

  it("should fail with the channel message", () => {
    const failing = new EmailHandler({ random: sequenceRandom([0.01]) });
    expect(() => failing.execute(request("EMAIL"))).toThrow("Email delivery failed");
  });
});

describe("SmsHandler", () => {
  const handler = new SmsHandler(options);

  it("should require E.164 numbers", () => {
    expect(handler.validate(request("SMS", { recipient: "+306912345678" })).valid).toBe(true);
    expect(handler.validate(request("SMS", { recipient: "06912345678" })).errors).toEqual([
      "Phone number must be in E.164 format",
    ]);
  });

  it("should limit the message to 1600 characters", () => {
    const result = handler.validate(request("SMS", { recipient: "+306912345678", message: "x".repeat(1601) }));
    expect(result.errors).toEqual(["SMS message must not exceed 1600 characters"]);
  });

  it("should bill per 160-character segment", () => {
    expect(smsSegments("x".repeat(160))).toBe(1);
    expect(smsSegments("x".repeat(161))).toBe(2);
    expect(handler.estimateCost(request("SMS", { message: "x".repeat(160) }))).toBe(0.05);
    expect(handler.estimateCost(request("SMS", { message: "x".repeat(161) }))).toBe(0.1);
    expect(handler.estimateCost(request("SMS", { message: "x".repeat(1600) }))).toBe(0.5);
  });

  it("should fail with the channel message", () => {
    const failing = new SmsHandler({ random: sequenceRandom([0.04]) });
    expect(() => failing.execute(request("SMS"))).toThrow("SMS gateway unavailable");
  });
});

describe("PushHandler", () => {
  const handler = new PushHandler(options);

  it("should require a 64 hex character device token", () => {
    expect(handler.validate(request("PUSH", { recipient: deviceToken })).valid).toBe(true);
    expect(handler.validate(request("PUSH", { recipient: "abc" })).errors).toEqual([
      "Device token must be 64 hex characters",
    ]);
  });

  it("should count message, subject and metadata in the payload", () => {
    expect(
      pushPayloadSize(request("PUSH", { message: "ab", subject: "c", metadata: { k: "vv" } }))
    ).toBe(6);
    expect(pushPayloadSize(request("PUSH", { message: "é" }))).toBe(2);
  });

  it("should reject payloads of 4KB or more", () => {
    const fits = request("PUSH", {
      recipient: deviceToken,
      message: "x".repeat(4000),
      metadata: { k: "v".repeat(94) },
    });
    const tooBig = request("PUSH", {
      recipient: deviceToken,
      message: "x".repeat(4000),
      metadata: { k: "v".repeat(95) },
    });
    expect(handler.validate(fits).valid).toBe(true);
    expect(handler.validate(tooBig).errors).toEqual(["Push payload must be smaller than 4KB"]);
  });

  it("should cost 0.0001", () => {
    expect(handler.estimateCost(request("PUSH"))).toBe(0.0001);
  });
});

describe("SlackHandler", () => {
  const handler = new SlackHandler(options);

  it("should accept channels and users", () => {
    expect(handler.validate(request("SLACK", { recipient: "#alerts" })).valid).toBe(true);
    expect(handler.validate(request("SLACK", { recipient: "@on-call" })).valid).toBe(true);
  });

  it("should reject other recipients and long messages", () => {
    const result = handler.validate(request("SLACK", { recipient: "alerts", message: "x".repeat(4001) }));
    expect(result.errors).toEqual([
      "Slack recipient must be a #channel or @user",
      "Slack message must not exceed 4000 characters",
    ]);
  });

  it("should be free", () => {
    const result = handler.execute(request("SLACK", { recipient: "#alerts" }));
    expect(result.cost).toBe(0);
    expect(result.providerReference).toBe("SLACK-0000ABCD");
  });

  it("should report missing fields", () => {
    expect(handler.validate(request("SLACK", { message: "" })).errors).toEqual([
      "recipient is required",
      "message is required",
    ]);
  });
});
