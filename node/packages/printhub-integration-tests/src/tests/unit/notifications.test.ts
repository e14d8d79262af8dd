import { expect } from "chai";
import {
  DisabledNotifier,
  WebhookNotifier,
  notifyStatusChange,
  type FetchFn,
  type Order,
} from "printhub";
import { RecordingNotifier } from "@printhub/test-utils";

type Call = { url: string; init: RequestInit };

function recordingFetch(status: number, calls: Call[]): FetchFn {
  return async (url, init) => {
    calls.push({ url, init });
    return { ok: status >= 200 && status < 300, status };
  };
}

function order(source: Order["source"]): Order {
  return {
    id: "order-1",
    customerName: "Alex",
    customerEmail: "alex@example.com",
    serviceId: "service-1",
    status: "in_progress",
    quantity: 1,
    source,
    createdAt: 0,
    updatedAt: 0,
  };
}

describe("Notifications", () => {
  describe("WebhookNotifier", () => {
    it("should post the typed payload as JSON", async () => {
      const calls: Call[] = [];
      const notifier = new WebhookNotifier(
        "http://bot.local/webhook",
        1000,
        recordingFetch(200, calls),
      );

      const sent = await notifier.notify("new_order", { id: "order-1" });

      expect(sent).to.equal(true);
      expect(calls).to.have.lengthOf(1);
      expect(calls[0]?.url).to.equal("http://bot.local/webhook");
      expect(calls[0]?.init.method).to.equal("POST");
      expect(calls[0]?.init.headers).to.deep.equal({
        "Content-Type": "application/json",
      });

      const body: unknown = JSON.parse(String(calls[0]?.init.body));
      expect(body).to.have.property("type", "new_order");
      expect(body).to.have.deep.property("data", { id: "order-1" });
      expect(body).to.have.property("timestamp").that.is.a("string");
    });

    it("should report a failed delivery", async () => {
      const notifier = new WebhookNotifier(
        "http://bot.local/webhook",
        1000,
        recordingFetch(500, []),
      );

      expect(await notifier.notify("test", {})).to.equal(false);
    });

    it("should swallow network errors into false", async () => {
      const notifier = new WebhookNotifier("http://bot.local/webhook", 1000, () =>
        Promise.reject(new Error("connection refused")),
      );

      expect(await notifier.notify("test", {})).to.equal(false);
    });
  });

  it("should skip delivery when disabled", async () => {
    const notifier = new DisabledNotifier();

    expect(notifier.enabled).to.equal(false);
    expect(await notifier.notify("test", {})).to.equal(false);
  });

  describe("notifyStatusChange", () => {
    it("should only notify orders placed via Telegram", async () => {
      const notifier = new RecordingNotifier();

      expect(await notifyStatusChange(notifier, order("web"))).to.equal(false);
      expect(await notifyStatusChange(notifier, order("telegram"))).to.equal(true);
      expect(notifier.sent.map((n) => n.type)).to.deep.equal(["status_change"]);
    });
  });
});
