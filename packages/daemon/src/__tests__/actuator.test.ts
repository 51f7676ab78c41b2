import { describe, it, expect } from "vitest";
import { ActuatorUnavailableError, withRetry } from "../actuator/types.js";
import { DummyGateway } from "../actuator/providers/dummy.js";
import { HomeAssistantGateway } from "../actuator/providers/home-assistant.js";
import { createGateway } from "../actuator/factory.js";
import { actuatorSchema } from "../settings/schema.js";
import { Mutex } from "../gate/mutex.js";
import { Logger } from "../logger.js";
import { deferred } from "./helpers.js";

describe("withRetry", () => {
  it("doubles the delay between attempts and returns the first success", async () => {
    const delays: number[] = [];
    const retried: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return "done";
      },
      {
        attempts: 3,
        delayMs: 500,
        onRetry: (attempt) => retried.push(attempt),
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );

    expect(result).toBe("done");
    expect(delays).toEqual([500, 1000]);
    expect(retried).toEqual([1, 2]);
  });

  it("rethrows the last error once attempts run out", async () => {
    let calls = 0;
    const delays: number[] = [];

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`attempt ${calls}`);
        },
        { attempts: 2, delayMs: 100, sleep: async (ms) => void delays.push(ms) },
      ),
    ).rejects.toThrow("attempt 2");
    expect(delays).toEqual([100]);
  });
});

describe("Mutex", () => {
  it("runs callers one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push("first start");
      await gate.promise;
      order.push("first end");
    });
    const second = mutex.runExclusive(() => {
      order.push("second");
    });

    expect(mutex.locked).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first start", "first end", "second"]);
    expect(mutex.locked).toBe(false);
  });

  it("releases the lock when the callback throws", async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.runExclusive(() => 42)).toBe(42);
  });
});

describe("DummyGateway", () => {
  it("moves and reports the simulated gate", async () => {
    const gateway = new DummyGateway(Logger.silent());
    await gateway.connect();

    expect(await gateway.open()).toBe(true);
    expect(await gateway.queryState()).toEqual({ online: true, state: "open", info: { simulated: true } });
    expect(await gateway.close()).toBe(true);
    expect((await gateway.queryState()).state).toBe("closed");
  });

  it("fails commands while disconnected or told to fail", async () => {
    const gateway = new DummyGateway(Logger.silent());
    expect(await gateway.open()).toBe(false);
    await expect(gateway.queryState()).rejects.toBeInstanceOf(ActuatorUnavailableError);

    await gateway.connect();
    gateway.fail("open");
    expect(await gateway.open()).toBe(false);
    gateway.recover("open");
    expect(await gateway.open()).toBe(true);
  });

  it("records notifications", async () => {
    const gateway = new DummyGateway(Logger.silent());
    await gateway.connect();

    expect(await gateway.notify("Gate opened", "Manual")).toBe(true);
    expect(gateway.notifications).toEqual([{ title: "Gate opened", message: "Manual" }]);
  });
});

describe("HomeAssistantGateway", () => {
  it("refuses to connect without url and token", async () => {
    const gateway = new HomeAssistantGateway(
      actuatorSchema.parse({ provider: "home_assistant" }),
      Logger.silent(),
    );

    await expect(gateway.connect()).rejects.toThrow("Home Assistant url and token must be configured");
  });

  it("skips notifications when no service is configured", async () => {
    const gateway = new HomeAssistantGateway(
      actuatorSchema.parse({ provider: "home_assistant", url: "http://ha.local:8123", token: "test-secret" }),
      Logger.silent(),
    );

    expect(await gateway.notify("Gate opened", "Manual")).toBe(false);
  });

  it("reports failure for commands before connecting", async () => {
    const gateway = new HomeAssistantGateway(
      actuatorSchema.parse({ provider: "home_assistant", retryAttempts: 1 }),
      Logger.silent(),
    );

    expect(await gateway.open()).toBe(false);
    await expect(gateway.queryState()).rejects.toThrow("Not connected to Home Assistant");
  });
});

describe("createGateway", () => {
  it("builds the configured provider", () => {
    expect(createGateway(actuatorSchema.parse({}), Logger.silent()).name).toBe("dummy");
    expect(
      createGateway(actuatorSchema.parse({ provider: "home_assistant" }), Logger.silent()).name,
    ).toBe("home_assistant");
  });
});
