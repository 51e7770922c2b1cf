// src/__tests__/shutdown.test.ts

import { shutdown } from "../shutdown";

describe("shutdown", () => {
  it("should stop recovery before closing storage", async () => {
    const order: string[] = [];
    const controller = new AbortController();
    const done = new Promise<void>((resolve) => {
      controller.signal.addEventListener("abort", () => {
        order.push("recovery stopped");
        resolve();
      });
    });

    await shutdown({
      recovery: { controller, done },
      janitor: { stop: () => order.push("janitor") },
      configService: { close: () => order.push("config") },
      discord: {
        destroy: async () => {
          order.push("discord");
        },
      },
      storage: {
        close: () => {
          expect(controller.signal.aborted).toBe(true);
          order.push("storage");
        },
      },
    });

    expect(order).toEqual(["recovery stopped", "janitor", "config", "discord", "storage"]);
  });

  it("should cope with nothing running besides storage", async () => {
    const close = jest.fn();

    await shutdown({
      recovery: null,
      janitor: { stop: jest.fn() },
      configService: { close: jest.fn() },
      discord: null,
      storage: { close },
    });

    expect(close).toHaveBeenCalledTimes(1);
  });
});
