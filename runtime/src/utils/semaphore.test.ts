import { describe, it, expect } from "vitest";
import { Semaphore } from "./semaphore.js";

describe("Semaphore", () => {
  it("rejects invalid permit counts", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it("queues acquirers beyond the permit count in FIFO order", async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const releaseFirst = await semaphore.acquire();
    const second = semaphore.acquire().then((release) => {
      order.push("second");
      return release;
    });
    const third = semaphore.acquire().then((release) => {
      order.push("third");
      return release;
    });

    expect(semaphore.available).toBe(0);
    expect(semaphore.pending).toBe(2);

    releaseFirst();
    const releaseSecond = await second;
    releaseSecond();
    const releaseThird = await third;
    releaseThird();

    expect(order).toEqual(["second", "third"]);
    expect(semaphore.available).toBe(1);
  });

  it("ignores a repeated release", async () => {
    const semaphore = new Semaphore(2);
    const release = await semaphore.acquire();
    release();
    release();
    expect(semaphore.available).toBe(2);
  });

  it("run releases the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(semaphore.available).toBe(1);
  });
});
