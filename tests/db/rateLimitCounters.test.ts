import { MemoryCounterStore } from "../../src/db/rateLimitCounters";
import { T0 } from "../helpers/fakes";

describe("MemoryCounterStore", () => {
  it("counts per key", async () => {
    const store = new MemoryCounterStore();
    await store.increment("a", 1000, T0);
    await store.increment("a", 1000, T0);
    await expect(store.increment("a", 1000, T0)).resolves.toBe(3);
    await expect(store.increment("b", 1000, T0)).resolves.toBe(1);
  });

  it("restarts an expired key", async () => {
    const store = new MemoryCounterStore();
    await store.increment("a", 1000, T0);
    await expect(store.increment("a", 1000, new Date(T0.getTime() + 1000))).resolves.toBe(1);
  });

  it("never loses an increment under concurrent calls", async () => {
    const store = new MemoryCounterStore();
    const counts = await Promise.all(Array.from({ length: 50 }, () => store.increment("a", 1000, T0)));
    expect([...counts].sort((x, y) => x - y)).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
  });
});
