import { InMemoryTimer } from "../../src/abstractions/InMemoryTimer";
import { NodeTimer } from "../../src/abstractions/NodeTimer";

describe("InMemoryTimer", () => {
  it("records requested delays without waiting", async () => {
    const timer = new InMemoryTimer();

    await timer.delay(2000);
    await timer.delay(500);

    expect(timer.getDelays()).toEqual([2000, 500]);
  });
});

describe("NodeTimer", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("resolves after the requested delay", async () => {
    const timer = new NodeTimer();
    let resolved = false;

    const pending = timer.delay(1000).then(() => {
      resolved = true;
    });

    jest.advanceTimersByTime(999);
    await Promise.resolve();
    expect(resolved).toBe(false);

    jest.advanceTimersByTime(1);
    await pending;
    expect(resolved).toBe(true);
  });
});
