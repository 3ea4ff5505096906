import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  CircuitBreaker,
  CircuitBreakerError,
  RequestAbortedError,
  type CircuitBreakerConfig,
} from "./circuitBreaker.js";

describe("CircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createCircuitBreaker(
    overrides: Partial<CircuitBreakerConfig> = {},
  ): CircuitBreaker {
    return new CircuitBreaker({
      name: "test-circuit",
      failureThreshold: 3,
      resetTimeout: 1000,
      requestTimeout: 100,
      successThreshold: 2,
      ...overrides,
    });
  }

  const failing = async (): Promise<string> => {
    throw new Error("fail");
  };

  describe("CLOSED state", () => {
    it("allows requests to pass through", async () => {
      const circuit = createCircuitBreaker();
      const result = await circuit.execute(async () => "success");
      expect(result).toBe("success");
      expect(circuit.getState()).toBe("closed");
    });

    it("opens circuit after reaching failure threshold", async () => {
      const circuit = createCircuitBreaker({ failureThreshold: 3 });

      for (let i = 0; i < 2; i++) {
        await expect(circuit.execute(failing)).rejects.toThrow("fail");
      }
      expect(circuit.getState()).toBe("closed");

      await expect(circuit.execute(failing)).rejects.toThrow("fail");
      expect(circuit.getState()).toBe("open");
    });

    it("resets failure count on success", async () => {
      const circuit = createCircuitBreaker();

      await expect(circuit.execute(failing)).rejects.toThrow("fail");
      await circuit.execute(async () => "success");

      expect(circuit.getMetrics().consecutiveFailures).toBe(0);
    });
  });

  describe("OPEN and HALF-OPEN states", () => {
    it("rejects requests immediately while open", async () => {
      const circuit = createCircuitBreaker({ failureThreshold: 1 });
      await expect(circuit.execute(failing)).rejects.toThrow("fail");

      const fn = vi.fn(async () => "success");
      await expect(circuit.execute(fn)).rejects.toThrow(CircuitBreakerError);
      expect(fn).not.toHaveBeenCalled();
      expect(circuit.getMetrics().totalRejections).toBe(1);
    });

    it("closes again after enough half-open successes", async () => {
      const circuit = createCircuitBreaker({ failureThreshold: 1 });
      await expect(circuit.execute(failing)).rejects.toThrow("fail");

      vi.advanceTimersByTime(1001);
      expect(circuit.getState()).toBe("half-open");

      await circuit.execute(async () => "a");
      expect(circuit.getState()).toBe("half-open");
      await circuit.execute(async () => "b");
      expect(circuit.getState()).toBe("closed");
    });

    it("reopens on a half-open failure", async () => {
      const circuit = createCircuitBreaker({ failureThreshold: 1 });
      await expect(circuit.execute(failing)).rejects.toThrow("fail");
      vi.advanceTimersByTime(1001);

      await expect(circuit.execute(failing)).rejects.toThrow("fail");
      expect(circuit.getState()).toBe("open");
    });
  });

  describe("timeouts and cancellation", () => {
    it("times out slow requests and aborts the signal handed to fn", async () => {
      const circuit = createCircuitBreaker();
      let received: AbortSignal | undefined;

      const pending = circuit.execute(
        (signal) =>
          new Promise<string>(() => {
            received = signal;
          }),
      );
      const assertion = expect(pending).rejects.toThrow(
        "Request timeout after 100ms for 'test-circuit'",
      );

      await vi.advanceTimersByTimeAsync(101);
      await assertion;

      expect(received?.aborted).toBe(true);
      expect(circuit.getMetrics().totalTimeouts).toBe(1);
      expect(circuit.getMetrics().totalFailures).toBe(1);
    });

    it("rejects with RequestAbortedError when the caller aborts", async () => {
      const circuit = createCircuitBreaker({ failureThreshold: 1 });
      const controller = new AbortController();

      const pending = circuit.execute(() => new Promise<string>(() => {}), {
        signal: controller.signal,
      });
      const assertion = expect(pending).rejects.toThrow(RequestAbortedError);

      controller.abort();
      await assertion;

      // Cancellation is not a service failure
      expect(circuit.getState()).toBe("closed");
      expect(circuit.getMetrics().totalFailures).toBe(0);
    });

    it("settles and clears its timer when fn throws synchronously", async () => {
      const circuit = createCircuitBreaker();
      const controller = new AbortController();
      const throwsSync = (): Promise<string> => {
        throw new Error("sync boom");
      };

      await expect(
        circuit.execute(throwsSync, { signal: controller.signal }),
      ).rejects.toThrow("sync boom");

      expect(vi.getTimerCount()).toBe(0);
      expect(circuit.getMetrics().totalFailures).toBe(1);
      expect(circuit.getMetrics().totalTimeouts).toBe(0);
    });

    it("does not call fn when the signal is already aborted", async () => {
      const circuit = createCircuitBreaker();
      const controller = new AbortController();
      controller.abort();
      const fn = vi.fn(async () => "x");

      await expect(
        circuit.execute(fn, { signal: controller.signal }),
      ).rejects.toThrow(RequestAbortedError);
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe("shouldRecordFailure", () => {
    it("ignores filtered errors", async () => {
      const circuit = createCircuitBreaker({
        failureThreshold: 1,
        shouldRecordFailure: (error) => !error.message.includes("quota"),
      });

      await expect(
        circuit.execute(async () => {
          throw new Error("insufficient quota");
        }),
      ).rejects.toThrow("quota");

      expect(circuit.getState()).toBe("closed");
    });
  });

  describe("executeWithFallback", () => {
    it("returns a fallback value or the result of a fallback function", async () => {
      const circuit = createCircuitBreaker();

      expect(await circuit.executeWithFallback(failing, "fallback")).toBe(
        "fallback",
      );
      expect(await circuit.executeWithFallback(failing, () => "computed")).toBe(
        "computed",
      );
    });
  });

  describe("manual control", () => {
    it("trip opens and reset closes", () => {
      const logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: vi.fn(),
      };
      const circuit = createCircuitBreaker({ logger });

      circuit.trip();
      expect(circuit.getState()).toBe("open");
      circuit.reset();
      expect(circuit.getState()).toBe("closed");

      expect(logger.info).toHaveBeenCalledWith(
        "Circuit breaker 'test-circuit' state change",
        expect.objectContaining({ from: "closed", to: "open" }),
      );
    });
  });
});
