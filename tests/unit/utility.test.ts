import * as Sentry from "@sentry/node";
import { z } from "zod";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { Err, Ok, Result, safeParse } from "../../src/utility.ts";

vi.mock("@sentry/node", () => ({
  captureException: vi.fn(),
}));

describe("Result", () => {
  it("should map and unwrap Ok values", () => {
    const result = Result.of(2).map(value => value * 3);

    expect(result).toBeInstanceOf(Ok);
    expect(result.isOk()).toBe(true);
    expect(result.flat()).toBe(6);
  });

  it("should skip map for Err and throw on unwrap", () => {
    const result = Result.throw("broken").map(() => 1);

    expect(result).toBeInstanceOf(Err);
    expect(result.isOk()).toBe(false);
    expect(() => result.flat()).toThrow("broken");
  });

  it("should fold both variants", () => {
    const onOk = (value: number) => `ok:${value}`;
    const onErr = (error: Error) => `err:${error.message}`;

    expect(Result.of(1).fold(onOk, onErr)).toBe("ok:1");
    expect(Result.throw(new Error("nope")).fold(onOk, onErr)).toBe("err:nope");
  });

  it("should convert to promise", async () => {
    await expect(Result.of("value").toPromise()).resolves.toBe("value");
    await expect(Result.throw("failed").toPromise()).rejects.toThrow("failed");
  });
});

describe("safeParse", () => {
  const schema = z.object({ id: z.string() });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return parsed data for valid input", () => {
    const result = safeParse({ id: "light.kitchen" }, schema);

    expect(result.flat()).toEqual({ id: "light.kitchen" });
    expect(Sentry.captureException).not.toHaveBeenCalled();
  });

  it("should return error and report it for invalid input", () => {
    const result = safeParse({ id: 42 }, schema);

    expect(result.isOk()).toBe(false);
    expect(Sentry.captureException).toHaveBeenCalledTimes(1);
    expect(Sentry.captureException).toHaveBeenCalledWith(expect.any(z.ZodError));
  });
});
