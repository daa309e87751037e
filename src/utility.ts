import * as Sentry from "@sentry/node";
import zod from "zod";

export abstract class Result<T> {
  static of = <T>(value: T): Ok<T> => Ok.of(value);
  static throw = (error: Error | string): Err => Err.throw(error);

  abstract isOk(): this is Ok<T>;
  abstract flat(): T;
  abstract fold<U>(onOk: (value: T) => U, onErr: (error: Error) => U): U;
  abstract map<U>(fn: (value: T) => U): Result<U>;

  toPromise = (): Promise<T> =>
    this.fold(
      res => Promise.resolve(res),
      error => Promise.reject(error)
    );
}

export class Ok<T> extends Result<T> {
  private readonly value: T;

  private constructor(value: T) {
    super();
    this.value = value;
  }

  static of = <T>(value: T): Ok<T> => new Ok(value);

  isOk = (): this is Ok<T> => true;
  map = <U>(fn: (value: T) => U): Ok<U> => Ok.of(fn(this.value));
  fold = <U>(onOk: (value: T) => U, _onErr?: (error: Error) => U): U =>
    onOk(this.value);
  flat = (): T => this.value;
}

export class Err extends Result<never> {
  private readonly error: Error;

  private constructor(error: Error | string) {
    super();
    this.error = typeof error === "string" ? new Error(error) : error;
  }

  static throw = (error: Error | string): Err => new Err(error);

  isOk = (): this is Ok<never> => false;
  map = <U>(_: (value: never) => U): Err => this;
  fold = <U>(_: unknown, onErr: (error: Error) => U): U => onErr(this.error);
  flat = (): never => {
    throw this.error;
  };
}

export const safeParse = <T extends zod.ZodType>(
  value: unknown,
  schema: T
): Result<zod.infer<T>> => {
  const { data, success, error } = schema.safeParse(value);
  if (success) {
    return Result.of(data);
  }

  Sentry.captureException(error);
  return Result.throw(error);
};
