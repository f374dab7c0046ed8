import { match, P } from "ts-pattern";
import type {
  AsyncCloser,
  AsyncInfallibleCloser,
  Awaitable,
  Closer,
  InfallibleCloser,
  LogPort,
} from "../ports/mod.ts";
import {
  bracket,
  bracketAsync,
  bracketInfallible,
  bracketInfallibleAsync,
  type BracketOutcome,
  type CloseErrorOf,
  type withResource,
  type withResourceAsync,
  type withResourceInfallible,
  type withResourceInfallibleAsync,
} from "./bracket.ts";
import { stringOf } from "./errors.ts";
import type { Result } from "./result.ts";
import { assertValidCallbacks } from "./validation.ts";

export type Phase = "acquire" | "use" | "release";
export type OutcomeKind = "ok" | Phase | "combined";

export type BracketOptions = {
  label?: string;
  log?: LogPort;
  validate?: boolean;
};

export type Brackets = {
  bracket: typeof bracket;
  bracketInfallible: typeof bracketInfallible;
  withResource: typeof withResource;
  withResourceInfallible: typeof withResourceInfallible;
  bracketAsync: typeof bracketAsync;
  bracketInfallibleAsync: typeof bracketInfallibleAsync;
  withResourceAsync: typeof withResourceAsync;
  withResourceInfallibleAsync: typeof withResourceInfallibleAsync;
};

export const outcomeOf = (failed: Phase[]): OutcomeKind =>
  match<Phase[], OutcomeKind>(failed)
    .with([], () => "ok")
    .with([P.select()], (phase) => phase)
    .otherwise(() => "combined");

// One tracer per call: it records which phases failed so the closing log
// line can say how the call ended.
function tracer(label: string, log: LogPort | undefined) {
  const failed: Phase[] = [];

  const fail = (phase: Phase, start: number, error: unknown) => {
    failed.push(phase);
    log?.error(`${label}.${phase} err`, {
      ms: Date.now() - start,
      error: stringOf(error),
    });
  };

  const report = (phase: Phase, start: number, value: unknown) =>
    match(value)
      .with({ ok: false, error: P.select() }, (error) =>
        fail(phase, start, error))
      .otherwise(() =>
        log?.debug(`${label}.${phase} ok`, { ms: Date.now() - start })
      );

  return {
    sync<Args extends unknown[], T>(
      phase: Phase,
      fn: (...args: Args) => T,
    ): (...args: Args) => T {
      return (...args) => {
        const start = Date.now();
        let value: T;
        try {
          value = fn(...args);
        } catch (e) {
          fail(phase, start, e);
          throw e;
        }
        report(phase, start, value);
        return value;
      };
    },

    async<Args extends unknown[], T>(
      phase: Phase,
      fn: (...args: Args) => Awaitable<T>,
    ): (...args: Args) => Promise<T> {
      return async (...args): Promise<T> => {
        const start = Date.now();
        let value: T;
        try {
          value = await fn(...args);
        } catch (e) {
          fail(phase, start, e);
          throw e;
        }
        report(phase, start, value);
        return value;
      };
    },

    done() {
      log?.debug(`${label} done`, { outcome: outcomeOf(failed) });
    },
  };
}

/**
 * Builds the bracket family with logging and argument validation woven
 * around every phase. Outcomes, call counts and ordering are unchanged.
 */
export function createBrackets(options: BracketOptions = {}): Brackets {
  const { label = "bracket", log, validate = true } = options;

  const check = (callbacks: Record<string, unknown>) => {
    if (validate) assertValidCallbacks(callbacks);
  };

  function tracedBracket<R, A, EA = never, EU = never, ER = never>(
    acquire: () => Result<R, EA>,
    release: (resource: R) => Result<void, ER>,
    use: (resource: R) => Result<A, EU>,
  ): BracketOutcome<A, EA, EU, ER> {
    check({ acquire, release, use });
    const t = tracer(label, log);
    try {
      return bracket(
        t.sync("acquire", acquire),
        t.sync("release", release),
        t.sync("use", use),
      );
    } finally {
      t.done();
    }
  }

  function tracedBracketInfallible<R, A, EA = never, EU = never>(
    acquire: () => Result<R, EA>,
    release: (resource: R) => void,
    use: (resource: R) => Result<A, EU>,
  ): Result<A, EA | EU> {
    check({ acquire, release, use });
    const t = tracer(label, log);
    try {
      return bracketInfallible(
        t.sync("acquire", acquire),
        t.sync("release", release),
        t.sync("use", use),
      );
    } finally {
      t.done();
    }
  }

  async function tracedBracketAsync<R, A, EA = never, EU = never, ER = never>(
    acquire: () => Awaitable<Result<R, EA>>,
    release: (resource: R) => Awaitable<Result<void, ER>>,
    use: (resource: R) => Awaitable<Result<A, EU>>,
  ): Promise<BracketOutcome<A, EA, EU, ER>> {
    check({ acquire, release, use });
    const t = tracer(label, log);
    try {
      return await bracketAsync(
        t.async("acquire", acquire),
        t.async("release", release),
        t.async("use", use),
      );
    } finally {
      t.done();
    }
  }

  async function tracedBracketInfallibleAsync<R, A, EA = never, EU = never>(
    acquire: () => Awaitable<Result<R, EA>>,
    release: (resource: R) => Awaitable<void>,
    use: (resource: R) => Awaitable<Result<A, EU>>,
  ): Promise<Result<A, EA | EU>> {
    check({ acquire, release, use });
    const t = tracer(label, log);
    try {
      return await bracketInfallibleAsync(
        t.async("acquire", acquire),
        t.async("release", release),
        t.async("use", use),
      );
    } finally {
      t.done();
    }
  }

  return {
    bracket: tracedBracket,
    bracketInfallible: tracedBracketInfallible,
    bracketAsync: tracedBracketAsync,
    bracketInfallibleAsync: tracedBracketInfallibleAsync,

    withResource<
      R extends Closer<ER>,
      A,
      EA = never,
      EU = never,
      ER = CloseErrorOf<R>,
    >(
      acquire: () => Result<R, EA>,
      use: (resource: R) => Result<A, EU>,
    ): BracketOutcome<A, EA, EU, ER> {
      return tracedBracket(acquire, (resource: R) => resource.close(), use);
    },

    withResourceInfallible<
      R extends InfallibleCloser,
      A,
      EA = never,
      EU = never,
    >(
      acquire: () => Result<R, EA>,
      use: (resource: R) => Result<A, EU>,
    ): Result<A, EA | EU> {
      return tracedBracketInfallible(
        acquire,
        (resource: R) => resource.close(),
        use,
      );
    },

    async withResourceAsync<
      R extends AsyncCloser<ER>,
      A,
      EA = never,
      EU = never,
      ER = CloseErrorOf<R>,
    >(
      acquire: () => Awaitable<Result<R, EA>>,
      use: (resource: R) => Awaitable<Result<A, EU>>,
    ): Promise<BracketOutcome<A, EA, EU, ER>> {
      return await tracedBracketAsync(
        acquire,
        (resource: R) => resource.close(),
        use,
      );
    },

    async withResourceInfallibleAsync<
      R extends AsyncInfallibleCloser,
      A,
      EA = never,
      EU = never,
    >(
      acquire: () => Awaitable<Result<R, EA>>,
      use: (resource: R) => Awaitable<Result<A, EU>>,
    ): Promise<Result<A, EA | EU>> {
      return await tracedBracketInfallibleAsync(
        acquire,
        (resource: R) => resource.close(),
        use,
      );
    },
  };
}
