import {
  bracket,
  createBrackets,
  err,
  isCombinedError,
  matchResult,
  ok,
  type Result,
} from "../../packages/core/mod.ts";
import { makeLogger } from "../../packages/host-node/mod.ts";

/**
 * A connection whose close can fail, walked through every outcome shape.
 */

type Conn = { id: number; close(): Result<void, string> };

const open = (id: number, closeFails = false): Result<Conn, string> =>
  id < 0 ? err("EA") : ok({
    id,
    close: (): Result<void, string> => (closeFails ? err("E2") : ok()),
  });

const report = <A>(label: string, outcome: Result<A, unknown>) =>
  matchResult(
    outcome,
    (value) => console.log(`✓ ${label}:`, value),
    (error) =>
      isCombinedError(error)
        ? console.error(
          `✗ ${label}: use=${String(error.useError)} release=${
            String(error.releaseError)
          }`,
        )
        : console.error(`✗ ${label}:`, error),
  );

console.log("\n=== Plain bracket ===\n");

report(
  "both succeed",
  bracket(() => open(1), (c) => c.close(), (c) => ok(`used ${c.id}`)),
);
report(
  "acquire fails",
  bracket(() => open(-1), (c) => c.close(), () => ok("never")),
);
report(
  "use fails",
  bracket(() => open(2), (c) => c.close(), () => err("E1")),
);
report(
  "release fails",
  bracket(() => open(3, true), (c) => c.close(), () => ok("written")),
);
report(
  "both fail",
  bracket(() => open(4, true), (c) => c.close(), () => err("E1")),
);

console.log("\n=== Traced brackets ===\n");

const traced = createBrackets({ label: "conn", log: makeLogger("debug") });

report("traced", traced.withResource(() => open(5, true), () => err("E1")));
