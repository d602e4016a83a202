/**
 * Law Verification
 *
 * Runs laws against deterministic generated inputs. Trial `n` draws argument
 * `i` from `arbitraries[i]` (or the last arbitrary when fewer are given)
 * with seed `n * arity + i`.
 *
 * @module
 */

import { config, createLogger, invariant } from "@knowable/core";
import { LawViolationError } from "../errors/errors.js";
import { display } from "../typeclasses/show.js";
import type { Arbitrary } from "./arbitrary.js";
import type { Law, LawSet } from "./types.js";

const log = createLogger("laws");

const DEFAULT_ITERATIONS = 100;

export interface CheckOptions {
  /** Trials per law. Defaults to the `laws.iterations` config value. */
  readonly iterations?: number;
}

export interface LawCheckResult {
  readonly law: string;
  readonly passed: boolean;
  /** Trials run, including the failing one */
  readonly trials: number;
  readonly counterexample?: readonly unknown[];
  /** What the check threw, when it threw */
  readonly error?: unknown;
}

/**
 * Configured number of trials per law.
 */
export function defaultIterations(): number {
  const configured = config.get("laws.iterations");
  return typeof configured === "number" && Number.isInteger(configured) && configured > 0
    ? configured
    : DEFAULT_ITERATIONS;
}

function generateArgs(
  arity: number,
  arbitraries: readonly Arbitrary<unknown>[],
  trial: number
): unknown[] {
  const args: unknown[] = [];
  for (let i = 0; i < arity; i++) {
    const arb = arbitraries[Math.min(i, arbitraries.length - 1)];
    args.push(arb.arbitrary(trial * arity + i));
  }
  return args;
}

export function checkLaw(
  law: Law,
  arbitraries: readonly Arbitrary<unknown>[],
  options: CheckOptions = {}
): LawCheckResult {
  const iterations = options.iterations ?? defaultIterations();
  invariant(iterations > 0, `iterations must be positive, got ${iterations}`);
  invariant(
    law.arity === 0 || arbitraries.length > 0,
    `Law "${law.name}" takes ${law.arity} argument(s) but no arbitraries were given`
  );

  for (let trial = 0; trial < iterations; trial++) {
    const args = generateArgs(law.arity, arbitraries, trial);
    try {
      if (!law.check(...args)) {
        log.debug(`${law.name} failed on trial ${trial + 1}`, args);
        return { law: law.name, passed: false, trials: trial + 1, counterexample: args };
      }
    } catch (error) {
      log.debug(`${law.name} threw on trial ${trial + 1}`, error);
      return { law: law.name, passed: false, trials: trial + 1, counterexample: args, error };
    }
  }

  log.debug(`${law.name} held for ${iterations} trials`);
  return { law: law.name, passed: true, trials: iterations };
}

export function checkLaws(
  laws: LawSet,
  arbitraries: readonly Arbitrary<unknown>[],
  options: CheckOptions = {}
): LawCheckResult[] {
  return laws.map((law) => checkLaw(law, arbitraries, options));
}

/**
 * Checks the laws in order and stops at the first that does not hold.
 *
 * @throws LawViolationError for the first law that does not hold
 */
export function assertLaws(
  laws: LawSet,
  arbitraries: readonly Arbitrary<unknown>[],
  options: CheckOptions = {}
): void {
  for (const law of laws) {
    const result = checkLaw(law, arbitraries, options);
    if (!result.passed) {
      const counterexample = (result.counterexample ?? []).map(display);
      throw new LawViolationError(result.law, counterexample, result.error);
    }
  }
}
