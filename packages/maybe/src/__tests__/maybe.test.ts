/**
 * Maybe Tests
 */
import { describe, it, expect, vi } from "vitest";
import {
  Maybe,
  definitely,
  fromPredicate,
  isMaybe,
  maybe,
  nothing,
  unknown,
} from "../data/maybe.js";
import {
  ErrorConstructionError,
  IllegalArgumentError,
  MissingValueError,
} from "../errors/errors.js";
import { illegalState, supplier } from "../errors/suppliers.js";
import { eqBy, eqNumber } from "../typeclasses/eq.js";
import { thrownBy } from "./helpers.js";

class Exploding extends Error {
  constructor() {
    super("never");
    throw new RangeError("refused");
  }
}

// ============================================================================
// Constructors
// ============================================================================

describe("constructors", () => {
  it("definitely should wrap a value", () => {
    const m = definitely(42);
    expect(m.isKnown()).toBe(true);
    expect(m.isEmpty()).toBe(false);
  });

  it("unknown and nothing should be empty", () => {
    expect(unknown().isKnown()).toBe(false);
    expect(unknown().isEmpty()).toBe(true);
    expect(nothing().isEmpty()).toBe(true);
  });

  it("definitely should keep null and undefined as known values", () => {
    expect(definitely(null).isKnown()).toBe(true);
    expect(definitely(undefined).isKnown()).toBe(true);
  });

  it("maybe should map null and undefined to unknown", () => {
    expect(maybe(null).isEmpty()).toBe(true);
    expect(maybe(undefined).isEmpty()).toBe(true);
    expect(maybe("x").equals(definitely("x"))).toBe(true);
  });

  it("maybe should keep falsy values", () => {
    expect(maybe(0).isKnown()).toBe(true);
    expect(maybe("").isKnown()).toBe(true);
    expect(maybe(false).isKnown()).toBe(true);
  });

  it("fromPredicate should keep values that satisfy the predicate", () => {
    const isEven = (n: number) => n % 2 === 0;
    expect(fromPredicate(4, isEven).equals(definitely(4))).toBe(true);
    expect(fromPredicate(3, isEven).isEmpty()).toBe(true);
  });

  it("static constructors should match the functions", () => {
    expect(Maybe.definitely(1).equals(definitely(1))).toBe(true);
    expect(Maybe.unknown<number>().equals(unknown())).toBe(true);
    expect(Maybe.nothing<number>().isEmpty()).toBe(true);
    expect(Maybe.maybe<string>(null).isEmpty()).toBe(true);
  });

  it("isMaybe should recognize instances only", () => {
    expect(isMaybe(definitely(1))).toBe(true);
    expect(isMaybe(unknown())).toBe(true);
    expect(isMaybe(null)).toBe(false);
    expect(isMaybe({ isKnown: () => true })).toBe(false);
  });
});

// ============================================================================
// Defaults
// ============================================================================

describe("otherwise", () => {
  it("should return the value when known", () => {
    expect(definitely(5).otherwise(10)).toBe(5);
  });

  it("should return the default unchanged when unknown", () => {
    const fallback = { port: 8080 };
    expect(unknown<{ port: number }>().otherwise(fallback)).toBe(fallback);
    expect(unknown<number>().otherwise(10)).toBe(10);
  });

  it("should keep a known Maybe over the alternative", () => {
    const five = definitely(5);
    expect(five.otherwise(definitely(10))).toBe(five);
    expect(definitely(5).otherwise(definitely(10)).equals(definitely(5))).toBe(true);
  });

  it("should fall back to the alternative Maybe when unknown", () => {
    const ten = definitely(10);
    expect(unknown<number>().otherwise(ten)).toBe(ten);
    expect(unknown<number>().otherwise(definitely(10)).equals(definitely(10))).toBe(true);
  });

  it("should take defaults on an unknown() without a type argument", () => {
    const port: number = unknown().otherwise(8080);
    const fallback: Maybe<number> = unknown().otherwise(definitely(10));

    expect(port).toBe(8080);
    expect(fallback.equals(definitely(10))).toBe(true);
    expect(unknown().orElse(definitely("x")).equals(definitely("x"))).toBe(true);
  });

  it("should widen to the default's type", () => {
    const value: number | string = definitely(5).otherwise("none");
    expect(value).toBe(5);
  });

  it("should chain fallback sources", () => {
    const resolved = unknown<string>()
      .otherwise(unknown<string>())
      .otherwise(definitely("file"))
      .otherwise("default");
    expect(resolved).toBe("file");
  });
});

describe("otherwiseValue, otherwiseGet and orElse", () => {
  it("otherwiseValue should treat a Maybe default as a plain value", () => {
    const inner = definitely(1);
    expect(unknown<Maybe<number>>().otherwiseValue(inner)).toBe(inner);
    expect(definitely(inner).otherwiseValue(definitely(2))).toBe(inner);
  });

  it("otherwiseGet should only compute the default when unknown", () => {
    const compute = vi.fn(() => 9);

    expect(definitely(1).otherwiseGet(compute)).toBe(1);
    expect(compute).not.toHaveBeenCalled();

    expect(unknown<number>().otherwiseGet(compute)).toBe(9);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("orElse should pick the first known Maybe", () => {
    const three = definitely(3);
    expect(unknown<number>().orElse(three)).toBe(three);
    expect(definitely(1).orElse(three).equals(definitely(1))).toBe(true);
  });
});

// ============================================================================
// Transformations
// ============================================================================

describe("map", () => {
  it("should apply the function to a known value", () => {
    expect(definitely(2).map((n) => n * 3).equals(definitely(6))).toBe(true);
  });

  it("should never call the function on unknown", () => {
    const f = vi.fn((n: number) => n * 3);
    const mapped = unknown<number>().map(f);

    expect(mapped.isEmpty()).toBe(true);
    expect(f).not.toHaveBeenCalled();
  });

  it("should keep a null result as a known value", () => {
    const mapped = definitely(1).map(() => null);
    expect(mapped.isKnown()).toBe(true);
    expect(mapped.equals(definitely(null))).toBe(true);
  });

  it("should return a new instance and leave the original alone", () => {
    const original = definitely(1);
    const mapped = original.map((n) => n + 1);

    expect(mapped).not.toBe(original);
    expect(original.otherwise(0)).toBe(1);
    expect(mapped.otherwise(0)).toBe(2);
  });

  it("to should be an alias of map", () => {
    expect(definitely("ab").to((s) => s.length).equals(definitely(2))).toBe(true);
    expect(unknown<string>().to((s) => s.length).isEmpty()).toBe(true);
  });
});

describe("query", () => {
  it("should wrap the predicate result when known", () => {
    expect(definitely(4).query((n) => n > 3).equals(definitely(true))).toBe(true);
  });

  it("should distinguish a false result from no value", () => {
    const tested = definitely(1).query((n) => n > 3);
    expect(tested.isKnown()).toBe(true);
    expect(tested.equals(definitely(false))).toBe(true);
  });

  it("should never call the predicate on unknown", () => {
    const p = vi.fn((n: number) => n > 3);
    const queried = unknown<number>().query(p);

    expect(queried.isEmpty()).toBe(true);
    expect(p).not.toHaveBeenCalled();
  });
});

describe("fold", () => {
  it("should dispatch on the variant", () => {
    expect(definitely(2).fold(() => "none", (n) => `n=${n}`)).toBe("n=2");
    expect(unknown<number>().fold(() => "none", (n) => `n=${n}`)).toBe("none");
  });
});

// ============================================================================
// otherwiseThrow
// ============================================================================

describe("otherwiseThrow", () => {
  it("should return a known value without calling the supplier", () => {
    const get = vi.fn(() => new MissingValueError());

    expect(definitely(3).otherwiseThrow({ get })).toBe(3);
    expect(get).not.toHaveBeenCalled();
  });

  it("should throw exactly the error the supplier produces", () => {
    const error = new MissingValueError("gone");

    const thrown = thrownBy(MissingValueError, () =>
      unknown<number>().otherwiseThrow(supplier(() => error))
    );

    expect(thrown).toBe(error);
  });

  it("should accept the provided suppliers", () => {
    expect(() => unknown<number>().otherwiseThrow(illegalState("closed"))).toThrow("closed");
  });

  it("should construct an error class without a message", () => {
    const thrown = thrownBy(IllegalArgumentError, () =>
      unknown<number>().otherwiseThrow(IllegalArgumentError)
    );

    expect(thrown.name).toBe("IllegalArgumentError");
    expect(thrown.message).toBe("");
  });

  it("should construct an error class with a message", () => {
    expect(() => unknown<number>().otherwiseThrow(IllegalArgumentError, "bad input")).toThrow(
      new IllegalArgumentError("bad input")
    );
    expect(() => unknown<number>().otherwiseThrow(TypeError, "wrong")).toThrow(TypeError);
  });

  it("should not construct the error class when known", () => {
    expect(definitely("ok").otherwiseThrow(Exploding)).toBe("ok");
  });

  it("should report a failing constructor as a construction error", () => {
    const thrown = thrownBy(ErrorConstructionError, () =>
      unknown<number>().otherwiseThrow(Exploding)
    );

    expect(thrown.kind).toBe("Exploding");
    expect(thrown.message).toBe("Could not construct error of kind Exploding: refused");
    expect(thrown.cause).toBeInstanceOf(RangeError);
  });

  it("should reject an argument that is neither a supplier nor a class", () => {
    const thrown = thrownBy(ErrorConstructionError, () =>
      unknown<number>().otherwiseThrow(JSON.parse("{}"))
    );

    expect(thrown.message).toBe(
      "Could not construct error of kind [object Object]: expected an error supplier or error class"
    );
    expect(thrown.cause).toBeInstanceOf(TypeError);
  });
});

// ============================================================================
// Iteration
// ============================================================================

describe("iteration", () => {
  it("known should yield its value once", () => {
    expect([...definitely(7)]).toEqual([7]);
    expect(definitely(7).toArray()).toEqual([7]);
  });

  it("unknown should yield nothing", () => {
    expect([...unknown()]).toEqual([]);
    expect(Array.from(unknown<number>())).toEqual([]);
  });

  it("should work with for...of", () => {
    const seen: string[] = [];
    for (const name of maybe("ada")) seen.push(name);
    for (const name of maybe<string>(null)) seen.push(name);
    expect(seen).toEqual(["ada"]);
  });

  it("should flatten a list of Maybes", () => {
    const values = [definitely(1), unknown<number>(), definitely(3)].flatMap((m) => [...m]);
    expect(values).toEqual([1, 3]);
  });
});

// ============================================================================
// Equality
// ============================================================================

describe("equals", () => {
  it("should compare known values", () => {
    expect(definitely(1).equals(definitely(1))).toBe(true);
    expect(definitely(1).equals(definitely(2))).toBe(false);
  });

  it("unknown should equal unknown", () => {
    expect(unknown().equals(unknown())).toBe(true);
    expect(maybe(null).equals(unknown())).toBe(true);
  });

  it("known and unknown should never be equal", () => {
    expect(unknown<number>().equals(definitely(1))).toBe(false);
    expect(definitely(1).equals(unknown())).toBe(false);
    expect(definitely(null).equals(unknown())).toBe(false);
  });

  it("should use Object.is for plain values", () => {
    expect(definitely(NaN).equals(definitely(NaN))).toBe(true);
    expect(definitely({ a: 1 }).equals(definitely({ a: 1 }))).toBe(false);
  });

  it("should accept an explicit Eq", () => {
    const byA = eqBy(eqNumber, (o: { a: number }) => o.a);
    expect(definitely({ a: 1 }).equals(definitely({ a: 1 }), byA)).toBe(true);
    expect(definitely({ a: 1 }).equals(definitely({ a: 2 }), byA)).toBe(false);
  });

  it("should compare nested Maybes structurally", () => {
    expect(definitely(definitely(1)).equals(definitely(definitely(1)))).toBe(true);
    expect(definitely(unknown<number>()).equals(definitely(unknown<number>()))).toBe(true);
    expect(definitely(definitely(1)).equals(definitely(unknown<number>()))).toBe(false);
  });
});

describe("toString", () => {
  it("should describe both variants", () => {
    expect(definitely(5).toString()).toBe("definitely 5");
    expect(unknown().toString()).toBe("unknown");
    expect(`${definitely("x")}`).toBe("definitely x");
    expect(String(definitely(null))).toBe("definitely null");
  });

  it("should render values with no string conversion", () => {
    expect(definitely(Object.create(null)).toString()).toBe("definitely [object Object]");
  });
});
