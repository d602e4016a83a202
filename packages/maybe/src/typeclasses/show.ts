/**
 * Show Typeclass
 *
 * Converts values to a programmer-friendly string. Unlike `toString()`,
 * strings are quoted so that `definitely "1"` and `definitely 1` differ.
 */

export interface Show<A> {
  readonly show: (a: A) => string;
}

export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

export const showBoolean: Show<boolean> = {
  show: (b) => String(b),
};

/**
 * Show for arrays, element-wise.
 */
export function showArray<A>(S: Show<A>): Show<readonly A[]> {
  return {
    show: (as) => `[${as.map(S.show).join(", ")}]`,
  };
}

/**
 * `String(value)`, falling back to the `[object Tag]` form for values with no
 * primitive conversion (such as `Object.create(null)`).
 */
export function display(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
