/**
 * Building blocks shared by every partial configuration type.
 *
 * A partial field is `undefined` while unset. Each combinator below is
 * associative and has the unset (or empty) value as its identity, so config
 * layers compose the same way however they are grouped.
 */

/** A single-valued field where the rightmost set value wins. */
export type Last<T> = T | undefined;

export function combineLast<T>(left: Last<T>, right: Last<T>): Last<T> {
  return right === undefined ? left : right;
}

/** Key-wise union; on collision the right operand's entry wins. */
export function combineRecord<V>(
  left: Readonly<Record<string, V>>,
  right: Readonly<Record<string, V>>
): Record<string, V> {
  return { ...left, ...right };
}

/** Same union as {@link combineRecord}, keyed by position. */
export function combineIndexed<V>(
  left: Readonly<Record<number, V>>,
  right: Readonly<Record<number, V>>
): Record<number, V> {
  return { ...left, ...right };
}

/**
 * Merge optional sub-configs. An unset side never erases the other; when both
 * are set they are merged with `combine`, so the right side's explicit fields
 * win.
 */
export function combineOptional<T>(
  left: T | undefined,
  right: T | undefined,
  combine: (left: T, right: T) => T
): T | undefined {
  if (left === undefined) return right;
  if (right === undefined) return left;
  return combine(left, right);
}

export type Validation<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly string[] };

export function succeed<T>(value: T): Validation<T> {
  return { ok: true, value };
}

export function fail(...errors: string[]): Validation<never> {
  return { ok: false, errors };
}

export function errorsOf(validation: Validation<unknown>): readonly string[] {
  return validation.ok ? [] : validation.errors;
}

/** Fails iff the field was never set. */
export function getOption<T>(optionName: string, value: Last<T>): Validation<T> {
  return value === undefined ? fail(`Missing ${optionName} option`) : succeed(value);
}

export function mapValidation<A, B>(validation: Validation<A>, f: (value: A) => B): Validation<B> {
  return validation.ok ? succeed(f(validation.value)) : validation;
}

/**
 * Run two validations independently. Failures are concatenated rather than
 * stopping at the first one.
 */
export function accumulate<A, B, C>(
  left: Validation<A>,
  right: Validation<B>,
  combine: (left: A, right: B) => C
): Validation<C> {
  if (left.ok && right.ok) {
    return succeed(combine(left.value, right.value));
  }
  return { ok: false, errors: [...errorsOf(left), ...errorsOf(right)] };
}

/** Every error of every given validation, in argument order. */
export function collectErrors(...validations: Validation<unknown>[]): Validation<never> {
  return { ok: false, errors: validations.flatMap(errorsOf) };
}

/** Prefix every error message, e.g. `"postgresConfig: "`. */
export function addErrorContext<T>(context: string, validation: Validation<T>): Validation<T> {
  if (validation.ok) return validation;
  return { ok: false, errors: validation.errors.map(error => context + error) };
}

/** Validate a value only when it is present. */
export function validateOptional<A, B>(
  value: A | undefined,
  validate: (value: A) => Validation<B>
): Validation<B | undefined> {
  return value === undefined ? succeed(undefined) : validate(value);
}
