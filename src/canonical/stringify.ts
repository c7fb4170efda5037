/**
 * Turns a runtime value standing in for a type into annotation text.
 *
 * Classes and constructors are spelled like a runtime type repr,
 * `<class 'Name'>`, which the pattern cleaner unwraps to the bare name.
 */

export function stringifyAnnotation(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "None";
  }
  if (typeof value === "function") {
    return value.name ? `<class '${value.name}'>` : "Callable";
  }
  try {
    return String(value);
  } catch {
    // Objects with a throwing toString, or a null prototype
    return Object.prototype.toString.call(value);
  }
}
