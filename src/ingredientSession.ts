// Session ingredient state is an ordered list with set semantics. Every operation returns a
// new list; persisting it is up to the caller.

export function mergeIngredients(existing: readonly string[], incoming: readonly string[]): string[] {
  const merged = [...new Set(existing)];
  const present = new Set(merged);
  for (const name of incoming) {
    if (present.has(name)) continue;
    present.add(name);
    merged.push(name);
  }
  return merged;
}

export function addIngredient(existing: readonly string[], name: string): string[] {
  return mergeIngredients(existing, [name]);
}
