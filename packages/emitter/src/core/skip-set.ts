/**
 * Skip-Set Indexer
 *
 * Selector paths name places inside a value: `Field`, `Outer.Inner`,
 * `List[i]` for slice and array elements, `Table[k]` for map entries and
 * their values, `Table[key]` for map keys. Skipping `Table[k]` leaves the
 * whole entry shallow. Pointer dereferences add nothing to a path.
 */

export type SkipSet = ReadonlySet<string>;

export const emptySkipSet: SkipSet = new Set<string>();

/**
 * Split a comma-separated selector list. Entries are trimmed and empty
 * entries are dropped.
 */
export const parseSkipSelectors = (value: string): SkipSet =>
  new Set(
    value
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  );

/**
 * Skip occurrences pair with type occurrences by position; a type with
 * no matching occurrence skips nothing.
 */
export const skipSetFor = (
  skipLists: readonly string[],
  index: number
): SkipSet => {
  const value = skipLists[index];
  return value === undefined ? emptySkipSet : parseSkipSelectors(value);
};

export const fieldPath = (parent: string, name: string): string =>
  parent === "" ? name : `${parent}.${name}`;

export const elementPath = (parent: string): string => `${parent}[i]`;

export const entryPath = (parent: string): string => `${parent}[k]`;

export const keyPath = (parent: string): string => `${parent}[key]`;
