/** One past the highest stored id; 1 for an empty list. Gaps left by deletes are not refilled. */
export function nextId(items: ReadonlyArray<{ id: number }>): number {
  return items.reduce((max, item) => Math.max(max, item.id), 0) + 1;
}
