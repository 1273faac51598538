/**
 * Build the fixed, ordered slot label set: A1, A2, … A{count}.
 */
export function buildSlotLabels(count: number, prefix = 'A'): string[] {
  return Array.from({ length: Math.max(0, count) }, (_, i) => `${prefix}${i + 1}`)
}

/**
 * First label in `labels` order that no active stay references.
 * Returns null when every label is taken.
 */
export function firstFreeSlot(
  labels: readonly string[],
  occupied: ReadonlySet<string>,
): string | null {
  for (const label of labels) {
    if (!occupied.has(label)) return label
  }
  return null
}
