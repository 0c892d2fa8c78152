/**
 * Tag helpers for catalog items.
 *
 * Radarr v6 requires tag labels to match `^[a-z0-9-]+$`, so the engine tag
 * label is normalized before it is looked up or created.
 */

/**
 * @example
 * normalizeTagLabel('Upgrade CF') // 'upgrade-cf'
 * normalizeTagLabel('--test--') // 'test'
 */
export function normalizeTagLabel(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
}

export function hasTag(tags: readonly number[] | undefined, tagId: number) {
  return (tags ?? []).includes(tagId)
}

/** Union of `tags` and `tagId`, sorted ascending. */
export function withTag(tags: readonly number[] | undefined, tagId: number) {
  return [...new Set([...(tags ?? []), tagId])].sort((a, b) => a - b)
}

export function withoutTag(
  tags: readonly number[] | undefined,
  tagId: number,
) {
  return (tags ?? []).filter((id) => id !== tagId)
}
