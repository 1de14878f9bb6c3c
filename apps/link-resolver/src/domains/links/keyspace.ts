import type { ItemId } from "./model/link.model"

/** `<prefix>:links:<itemId>`; the prefix separates services sharing one Redis. */
export function linkCacheKey(prefix: string, itemId: ItemId): string {
  return `${prefix}:links:${itemId}`
}

export function targetUrlFor(template: string, itemId: ItemId): string {
  return template.replaceAll("{id}", encodeURIComponent(itemId))
}
