/**
 * Catalog payloads and hierarchy nodes
 */

import { z } from 'zod'

export type NodeKind = 'category' | 'group' | 'item'

/**
 * One node of the catalog tree. `id` is the parent chain joined with ':'
 * (category "3", group "3:2374", item "3:2374:12345").
 */
export interface HierarchyNode {
  id: string
  kind: NodeKind
  externalId: string
  parentIds: string[]
  name?: string
  data: CatalogObject
}

export type CatalogObject = Record<string, unknown>

export const CategorySchema = z.object({ categoryId: z.number().int(), name: z.string().optional() }).passthrough()
export const GroupSchema = z.object({ groupId: z.number().int(), name: z.string().optional() }).passthrough()
export const ItemSchema = z
  .object({ productId: z.number().int(), name: z.string().optional(), subTypeName: z.string().nullish() })
  .passthrough()

export type CatalogCategory = z.infer<typeof CategorySchema>
export type CatalogGroup = z.infer<typeof GroupSchema>
export type CatalogItem = z.infer<typeof ItemSchema>

/** Envelope every endpoint answers with */
export const EnvelopeSchema = z.object({
  success: z.boolean().optional(),
  errors: z.array(z.unknown()).optional(),
  results: z.array(z.record(z.unknown())),
})

export function nodeId(...parts: Array<string | number>): string {
  return parts.map(String).join(':')
}

export function categoryNode(category: CatalogCategory): HierarchyNode {
  return {
    id: nodeId(category.categoryId),
    kind: 'category',
    externalId: String(category.categoryId),
    parentIds: [],
    name: category.name,
    data: category,
  }
}

export function groupNode(category: HierarchyNode, group: CatalogGroup): HierarchyNode {
  return {
    id: nodeId(category.id, group.groupId),
    kind: 'group',
    externalId: String(group.groupId),
    parentIds: [category.id],
    name: group.name,
    data: group,
  }
}
