import { z } from 'zod'

export const NODE_STATES = ['pending', 'in_progress', 'completed', 'failed'] as const
export type NodeState = (typeof NODE_STATES)[number]

export const NodeEntrySchema = z.object({
  kind: z.enum(['category', 'group', 'item']),
  parentId: z.string().nullable(),
  state: z.enum(NODE_STATES),
  attempts: z.number().int().nonnegative(),
  throttles: z.number().int().nonnegative(),
  records: z.number().int().nonnegative(),
  error: z.string().optional(),
  updatedAt: z.string(),
})

export const CheckpointDocumentSchema = z.object({
  version: z.literal(1),
  startedAt: z.string(),
  updatedAt: z.string(),
  runs: z.number().int().nonnegative(),
  nodes: z.record(NodeEntrySchema),
})

export type NodeEntry = z.infer<typeof NodeEntrySchema>
export type CheckpointDocument = z.infer<typeof CheckpointDocumentSchema>

/** Where the checkpoint document lives */
export interface CheckpointBackend {
  /** null when nothing was saved yet */
  read(): Promise<CheckpointDocument | null>
  /** Durable once resolved */
  write(document: CheckpointDocument): Promise<void>
  describe(): string
}

export interface CheckpointStatus {
  counts: Record<NodeState, number>
  countsByKind: Record<NodeEntry['kind'], number>
  startedAt: string
  updatedAt: string
  runs: number
  totalRecords: number
  canResume: boolean
  failed: Array<{ id: string; error?: string }>
}
