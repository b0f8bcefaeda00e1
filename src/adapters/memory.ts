import type {
  ChildRecord,
  ParentEntity,
  PreparedRank,
  RankBackend,
  ReferencePolicy,
  ResolvedRankOptions,
} from '../types'
import { rankByChildCount, type ChildRelation } from '../aggregator'

export interface MemoryBackendConfig {
  parents: readonly ParentEntity[]
  children: ChildRelation
  references?: ReferencePolicy
  onDanglingReference?: (child: ChildRecord) => void
}

export function createMemoryBackend(config: MemoryBackendConfig): RankBackend {
  const { parents, children, references, onDanglingReference } = config

  return {
    kind: 'memory',
    prepare(options: ResolvedRankOptions): PreparedRank {
      return {
        backend: 'memory',
        query: `rankByChildCount(${parents.length} parents)`,
        params: [],
        execute: async () =>
          rankByChildCount(parents, children, {
            ...options,
            references,
            onDanglingReference,
          }),
      }
    },
  }
}
