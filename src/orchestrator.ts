import type { ConversionState, DependencyEdge, ObjectKey } from './model';
import { compareObjectKeys, objectKeyId } from './model';

/**
 * `pending`: the target exists in the input tree but has no output yet.
 * `missing-source`: nothing in the input tree defines the target, so no later
 * run will produce it.
 */
export type DependencyStatus = 'pending' | 'missing-source';

export interface UnresolvedDependency {
  readonly target: ObjectKey;
  /** Referencing columns across all owners, in first-seen order. */
  readonly columns: readonly string[];
  readonly owners: readonly ObjectKey[];
  readonly status: DependencyStatus;
}

export interface SourceCatalog {
  hasSource(key: ObjectKey): boolean;
}

/**
 * Group the edges whose target has no output yet. Advisory only: the caller
 * emits its output whatever this returns.
 */
export function planDependencies(
  edges: readonly DependencyEdge[],
  state: ConversionState,
  sources?: SourceCatalog
): UnresolvedDependency[] {
  const groups = new Map<string, { target: ObjectKey; columns: string[]; owners: ObjectKey[] }>();

  for (const edge of edges) {
    if (edge.selfReference) continue;
    if (state.hasOutput(edge.to)) continue;

    const id = objectKeyId(edge.to);
    let group = groups.get(id);
    if (!group) {
      group = { target: edge.to, columns: [], owners: [] };
      groups.set(id, group);
    }
    for (const column of edge.columns) {
      if (!group.columns.includes(column)) group.columns.push(column);
    }
    if (!group.owners.some(owner => objectKeyId(owner) === objectKeyId(edge.from))) {
      group.owners.push(edge.from);
    }
  }

  return [...groups.values()]
    .sort((a, b) => compareObjectKeys(a.target, b.target))
    .map((group): UnresolvedDependency => ({
      target: group.target,
      columns: group.columns,
      owners: group.owners,
      status: sources === undefined || sources.hasSource(group.target) ? 'pending' : 'missing-source',
    }));
}
