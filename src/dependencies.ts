import type { DependencyEdge, Diagnostic, ObjectKey, TargetConstraint, TargetStatement } from './model';
import { objectKeyId, sameObjectKey } from './model';

/**
 * Collect one edge per (owner, target) pair from the foreign keys of the
 * transformed statements. Columns are unioned in first-seen order.
 */
export function extractDependencies(statements: readonly TargetStatement[]): DependencyEdge[] {
  const edges = new Map<string, { from: ObjectKey; to: ObjectKey; columns: string[] }>();

  const add = (owner: ObjectKey, constraint: TargetConstraint) => {
    if (constraint.kind !== 'foreignKey' || constraint.references === undefined) return;
    const target = constraint.references.table;
    const id = `${objectKeyId(owner)}->${objectKeyId(target)}`;
    let edge = edges.get(id);
    if (!edge) {
      edge = { from: owner, to: target, columns: [] };
      edges.set(id, edge);
    }
    for (const column of constraint.columns) {
      if (!edge.columns.includes(column.name)) edge.columns.push(column.name);
    }
  };

  for (const statement of statements) {
    if (statement.kind === 'table') {
      for (const element of statement.elements) {
        if (element.kind === 'constraint') add(statement.key, element.constraint);
      }
    } else if (statement.kind === 'alterTable' && statement.action.kind === 'addConstraint') {
      add(statement.key, statement.action.constraint);
    }
  }

  return [...edges.values()].map(edge => ({
    from: edge.from,
    to: edge.to,
    columns: edge.columns,
    selfReference: sameObjectKey(edge.from, edge.to),
  }));
}

/**
 * Self references and mutual foreign-key cycles, one note each. Informational
 * only; conversion never stops for them.
 */
export function findDependencyCycles(edges: readonly DependencyEdge[]): Diagnostic[] {
  const notes: Diagnostic[] = [];

  for (const edge of edges) {
    if (edge.selfReference) {
      const id = objectKeyId(edge.from);
      notes.push({ kind: 'dependency-cycle', subject: id, message: `${id} references itself (${edge.columns.join(', ')})` });
    }
  }

  for (const component of stronglyConnected(edges)) {
    if (component.length < 2) continue;
    const ids = component.map(objectKeyId);
    notes.push({
      kind: 'dependency-cycle',
      subject: ids.join(', '),
      message: `Foreign keys form a cycle: ${[...ids, ids[0]].join(' → ')}`,
    });
  }

  return notes;
}

/** Tarjan's algorithm; components come out in a stable order. */
function stronglyConnected(edges: readonly DependencyEdge[]): ObjectKey[][] {
  const keys = new Map<string, ObjectKey>();
  const next = new Map<string, string[]>();
  for (const edge of edges) {
    const from = objectKeyId(edge.from);
    const to = objectKeyId(edge.to);
    keys.set(from, edge.from);
    keys.set(to, edge.to);
    if (from === to) continue;
    const targets = next.get(from) ?? [];
    targets.push(to);
    next.set(from, targets);
  }

  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: ObjectKey[][] = [];
  let counter = 0;

  function visit(id: string) {
    index.set(id, counter);
    lowLink.set(id, counter);
    counter++;
    stack.push(id);
    onStack.add(id);

    for (const target of next.get(id) ?? []) {
      if (!index.has(target)) {
        visit(target);
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, lowLink.get(target) ?? 0));
      } else if (onStack.has(target)) {
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, index.get(target) ?? 0));
      }
    }

    if (lowLink.get(id) === index.get(id)) {
      const component: ObjectKey[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        const key = keys.get(member);
        if (key) component.push(key);
      } while (member !== id);
      components.push(component.sort((a, b) => objectKeyId(a).localeCompare(objectKeyId(b))));
    }
  }

  for (const id of [...keys.keys()].sort()) {
    if (!index.has(id)) visit(id);
  }

  return components;
}

/**
 * Order items so that every item comes after the items it depends on, keeping
 * input order where nothing constrains it. Items sharing a key stay adjacent.
 * A dependency back onto a key still being placed is ignored, which breaks
 * cycles at their closing edge.
 */
export function orderByDependency<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  dependsOn: ReadonlyMap<string, ReadonlySet<string>>
): T[] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(keyOf(item));
    if (group) group.push(item);
    else groups.set(keyOf(item), [item]);
  }

  const ordered: T[] = [];
  const state = new Map<string, 'placing' | 'placed'>();
  for (const root of groups.keys()) {
    if (state.has(root)) continue;
    state.set(root, 'placing');
    const trail = [{ key: root, pending: [...(dependsOn.get(root) ?? [])] }];
    while (trail.length > 0) {
      const top = trail[trail.length - 1];
      const next = top.pending.shift();
      if (next === undefined) {
        trail.pop();
        state.set(top.key, 'placed');
        ordered.push(...(groups.get(top.key) ?? []));
      } else if (!state.has(next)) {
        state.set(next, 'placing');
        trail.push({ key: next, pending: [...(dependsOn.get(next) ?? [])] });
      }
    }
  }
  return ordered;
}
