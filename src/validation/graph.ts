export interface GraphCheck {
  label: string
  depends?: readonly string[]
  /** Position reported in errors; defaults to the position in the input. */
  index?: number
}

export interface DependencyNode {
  label: string
  /** Position of the first check declaring this label. */
  index: number
  depends: string[]
}

/**
 * Nodes and edges kept in flat collections keyed by label; nodes never hold
 * references to each other.
 */
export interface DependencyGraph {
  nodes: Map<string, DependencyNode>
  /** label -> labels that declare it as a dependency (known labels only). */
  dependents: Map<string, string[]>
}

export function buildGraph(checks: readonly GraphCheck[]): DependencyGraph {
  const nodes = new Map<string, DependencyNode>()
  checks.forEach((check, index) => {
    const existing = nodes.get(check.label)
    if (existing) {
      existing.depends.push(...(check.depends ?? []))
      return
    }
    nodes.set(check.label, { label: check.label, index: check.index ?? index, depends: [...(check.depends ?? [])] })
  })

  const dependents = new Map<string, string[]>()
  for (const node of nodes.values()) {
    for (const dep of node.depends) {
      if (!nodes.has(dep)) continue
      const list = dependents.get(dep) ?? []
      list.push(node.label)
      dependents.set(dep, list)
    }
  }
  return { nodes, dependents }
}

/**
 * Kahn's algorithm. Returns the labels never reached from a zero in-degree
 * start, sorted. That is every cycle member plus anything downstream of a
 * cycle, not a minimal cycle.
 */
export function findUnorderedLabels(graph: DependencyGraph): string[] {
  const inDegree = new Map<string, number>()
  for (const node of graph.nodes.values()) {
    inDegree.set(node.label, node.depends.filter(dep => graph.nodes.has(dep)).length)
  }

  const queue = [...inDegree].filter(([, deg]) => deg === 0).map(([label]) => label)
  const visited = new Set<string>()
  while (queue.length) {
    const label = queue.shift()
    if (label === undefined) break
    visited.add(label)
    for (const child of graph.dependents.get(label) ?? []) {
      const deg = (inDegree.get(child) ?? 0) - 1
      inDegree.set(child, deg)
      if (deg === 0) queue.push(child)
    }
  }

  return [...graph.nodes.keys()].filter(label => !visited.has(label)).sort()
}

/**
 * Semantic checks over checks that already passed schema validation:
 * duplicate labels, dependencies on unknown labels, and cycles.
 */
export function validateGraph(checks: readonly GraphCheck[]): string[] {
  const errors: string[] = []
  const seen = new Set<string>()
  checks.forEach((check, i) => {
    if (seen.has(check.label)) errors.push(`checks[${check.index ?? i}].label: duplicate label '${check.label}'`)
    seen.add(check.label)
  })

  checks.forEach((check, i) => {
    for (const dep of check.depends ?? []) {
      if (!seen.has(dep)) errors.push(`checks[${check.index ?? i}].depends: unknown label '${dep}'`)
    }
  })

  const cycle = findUnorderedLabels(buildGraph(checks))
  if (cycle.length) {
    errors.push(`dependency cycle detected among: ${cycle.join(', ')}`)
  }
  return errors
}

/**
 * label -> sorted labels that depend on it. Annotation only; it has no say in
 * whether a check passes.
 */
export function requiredByHints(checks: readonly GraphCheck[]): Map<string, string[]> {
  const hints = new Map<string, string[]>()
  for (const check of checks) {
    for (const dep of check.depends ?? []) {
      const list = hints.get(dep) ?? []
      list.push(check.label)
      hints.set(dep, list)
    }
  }
  for (const list of hints.values()) list.sort()
  return hints
}
