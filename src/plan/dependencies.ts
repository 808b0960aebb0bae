/** A depends_on problem. Advisory: execution order is always plan order. */
export interface DependencyIssue {
  type: "dangling_dep" | "cycle";
  message: string;
  context: Record<string, unknown>;
}

interface DependencyNode {
  id: string;
  depends_on: string[];
}

/**
 * Report dangling references and dependency cycles.
 * Returns every dangling edge and at most one cycle.
 */
export function checkDependencies(tasks: readonly DependencyNode[]): DependencyIssue[] {
  const issues: DependencyIssue[] = [];
  const known = new Set(tasks.map((t) => t.id));

  for (const task of tasks) {
    for (const dep of task.depends_on) {
      if (!known.has(dep)) {
        issues.push({
          type: "dangling_dep",
          message: `Task "${task.id}" depends on unknown task "${dep}"`,
          context: { from: task.id, to: dep },
        });
      }
    }
  }

  const cycle = detectCycle(tasks);
  if (cycle) {
    issues.push({
      type: "cycle",
      message: `Task dependency cycle: ${cycle.join(" → ")}`,
      context: { cycle },
    });
  }

  return issues;
}

/** DFS cycle detection. Returns the cycle path if found, null if acyclic. */
export function detectCycle(tasks: readonly DependencyNode[]): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const edges = new Map(tasks.map((t) => [t.id, t.depends_on]));
  const color = new Map<string, number>();
  for (const id of edges.keys()) color.set(id, WHITE);

  const path: string[] = [];

  function visit(node: string): string[] | null {
    color.set(node, GRAY);
    path.push(node);

    for (const neighbor of edges.get(node) ?? []) {
      const state = color.get(neighbor);
      if (state === GRAY) {
        return [...path.slice(path.indexOf(neighbor)), neighbor];
      }
      if (state === WHITE) {
        const cycle = visit(neighbor);
        if (cycle) return cycle;
      }
    }

    path.pop();
    color.set(node, BLACK);
    return null;
  }

  for (const id of edges.keys()) {
    if (color.get(id) === WHITE) {
      const cycle = visit(id);
      if (cycle) return cycle;
    }
  }
  return null;
}
