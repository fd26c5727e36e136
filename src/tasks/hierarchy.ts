export interface HierarchyTask {
  id: string;
  title: string;
  parentId?: string;
  projectId?: string;
  projectName?: string;
}

export interface FlattenedTask<T> {
  task: T;
  /** Titles from the root down to the task, joined with " > ". */
  path: string;
  project: string;
  /** `[Project] > path`, or just the path when the project is unknown. */
  flattenedName: string;
}

const SEPARATOR = ' > ';

/**
 * Parent/child view over a flat task list. Parents are looked up by
 * `keyOf` (the task id by default), so stored records can be keyed by their
 * provider id.
 */
export class TaskHierarchy<T extends HierarchyTask> {
  private byKey = new Map<string, T>();
  private children = new Map<string, T[]>();
  private projects = new Map<string, string>();

  constructor(
    private tasks: readonly T[],
    private keyOf: (task: T) => string = (t) => t.id,
  ) {
    for (const t of tasks) {
      this.byKey.set(keyOf(t), t);
      if (t.projectId && t.projectName) this.projects.set(t.projectId, t.projectName);
    }
    for (const t of tasks) {
      if (!t.parentId) continue;
      const siblings = this.children.get(t.parentId) ?? [];
      siblings.push(t);
      this.children.set(t.parentId, siblings);
    }
  }

  roots(): T[] {
    return this.tasks.filter((t) => !t.parentId);
  }

  childrenOf(key: string): T[] {
    return this.children.get(key) ?? [];
  }

  /** Root first. A parent missing from the list ends the walk; so does a cycle. */
  path(key: string): T[] {
    const out: T[] = [];
    const seen = new Set<string>();
    let current = this.byKey.get(key);
    while (current) {
      const k = this.keyOf(current);
      if (seen.has(k)) break;
      seen.add(k);
      out.unshift(current);
      current = current.parentId ? this.byKey.get(current.parentId) : undefined;
    }
    return out;
  }

  pathString(key: string, separator = SEPARATOR): string {
    return this.path(key)
      .map((t) => t.title)
      .join(separator);
  }

  flatten(): FlattenedTask<T>[] {
    return this.tasks.map((task) => {
      const path = this.pathString(this.keyOf(task));
      const project = (task.projectId && this.projects.get(task.projectId)) || '';
      const parts = project ? [`[${project}]`] : [];
      parts.push(path || task.title);
      return { task, path, project, flattenedName: parts.join(SEPARATOR) };
    });
  }
}
