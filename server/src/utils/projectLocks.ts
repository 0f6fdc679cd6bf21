import { ProjectBusyError } from './errors';

/** One writer per project: a second mutating command on a busy project fails fast instead of queueing. */
export default class ProjectLocks {
  private held = new Set<string>();

  isHeld(projectName: string): boolean {
    return this.held.has(projectName);
  }

  async runExclusive<T>(projectName: string, task: () => Promise<T>): Promise<T> {
    if (this.held.has(projectName)) {
      throw new ProjectBusyError(projectName);
    }
    this.held.add(projectName);
    try {
      return await task();
    } finally {
      this.held.delete(projectName);
    }
  }
}
