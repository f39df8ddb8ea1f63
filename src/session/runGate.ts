/**
 * Process-wide gate: at most one session runs at a time per server process.
 * Synchronous, in-memory. No disk I/O.
 */
export class RunGate {
  private currentSessionId: string | null = null;
  private currentProject: string | null = null;

  acquire(projectRoot: string, sessionId: string): boolean {
    if (this.currentSessionId !== null) {
      return false;
    }
    this.currentSessionId = sessionId;
    this.currentProject = projectRoot;
    return true;
  }

  release(projectRoot: string, sessionId: string): void {
    if (this.currentProject === projectRoot && this.currentSessionId === sessionId) {
      this.currentSessionId = null;
      this.currentProject = null;
    }
  }

  activeSessionId(): string | null {
    return this.currentSessionId;
  }
}
