type RunTask = () => Promise<void>;

// Serializes run requests: a trigger during an active run queues exactly one follow-up run.
export class RunTrigger {
  private readonly task: RunTask;
  private activeRun: Promise<void> | null = null;
  private rerunRequested = false;

  constructor(task: RunTask) {
    this.task = task;
  }

  isRunning(): boolean {
    return this.activeRun !== null;
  }

  trigger(): Promise<void> {
    if (this.activeRun) {
      this.rerunRequested = true;
      return this.activeRun;
    }

    this.activeRun = this.drain().finally(() => {
      this.activeRun = null;
    });
    return this.activeRun;
  }

  private async drain(): Promise<void> {
    do {
      this.rerunRequested = false;
      await this.task();
    } while (this.rerunRequested);
  }
}
