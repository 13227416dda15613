import type { Logger } from '@day-profile/shared/Utils/logger';

/**
 * A long-running part of the process. `start` resolves once the task is
 * serving; `stop` resolves once it has released its resources.
 */
export interface SupervisedTask {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Starts tasks in order and stops the started ones in reverse. A task that
 * fails to start or stop is logged; the others keep going.
 */
export class TaskSupervisor {
  private readonly running: SupervisedTask[] = [];

  constructor(
    private readonly tasks: readonly SupervisedTask[],
    private readonly logger: Logger
  ) {}

  async start(): Promise<void> {
    for (const task of this.tasks) {
      try {
        await task.start();
        this.running.push(task);
        this.logger.info(`Task started: ${task.name}`);
      } catch (error) {
        this.logger.error(`Task failed to start: ${task.name}`, { error });
      }
    }
  }

  async stop(): Promise<void> {
    while (this.running.length > 0) {
      const task = this.running.pop();
      if (!task) break;
      try {
        await task.stop();
        this.logger.info(`Task stopped: ${task.name}`);
      } catch (error) {
        this.logger.error(`Task failed to stop: ${task.name}`, { error });
      }
    }
  }

  runningTasks(): string[] {
    return this.running.map((task) => task.name);
  }
}
