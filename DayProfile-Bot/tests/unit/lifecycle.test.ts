import { describe, it, expect } from 'vitest';
import { TaskSupervisor, type SupervisedTask } from '../../src/lifecycle.js';
import { createTestLogger } from '../helpers/stub-engine.js';

function recordingTask(name: string, events: string[], failOn?: 'start' | 'stop'): SupervisedTask {
  return {
    name,
    async start() {
      if (failOn === 'start') throw new Error(`${name} cannot start`);
      events.push(`start:${name}`);
    },
    async stop() {
      if (failOn === 'stop') throw new Error(`${name} cannot stop`);
      events.push(`stop:${name}`);
    },
  };
}

describe('TaskSupervisor', () => {
  it('starts in order and stops in reverse', async () => {
    const events: string[] = [];
    const log = createTestLogger();
    const supervisor = new TaskSupervisor(
      ['health', 'scheduler', 'telegram'].map((name) => recordingTask(name, events)),
      log.logger
    );

    await supervisor.start();
    expect(supervisor.runningTasks()).toEqual(['health', 'scheduler', 'telegram']);
    await supervisor.stop();

    expect(events).toEqual([
      'start:health',
      'start:scheduler',
      'start:telegram',
      'stop:telegram',
      'stop:scheduler',
      'stop:health',
    ]);
    expect(supervisor.runningTasks()).toEqual([]);
  });

  it('keeps the other tasks when one fails to start', async () => {
    const events: string[] = [];
    const log = createTestLogger();
    const supervisor = new TaskSupervisor(
      [recordingTask('health', events), recordingTask('telegram', events, 'start'), recordingTask('scheduler', events)],
      log.logger
    );

    await supervisor.start();
    expect(supervisor.runningTasks()).toEqual(['health', 'scheduler']);
    expect(log.error).toHaveBeenCalledWith('Task failed to start: telegram', { error: expect.any(Error) });

    await supervisor.stop();
    expect(events).toEqual(['start:health', 'start:scheduler', 'stop:scheduler', 'stop:health']);
  });

  it('stops every task even when one fails to stop', async () => {
    const events: string[] = [];
    const log = createTestLogger();
    const supervisor = new TaskSupervisor(
      [recordingTask('health', events), recordingTask('scheduler', events, 'stop')],
      log.logger
    );

    await supervisor.start();
    await supervisor.stop();
    expect(events).toEqual(['start:health', 'start:scheduler', 'stop:health']);
    expect(log.error).toHaveBeenCalledTimes(1);
  });
});
