/**
 * @fileoverview Unit tests for TaskExecutionEngine task lifecycle and events.
 */

import * as assert from 'assert';
import * as sinon from 'sinon';
import { suite, test, teardown } from 'mocha';
import { TaskExecutionEngine } from '../../../tasks/taskExecutionEngine';
import type { TaskEvent, TaskRequest } from '../../../tasks/types';
import { ProcessRunner } from '../../../process/processRunner';
import { createInvocation } from '../../../process/invocation';
import { InvalidInvocationError, ToolwrightError, UnknownTaskError } from '../../../core/errors';
import { FakeSpawner, createDirectTerminator, hang, respond, type ProcessScript } from '../mocks/fakeProcess';
import { createTestLogger } from '../mocks/testLogger';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function createEngine(script: ProcessScript, recentRequestLimit?: number, finishedTaskLimit?: number) {
  const spawner = new FakeSpawner(script);
  const logger = createTestLogger();
  const runner = new ProcessRunner({ spawner, terminator: createDirectTerminator(), logger, platform: 'linux' });
  const engine = new TaskExecutionEngine<string>({ runner, logger, recentRequestLimit, finishedTaskLimit });
  return { engine, spawner, logger };
}

function request(title = 'build', timeoutMs = 0): TaskRequest {
  return { title, invocation: createInvocation('tool', [title], { timeoutMs }) };
}

function describeEvent(event: TaskEvent): string {
  switch (event.kind) {
    case 'status': return `status:${event.state}`;
    case 'output': return `${event.stream}:${event.text}`;
    case 'progress': return `progress:${event.fraction}`;
    case 'error': return `error:${event.message}`;
  }
}

function nextTurn(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

suite('TaskExecutionEngine', () => {
  let engines: Array<TaskExecutionEngine<string>> = [];

  function track<T extends { engine: TaskExecutionEngine<string> }>(created: T): T {
    engines.push(created.engine);
    return created;
  }

  teardown(() => {
    engines.forEach(engine => engine.dispose());
    engines = [];
  });

  suite('lifecycle', () => {
    test('should emit queued, starting, running, output and completed in order', async () => {
      const { engine } = track(createEngine(respond('a\nb\n')));
      const seen: string[] = [];
      engine.subscribe(event => seen.push(describeEvent(event)));

      const handle = engine.submit(request());
      const result = await handle.completion;

      assert.deepStrictEqual(seen, [
        'status:queued',
        'status:starting',
        'status:running',
        'stdout:a',
        'stdout:b',
        'status:completed',
      ]);
      assert.strictEqual(result.state, 'completed');
      assert.strictEqual(result.exitCode, 0);
      assert.deepStrictEqual(result.stdout, ['a', 'b']);
      assert.strictEqual(handle.state(), 'completed');
    });

    test('should return before the task starts', () => {
      const { engine, spawner } = track(createEngine(respond('')));

      const handle = engine.submit(request());

      assert.strictEqual(handle.state(), 'queued');
      assert.strictEqual(spawner.calls.length, 0);
    });

    test('should emit the error event before the failed status on non-zero exit', async () => {
      const { engine } = track(createEngine(respond('', 2, 'boom\n')));
      const seen: string[] = [];
      engine.subscribe(event => seen.push(describeEvent(event)));

      const result = await engine.submit(request()).completion;

      assert.deepStrictEqual(seen, [
        'status:queued',
        'status:starting',
        'status:running',
        'stderr:boom',
        'error:Exited with code 2: boom',
        'status:failed',
      ]);
      assert.strictEqual(result.state, 'failed');
      assert.strictEqual(result.errorMessage, 'Exited with code 2: boom');
    });

    test('should carry the state at emission time on every event', async () => {
      const { engine } = track(createEngine(respond('', 1)));
      const events: TaskEvent[] = [];
      engine.subscribe(event => events.push(event));

      await engine.submit(request()).completion;

      const error = events.find(event => event.kind === 'error');
      assert.strictEqual(error?.state, 'running');
      assert.strictEqual(events[events.length - 1].state, 'failed');
    });

    test('should fail a task that times out', async () => {
      const { engine } = track(createEngine(hang));
      const seen: string[] = [];
      engine.subscribe(event => seen.push(describeEvent(event)));

      const result = await engine.submit(request('slow', 20)).completion;

      assert.strictEqual(result.state, 'failed');
      assert.strictEqual(result.timedOut, true);
      assert.match(result.errorMessage ?? '', /^Timed out after \d+ms$/);
      assert.deepStrictEqual(seen.filter(s => s.startsWith('status:')), [
        'status:queued', 'status:starting', 'status:running', 'status:failed',
      ]);
    });

    test('should fail from starting when the executable cannot be started', async () => {
      const { engine } = track(createEngine(proc => proc.failToSpawn('spawn tool ENOENT')));
      const seen: string[] = [];
      engine.subscribe(event => seen.push(describeEvent(event)));

      const result = await engine.submit(request()).completion;

      assert.deepStrictEqual(seen, [
        'status:queued',
        'status:starting',
        'error:Failed to start: spawn tool ENOENT',
        'status:failed',
      ]);
      assert.strictEqual(result.exitCode, null);
    });

    test('should treat configured exit codes as success', async () => {
      const { engine } = track(createEngine(respond('', 1)));

      const result = await engine.submit({ ...request(), successExitCodes: [0, 1] }).completion;

      assert.strictEqual(result.state, 'completed');
      assert.strictEqual(result.exitCode, 1);
    });

    test('should issue distinct random identifiers', () => {
      const { engine } = track(createEngine(respond('')));

      const ids = [engine.submit(request()), engine.submit(request()), engine.submit(request())].map(h => h.id);

      assert.strictEqual(new Set(ids).size, 3);
      ids.forEach(id => assert.match(id, UUID_V4));
    });

    test('should reject an invalid invocation synchronously', () => {
      const { engine } = track(createEngine(respond('')));

      assert.throws(() => engine.submit({
        title: 'broken',
        invocation: { executable: '', args: [], environment: {}, timeoutMs: 0 },
      }), InvalidInvocationError);
    });
  });

  suite('cancellation', () => {
    test('should cancel a running task without an error event', async () => {
      const { engine } = track(createEngine(hang));
      const seen: string[] = [];
      engine.subscribe(event => seen.push(describeEvent(event)));

      const handle = engine.submit(request());
      await nextTurn();
      await nextTurn();
      assert.strictEqual(engine.cancel(handle.id), true);
      const result = await handle.completion;

      assert.strictEqual(result.state, 'cancelled');
      assert.deepStrictEqual(seen, ['status:queued', 'status:starting', 'status:running', 'status:cancelled']);
    });

    test('should cancel a queued task without spawning', async () => {
      const { engine, spawner } = track(createEngine(respond('')));
      const seen: string[] = [];
      engine.subscribe(event => seen.push(describeEvent(event)));

      const handle = engine.submit(request());
      assert.strictEqual(engine.cancel(handle.id), true);
      const result = await handle.completion;
      await nextTurn();

      assert.strictEqual(result.state, 'cancelled');
      assert.deepStrictEqual(seen, ['status:queued', 'status:cancelled']);
      assert.strictEqual(spawner.calls.length, 0);
    });

    test('should treat cancelling a finished task as a no-op', async () => {
      const { engine } = track(createEngine(respond('')));
      const handle = engine.submit(request());
      await handle.completion;

      assert.strictEqual(engine.cancel(handle.id), false);
      assert.strictEqual(engine.getState(handle.id), 'completed');
    });

    test('should throw for unknown task identifiers', () => {
      const { engine } = track(createEngine(respond('')));

      assert.throws(() => engine.cancel('no-such-task'), UnknownTaskError);
      assert.throws(() => engine.getState('no-such-task'), UnknownTaskError);
    });

    test('should deliver events in order when a listener cancels on running', async () => {
      const { engine } = track(createEngine(hang));
      const seen: string[] = [];
      engine.subscribe(event => {
        if (event.kind === 'status' && event.state === 'running') {
          engine.cancel(event.taskId);
        }
      });
      engine.subscribe(event => seen.push(describeEvent(event)));

      const result = await engine.submit(request()).completion;

      assert.strictEqual(result.state, 'cancelled');
      assert.deepStrictEqual(seen, ['status:queued', 'status:starting', 'status:running', 'status:cancelled']);
    });

    test('should stop every running task', async () => {
      const { engine } = track(createEngine(hang));
      const first = engine.submit(request('one'));
      const second = engine.submit(request('two'));
      await nextTurn();

      assert.deepStrictEqual(engine.getRunningTasks().map(h => h.id), [first.id, second.id]);
      assert.strictEqual(engine.stopAllRunningTasks(), 2);

      const results = await Promise.all([first.completion, second.completion]);
      assert.deepStrictEqual(results.map(r => r.state), ['cancelled', 'cancelled']);
      assert.deepStrictEqual(engine.getRunningTasks(), []);
    });
  });

  suite('progress', () => {
    test('should keep progress fractions non-decreasing and within range', async () => {
      const { engine } = track(createEngine(respond('10%\n50%\n30%\nno marker\n150%\n')));
      const fractions: number[] = [];
      engine.subscribe(event => {
        if (event.kind === 'progress') {
          fractions.push(event.fraction);
        }
      });

      await engine.submit({
        ...request(),
        progressParser: (line) => {
          const match = /^(\d+)%$/.exec(line);
          return match ? { messageKey: 'progress.percent', args: [match[1]], fraction: Number(match[1]) / 100 } : undefined;
        },
      }).completion;

      assert.deepStrictEqual(fractions, [0.1, 0.5, 0.5, 1]);
    });

    test('should repeat the last fraction for markers without one', async () => {
      const { engine } = track(createEngine(respond('40%\nphase\n')));
      const progress: Array<[string, number]> = [];
      engine.subscribe(event => {
        if (event.kind === 'progress') {
          progress.push([event.messageKey, event.fraction]);
        }
      });

      await engine.submit({
        ...request(),
        progressParser: (line) => (line === 'phase'
          ? { messageKey: 'progress.phase' }
          : { messageKey: 'progress.percent', fraction: 0.4 }),
      }).completion;

      assert.deepStrictEqual(progress, [['progress.percent', 0.4], ['progress.phase', 0.4]]);
    });
  });

  suite('listeners', () => {
    test('should deliver only the filtered task events', async () => {
      const { engine } = track(createEngine(respond('x\n')));
      const first = engine.submit(request('one'));
      const second = engine.submit(request('two'));
      const taskIds: string[] = [];
      engine.subscribe(event => taskIds.push(event.taskId), { taskId: first.id });

      await Promise.all([first.completion, second.completion]);

      assert.ok(taskIds.length > 0);
      assert.ok(taskIds.every(id => id === first.id));
    });

    test('should not deliver to a listener removed during delivery', async () => {
      const { engine } = track(createEngine(respond('')));
      const late: string[] = [];
      const lateListener = (event: TaskEvent): void => { late.push(describeEvent(event)); };
      engine.subscribe(event => {
        if (event.kind === 'status' && event.state === 'starting') {
          engine.unsubscribe(lateListener);
        }
      });
      engine.subscribe(lateListener);

      await engine.submit(request()).completion;

      assert.deepStrictEqual(late, ['status:queued']);
    });

    test('should give a listener added mid-execution only later events', async () => {
      const { engine } = track(createEngine(respond('a\n')));
      const added: string[] = [];
      engine.subscribe(event => {
        if (event.kind === 'status' && event.state === 'running') {
          engine.subscribe(next => added.push(describeEvent(next)));
        }
      });

      await engine.submit(request()).completion;

      assert.deepStrictEqual(added, ['stdout:a', 'status:completed']);
    });

    test('should keep delivering when a listener throws', async () => {
      const { engine, logger } = track(createEngine(respond('')));
      const seen: string[] = [];
      engine.subscribe(() => { throw new Error('listener broke'); });
      engine.subscribe(event => seen.push(describeEvent(event)));

      const result = await engine.submit(request()).completion;

      assert.strictEqual(result.state, 'completed');
      assert.strictEqual(seen.length, 4);
      assert.strictEqual(logger.at('error').length, 4);
    });

    test('should stop delivery after the returned unsubscribe is called', async () => {
      const { engine } = track(createEngine(respond('')));
      const listener = sinon.spy();
      const unsubscribe = engine.subscribe(listener);
      unsubscribe();

      await engine.submit(request()).completion;

      assert.strictEqual(listener.callCount, 0);
    });
  });

  suite('history and lifecycle', () => {
    test('should remember recent requests newest first', () => {
      const { engine } = track(createEngine(respond(''), 2));

      engine.submit(request('a'));
      engine.submit(request('b'));
      engine.submit(request('c'));

      assert.deepStrictEqual(engine.getRecentRequests().map(r => r.title), ['c', 'b']);
    });

    test('should forget the oldest finished tasks beyond the limit', async () => {
      const { engine } = track(createEngine(respond('done\n'), undefined, 2));

      const first = engine.submit(request('a'));
      await first.completion;
      const second = engine.submit(request('b'));
      await second.completion;
      const third = engine.submit(request('c'));
      const result = await third.completion;

      assert.throws(() => engine.getState(first.id), UnknownTaskError);
      assert.throws(() => engine.cancel(first.id), UnknownTaskError);
      assert.strictEqual(engine.getState(second.id), 'completed');
      assert.strictEqual(engine.cancel(third.id), false);
      assert.deepStrictEqual(result.stdout, ['done']);
      assert.deepStrictEqual((await first.completion).stdout, ['done']);
    });

    test('should keep unfinished tasks regardless of the limit', async () => {
      const { engine } = track(createEngine(hang, undefined, 0));

      const running = engine.submit(request('long'));
      await nextTurn();
      const finished = engine.submit(request('short'));
      engine.cancel(finished.id);

      assert.strictEqual(engine.getState(running.id), 'running');
      assert.throws(() => engine.getState(finished.id), UnknownTaskError);
      assert.deepStrictEqual(engine.getRunningTasks().map(handle => handle.id), [running.id]);
    });

    test('should cancel running tasks and refuse new ones after dispose', async () => {
      const { engine } = createEngine(hang);
      const handle = engine.submit(request());
      await nextTurn();

      engine.dispose();
      const result = await handle.completion;

      assert.strictEqual(result.state, 'cancelled');
      assert.throws(() => engine.submit(request()), ToolwrightError);
    });
  });
});
