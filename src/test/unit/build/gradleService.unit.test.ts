/**
 * @fileoverview Unit tests for GradleService against scripted Gradle processes.
 */

import * as assert from 'assert';
import { suite, test, teardown } from 'mocha';
import * as sinon from 'sinon';
import { GradleService, type GradleServiceOptions } from '../../../build/gradleService';
import { createBuildTaskDescriptor } from '../../../build/types';
import { ModelLoadError, ToolwrightError } from '../../../core/errors';
import { ExecutableLocator } from '../../../process/executableLocator';
import { ProcessRunner } from '../../../process/processRunner';
import type { TaskEvent } from '../../../tasks/types';
import { FakeFileSystem } from '../mocks/fakeFileSystem';
import { FakeSpawner, byCommandLine, createDirectTerminator, hang, respond, type ProcessScript } from '../mocks/fakeProcess';
import { createTestLogger } from '../mocks/testLogger';

const PROJECT = '/work/demo';
const WRAPPER = '/work/demo/gradlew';

const VERSION_OUTPUT = [
  '',
  '------------------------------------------------------------',
  'Gradle 8.5',
  '------------------------------------------------------------',
  '',
  'Kotlin:       1.9.20',
  '',
].join('\n');

const TASKS_OUTPUT = [
  '',
  '------------------------------------------------------------',
  "Tasks runnable from root project 'demo'",
  '------------------------------------------------------------',
  '',
  'Build tasks',
  '-----------',
  'build - Assembles and tests this project.',
  'app:jar - Assembles a jar archive.',
  '',
  'BUILD SUCCESSFUL in 1s',
  '',
].join('\n');

const HELP_OUTPUT = [
  'USAGE: gradle [option...] [task...]',
  '',
  '--offline                          Execute the build without accessing network',
  '                                   resources.',
  '',
].join('\n');

const services: GradleService[] = [];

function createService(
  scripts: Record<string, ProcessScript>,
  options: Partial<GradleServiceOptions> = {},
  fileSystem: FakeFileSystem = new FakeFileSystem(new Set(), new Set([WRAPPER])),
) {
  const spawner = new FakeSpawner(byCommandLine(scripts));
  const logger = createTestLogger();
  const runner = new ProcessRunner({
    spawner,
    terminator: createDirectTerminator(),
    logger: createTestLogger(),
    platform: 'linux',
    baseEnvironment: { PATH: '/bin' },
  });
  const locator = new ExecutableLocator({
    runner,
    fileSystem,
    environment: { env: {}, platform: 'linux', cwd: () => PROJECT, homedir: () => '/home/dev' },
    logger: createTestLogger(),
  });
  const service = new GradleService({
    projectDir: PROJECT,
    runner,
    locator,
    fileSystem,
    platform: 'linux',
    allocatePort: async () => 5005,
    logger,
    ...options,
  });
  services.push(service);
  return { service, spawner, logger };
}

suite('GradleService', () => {

  teardown(() => {
    services.splice(0).forEach(service => service.dispose());
    sinon.restore();
  });

  suite('resolveExecutable', () => {
    test('should prefer the configured path', async () => {
      const { service, spawner } = createService({}, { executablePath: '/opt/gradle-8/bin/gradle' });

      assert.strictEqual(await service.resolveExecutable(), '/opt/gradle-8/bin/gradle');
      assert.strictEqual(spawner.calls.length, 0);
    });

    test('should use the project wrapper when present', async () => {
      const { service, spawner } = createService({});

      assert.strictEqual(await service.resolveExecutable(), WRAPPER);
      assert.strictEqual(spawner.calls.length, 0);
    });

    test('should use the batch wrapper on Windows', async () => {
      const fileSystem = new FakeFileSystem(new Set(), new Set(['/work/demo/gradlew.bat']));
      const { service } = createService({}, { platform: 'win32' }, fileSystem);

      assert.strictEqual(await service.resolveExecutable(), '/work/demo/gradlew.bat');
    });

    test('should fall back to the locator when wrapper use is disabled', async () => {
      const fileSystem = new FakeFileSystem(new Set(['/usr/bin/gradle']), new Set([WRAPPER]));
      const { service } = createService({
        'gradle --version': respond(VERSION_OUTPUT),
        'which gradle': respond('/usr/bin/gradle\n'),
      }, { useWrapper: false }, fileSystem);

      assert.strictEqual(await service.resolveExecutable(), '/usr/bin/gradle');
    });

    test('should fall back to the bare name once and warn', async () => {
      const { service, spawner, logger } = createService({}, {}, new FakeFileSystem());

      assert.strictEqual(await service.resolveExecutable(), 'gradle');
      assert.strictEqual(await service.resolveExecutable(), 'gradle');
      assert.deepStrictEqual(spawner.commandLines(), ['gradle --version']);
      assert.deepStrictEqual(logger.at('warn'), ["No Gradle executable found for /work/demo; falling back to 'gradle'"]);
    });
  });

  suite('runTask', () => {
    test('should run the task in the project directory with its environment', async () => {
      const { service, spawner } = createService({
        '/work/demo/gradlew :app:build --offline --console=plain -Dprofile=ci':
          respond('> Task :app:compileJava\nBUILD SUCCESSFUL in 2s\n'),
      });
      const progress: Array<[string, number]> = [];
      service.subscribe((event: TaskEvent) => {
        if (event.kind === 'progress') {
          progress.push([event.messageKey, event.fraction]);
        }
      });

      const handle = await service.runTask(createBuildTaskDescriptor(':app:build', {
        offline: true,
        systemProperties: { profile: 'ci' },
        environment: { JAVA_OPTS: '-Xmx1g' },
      }));
      const result = await handle.completion;

      assert.strictEqual(result.state, 'completed');
      assert.strictEqual(handle.request.title, ':app:build');
      assert.strictEqual(spawner.calls[0].options.cwd, PROJECT);
      assert.strictEqual(spawner.calls[0].options.env?.JAVA_OPTS, '-Xmx1g');
      assert.strictEqual(spawner.calls[0].options.env?.PATH, '/bin');
      assert.deepStrictEqual(progress, [['build.progress.task', 0], ['build.progress.succeeded', 1]]);
    });

    test('should fail with the last error line of a failed build', async () => {
      const { service } = createService({
        '/work/demo/gradlew test --console=plain': respond('', 1, 'FAILURE: Build failed with an exception.\n'),
      });

      const handle = await service.runTask(createBuildTaskDescriptor('test'));
      const result = await handle.completion;

      assert.strictEqual(result.state, 'failed');
      assert.strictEqual(result.errorMessage, 'Exited with code 1: FAILURE: Build failed with an exception.');
    });

    test('should fail a task whose executable cannot be started', async () => {
      const { service } = createService({}, {}, new FakeFileSystem());

      const handle = await service.runTask(createBuildTaskDescriptor('build'));
      const result = await handle.completion;

      assert.strictEqual(result.state, 'failed');
      assert.strictEqual(result.errorMessage, 'Failed to start: spawn gradle ENOENT');
    });

    test('should expose the debug port until the task ends', async () => {
      const { service } = createService({
        '/work/demo/gradlew :app:run --console=plain -Dorg.gradle.debug=true -Dorg.gradle.debug.port=5005': hang,
      });

      const handle = await service.runTask(createBuildTaskDescriptor(':app:run', { debug: true }));
      assert.strictEqual(service.getDebugPort(handle.id), 5005);

      service.cancel(handle.id);
      const result = await handle.completion;

      assert.strictEqual(result.state, 'cancelled');
      assert.strictEqual(service.getDebugPort(handle.id), undefined);
    });

    test('should list recent descriptors newest first', async () => {
      const { service } = createService({
        '/work/demo/gradlew clean --console=plain': respond(''),
        '/work/demo/gradlew build --console=plain': respond(''),
      });
      const clean = createBuildTaskDescriptor('clean');
      const build = createBuildTaskDescriptor('build');

      await (await service.runTask(clean)).completion;
      await (await service.runTask(build)).completion;

      const recent = service.getRecentRequests();
      assert.strictEqual(recent.length, 2);
      assert.strictEqual(recent[0], build);
      assert.strictEqual(recent[1], clean);
    });

    test('should honour the recent request limit', async () => {
      const { service } = createService({
        '/work/demo/gradlew clean --console=plain': respond(''),
        '/work/demo/gradlew build --console=plain': respond(''),
      }, { recentRequestLimit: 1 });
      const build = createBuildTaskDescriptor('build');

      await (await service.runTask(createBuildTaskDescriptor('clean'))).completion;
      await (await service.runTask(build)).completion;

      assert.deepStrictEqual(service.getRecentRequests(), [build]);
    });

    test('should stop every running task', async () => {
      const { service } = createService({
        '/work/demo/gradlew :a:run --console=plain': hang,
        '/work/demo/gradlew :b:run --console=plain': hang,
      });
      const first = await service.runTask(createBuildTaskDescriptor(':a:run'));
      const second = await service.runTask(createBuildTaskDescriptor(':b:run'));

      assert.strictEqual(service.getRunningTasks().length, 2);
      assert.strictEqual(service.stopAllRunningTasks(), 2);

      const results = await Promise.all([first.completion, second.completion]);
      assert.deepStrictEqual(results.map(r => r.state), ['cancelled', 'cancelled']);
      assert.deepStrictEqual(service.getRunningTasks(), []);
    });

    test('should reject new tasks after dispose', async () => {
      const { service } = createService({});
      service.dispose();

      await assert.rejects(service.runTask(createBuildTaskDescriptor('build')), ToolwrightError);
    });
  });

  suite('refreshModel', () => {
    const modelScripts = (): Record<string, ProcessScript> => ({
      '/work/demo/gradlew --version': respond(VERSION_OUTPUT),
      '/work/demo/gradlew tasks --all --console=plain': respond(TASKS_OUTPUT),
    });

    test('should load the version and projects', async () => {
      const { service } = createService(modelScripts());

      const model = await service.refreshModel();

      assert.strictEqual(model.gradleVersion, '8.5');
      assert.strictEqual(model.rootDir, PROJECT);
      assert.deepStrictEqual(model.projects.map(p => [p.path, p.name, p.tasks.map(t => t.path)]), [
        [':', 'demo', [':build']],
        [':app', 'app', [':app:jar']],
      ]);
      assert.strictEqual(service.getCachedModel(), model);
    });

    test('should serve the cached model without force', async () => {
      const { service, spawner } = createService(modelScripts());

      const first = await service.refreshModel();
      const second = await service.refreshModel();

      assert.strictEqual(second, first);
      assert.strictEqual(spawner.calls.length, 2);
    });

    test('should reload with force', async () => {
      const { service, spawner } = createService(modelScripts());

      await service.refreshModel();
      await service.refreshModel(true);

      assert.strictEqual(spawner.calls.length, 4);
    });

    test('should fail when the task listing fails', async () => {
      const { service } = createService({
        '/work/demo/gradlew --version': respond(VERSION_OUTPUT),
        '/work/demo/gradlew tasks --all --console=plain': respond('', 1, 'FAILURE: broken build script\n'),
      });

      await assert.rejects(service.refreshModel(), (error: unknown) =>
        error instanceof ModelLoadError
        && error.message === 'Could not list Gradle tasks: failed with exit code 1: FAILURE: broken build script');
      assert.strictEqual(service.getCachedModel(), undefined);
    });

    test('should fail when no version is reported', async () => {
      const { service } = createService({ '/work/demo/gradlew --version': respond('Welcome\n') });

      await assert.rejects(service.refreshModel(), /Gradle did not report its version/);
    });

    test('should notify model listeners', async () => {
      const { service } = createService(modelScripts());
      const listener = { reloadStarted: sinon.spy(), reloadSucceeded: sinon.spy() };
      service.addModelListener(listener);

      const model = await service.refreshModel();

      assert.ok(listener.reloadStarted.calledOnce);
      assert.ok(listener.reloadSucceeded.calledOnceWithExactly(model));
      assert.strictEqual(service.removeModelListener(listener), true);
    });
  });

  suite('getCommandLineOptions', () => {
    test('should parse and cache the help output', async () => {
      const { service, spawner } = createService({ '/work/demo/gradlew --help': respond(HELP_OUTPUT) });

      const options = await service.getCommandLineOptions();
      await service.getCommandLineOptions();

      assert.strictEqual(options.get('--offline'), 'Execute the build without accessing network resources.');
      assert.strictEqual(spawner.calls.length, 1);
    });

    test('should retry after a failed load', async () => {
      let attempts = 0;
      const { service } = createService({
        '/work/demo/gradlew --help': (proc, call) => {
          attempts++;
          (attempts === 1 ? respond('', 1, 'boom\n') : respond(HELP_OUTPUT))(proc, call);
        },
      });

      await assert.rejects(service.getCommandLineOptions(), ModelLoadError);
      const options = await service.getCommandLineOptions();

      assert.deepStrictEqual([...options.keys()], ['--offline']);
      assert.strictEqual(attempts, 2);
    });
  });
});
