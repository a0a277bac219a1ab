/**
 * @fileoverview Unit tests for composition.ts
 *
 * Covers:
 * - createContainer registers every service as a singleton
 * - Configuration keys reach the services
 * - createToolServices locates git when no path is configured
 * - The configuration file is read from the workspace directory
 * - dispose is idempotent and cancels queued build tasks
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { createBuildTaskDescriptor } from '../../build/types';
import { createContainer, createToolServices } from '../../composition';
import { InMemoryConfigProvider } from '../../core/config';
import { ConfigurationError } from '../../core/errors';
import { Logger } from '../../core/logger';
import * as Tokens from '../../core/tokens';
import type { IEnvironment } from '../../interfaces/IEnvironment';
import { FakeFileSystem } from './mocks/fakeFileSystem';
import { FakeSpawner, byCommandLine, respond, type ProcessScript } from './mocks/fakeProcess';

const WORKSPACE = '/work/demo';

function fakeEnvironment(): IEnvironment {
  return {
    env: { PATH: '/usr/bin:/bin' },
    platform: 'linux',
    cwd: () => WORKSPACE,
    homedir: () => '/home/dev',
  };
}

function quietConfig(values: Record<string, unknown> = {}): InMemoryConfigProvider {
  return new InMemoryConfigProvider({ 'logging.level': 'error', ...values });
}

const GIT_ON_PATH: Record<string, ProcessScript> = {
  'git --version': respond('git version 2.43.0\n'),
  'which git': respond('/usr/bin/git\n'),
};

suite('Composition', () => {
  setup(() => {
    Logger.reset();
  });

  teardown(() => {
    sinon.restore();
    Logger.reset();
  });

  // ─── createContainer ───────────────────────────────────────────────────

  suite('createContainer', () => {
    test('should register every service token', () => {
      const container = createContainer({
        workspaceDir: WORKSPACE,
        config: quietConfig(),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(),
        spawner: new FakeSpawner(byCommandLine({})),
      });

      for (const token of [
        Tokens.IConfigProvider,
        Tokens.IFileSystem,
        Tokens.IEnvironment,
        Tokens.IProcessSpawner,
        Tokens.Logger,
        Tokens.ProcessRunner,
        Tokens.ExecutableLocator,
        Tokens.GitClient,
        Tokens.GitManager,
        Tokens.GradleService,
      ]) {
        assert.ok(container.isRegistered<unknown>(token), `${token.toString()} should be registered`);
      }
    });

    test('should return the same instance on repeated resolve', () => {
      const container = createContainer({
        config: quietConfig(),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(),
        spawner: new FakeSpawner(byCommandLine({})),
      });

      assert.strictEqual(container.resolve(Tokens.GitManager), container.resolve(Tokens.GitManager));
      assert.strictEqual(container.resolve(Tokens.GradleService), container.resolve(Tokens.GradleService));
      assert.strictEqual(container.resolve(Tokens.ProcessRunner), container.resolve(Tokens.ProcessRunner));
    });

    test('should hand out the supplied overrides', () => {
      const config = quietConfig();
      const environment = fakeEnvironment();
      const fileSystem = new FakeFileSystem();
      const spawner = new FakeSpawner(byCommandLine({}));
      const container = createContainer({ config, environment, fileSystem, spawner });

      assert.strictEqual(container.resolve(Tokens.IConfigProvider), config);
      assert.strictEqual(container.resolve(Tokens.IEnvironment), environment);
      assert.strictEqual(container.resolve(Tokens.IFileSystem), fileSystem);
      assert.strictEqual(container.resolve(Tokens.IProcessSpawner), spawner);
    });

    test('should install the configured logger globally', () => {
      const container = createContainer({ config: quietConfig() });

      const logger = container.resolve(Tokens.Logger);

      assert.strictEqual(Logger.current(), logger);
    });

    test('should root the build service in the workspace directory', () => {
      const container = createContainer({
        config: quietConfig(),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(),
      });

      assert.strictEqual(container.resolve(Tokens.GradleService).getProjectDir(), WORKSPACE);
    });

    test('should pass the configured build executable through', async () => {
      const container = createContainer({
        workspaceDir: WORKSPACE,
        config: quietConfig({ 'build.executablePath': '/opt/gradle/bin/gradle' }),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(new Set([`${WORKSPACE}/gradlew`])),
        spawner: new FakeSpawner(byCommandLine({})),
      });

      const executable = await container.resolve(Tokens.GradleService).resolveExecutable();

      assert.strictEqual(executable, '/opt/gradle/bin/gradle');
    });

    test('should skip the wrapper when wrapper use is turned off', async () => {
      const spawner = new FakeSpawner(byCommandLine({
        'gradle --version': respond('Gradle 8.5\n'),
        'which gradle': respond('/usr/bin/gradle\n'),
      }));
      const container = createContainer({
        workspaceDir: WORKSPACE,
        config: quietConfig({ 'build.useWrapper': false }),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(new Set([`${WORKSPACE}/gradlew`, '/usr/bin/gradle'])),
        spawner,
      });

      const executable = await container.resolve(Tokens.GradleService).resolveExecutable();

      assert.strictEqual(executable, '/usr/bin/gradle');
    });
  });

  // ─── createToolServices ────────────────────────────────────────────────

  suite('createToolServices', () => {
    test('should locate git when no executable is configured', async () => {
      const spawner = new FakeSpawner(byCommandLine(GIT_ON_PATH));
      const services = await createToolServices({
        workspaceDir: WORKSPACE,
        config: quietConfig(),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(new Set(['/usr/bin/git'])),
        spawner,
      });

      const repository = await services.git.detectRepository(WORKSPACE);

      assert.strictEqual(repository, undefined);
      assert.deepStrictEqual(spawner.commandLines(), [
        'git --version',
        'which git',
        '/usr/bin/git rev-parse --is-inside-work-tree',
      ]);
      services.dispose();
    });

    test('should not probe when git is configured', async () => {
      const spawner = new FakeSpawner(byCommandLine({}));
      const services = await createToolServices({
        workspaceDir: WORKSPACE,
        config: quietConfig({ 'git.executablePath': '/opt/git/bin/git' }),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(),
        spawner,
      });

      assert.strictEqual(spawner.calls.length, 0);
      await services.git.detectRepository(WORKSPACE);
      assert.deepStrictEqual(spawner.commandLines(), ['/opt/git/bin/git rev-parse --is-inside-work-tree']);
      services.dispose();
    });

    test('should warn when git cannot be found', async () => {
      const warn = sinon.stub(console, 'warn');
      const services = await createToolServices({
        workspaceDir: WORKSPACE,
        config: quietConfig({ 'logging.level': 'warn' }),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(),
        spawner: new FakeSpawner(byCommandLine({})),
      });

      const messages = warn.getCalls().map(call => String(call.args[0]));
      assert.ok(
        messages.some(message => message.endsWith('[WARN] [Toolwright:services] git was not found; git operations will fail to start')),
        messages.join('\n'),
      );
      services.dispose();
    });

    test('should read the configuration file of the workspace', async () => {
      const spawner = new FakeSpawner(byCommandLine({}));
      const services = await createToolServices({
        workspaceDir: WORKSPACE,
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(new Set(), new Set(), new Set(), {
          [`${WORKSPACE}/toolwright.config.json`]: JSON.stringify({
            logging: { level: 'error' },
            git: { executablePath: '/opt/git/bin/git' },
          }),
        }),
        spawner,
      });

      assert.strictEqual(services.config.getConfig('git', 'executablePath', ''), '/opt/git/bin/git');
      assert.strictEqual(spawner.calls.length, 0);
      services.dispose();
    });

    test('should reject an invalid configuration file', async () => {
      await assert.rejects(
        createToolServices({
          workspaceDir: WORKSPACE,
          environment: fakeEnvironment(),
          fileSystem: new FakeFileSystem(new Set(), new Set(), new Set(), {
            [`${WORKSPACE}/toolwright.config.json`]: JSON.stringify({ git: { statusTimeoutMs: 'soon' } }),
          }),
          spawner: new FakeSpawner(byCommandLine({})),
        }),
        ConfigurationError,
      );
    });

    test('should cancel queued build tasks on dispose', async () => {
      const services = await createToolServices({
        workspaceDir: WORKSPACE,
        config: quietConfig({ 'git.executablePath': '/usr/bin/git' }),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(new Set([`${WORKSPACE}/gradlew`])),
        spawner: new FakeSpawner(byCommandLine({})),
      });

      const handle = await services.build.runTask(createBuildTaskDescriptor(':app:build'));
      services.dispose();
      const result = await handle.completion;

      assert.strictEqual(result.state, 'cancelled');
      assert.strictEqual(services.build.getRunningTasks().length, 0);
    });

    test('should tolerate a second dispose', async () => {
      const services = await createToolServices({
        workspaceDir: WORKSPACE,
        config: quietConfig({ 'git.executablePath': '/usr/bin/git' }),
        environment: fakeEnvironment(),
        fileSystem: new FakeFileSystem(),
        spawner: new FakeSpawner(byCommandLine({})),
      });

      services.dispose();
      assert.doesNotThrow(() => services.dispose());
    });
  });
});
