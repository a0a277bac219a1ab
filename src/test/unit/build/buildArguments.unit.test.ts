/**
 * @fileoverview Unit tests for build task descriptors and their arguments.
 */

import * as assert from 'assert';
import { suite, test } from 'mocha';
import { buildArguments } from '../../../build/buildArguments';
import { createBuildTaskDescriptor, findTask, type BuildModel } from '../../../build/types';
import { InvalidInvocationError } from '../../../core/errors';

suite('Build task descriptors', () => {

  suite('createBuildTaskDescriptor', () => {
    test('should trim the task path and apply defaults', () => {
      const descriptor = createBuildTaskDescriptor('  :app:build ');

      assert.deepStrictEqual({ ...descriptor }, {
        taskPath: ':app:build',
        additionalArgs: [],
        systemProperties: {},
        environment: {},
        offline: false,
        refreshDependencies: false,
        debug: false,
        consoleMode: 'plain',
      });
      assert.ok(Object.isFrozen(descriptor));
      assert.ok(Object.isFrozen(descriptor.additionalArgs));
    });

    test('should copy the caller\'s collections', () => {
      const args = ['--scan'];
      const descriptor = createBuildTaskDescriptor(':test', { additionalArgs: args });
      args.push('--info');

      assert.deepStrictEqual(descriptor.additionalArgs, ['--scan']);
    });

    test('should reject a blank task path', () => {
      assert.throws(() => createBuildTaskDescriptor('   '), InvalidInvocationError);
    });

    test('should reject a system property name containing =', () => {
      assert.throws(
        () => createBuildTaskDescriptor(':run', { systemProperties: { 'a=b': 'c' } }),
        (error: unknown) => error instanceof InvalidInvocationError && error.message === "Invalid system property name 'a=b'",
      );
    });
  });

  suite('buildArguments', () => {
    test('should place the task path first and options in a fixed order', () => {
      const descriptor = createBuildTaskDescriptor(':app:run', {
        additionalArgs: ['--args=x'],
        offline: true,
        refreshDependencies: true,
        consoleMode: 'rich',
        systemProperties: { foo: 'bar' },
        debug: true,
      });

      assert.deepStrictEqual(buildArguments(descriptor, 5005), [
        ':app:run',
        '--args=x',
        '--offline',
        '--refresh-dependencies',
        '--console=rich',
        '-Dfoo=bar',
        '-Dorg.gradle.debug=true',
        '-Dorg.gradle.debug.port=5005',
      ]);
    });

    test('should use --quiet for the quiet console', () => {
      const descriptor = createBuildTaskDescriptor('build', { consoleMode: 'quiet' });

      assert.deepStrictEqual(buildArguments(descriptor), ['build', '--quiet']);
    });

    test('should ignore the port when not debugging', () => {
      assert.deepStrictEqual(buildArguments(createBuildTaskDescriptor('clean'), 5005), ['clean', '--console=plain']);
    });

    test('should require a port for a debug task', () => {
      const descriptor = createBuildTaskDescriptor(':app:run', { debug: true });

      assert.throws(() => buildArguments(descriptor), RangeError);
    });
  });

  suite('findTask', () => {
    const model: BuildModel = {
      gradleVersion: '8.5',
      rootDir: '/work/demo',
      projects: [
        { path: ':', name: 'demo', tasks: [{ path: ':build', name: 'build', group: 'Build', description: '' }] },
        { path: ':app', name: 'app', tasks: [{ path: ':app:run', name: 'run', group: 'Application', description: 'Runs it' }] },
      ],
    };

    test('should find a task of a subproject by path', () => {
      assert.strictEqual(findTask(model, ':app:run')?.description, 'Runs it');
    });

    test('should return undefined for an unknown path', () => {
      assert.strictEqual(findTask(model, ':app:build'), undefined);
    });
  });
});
