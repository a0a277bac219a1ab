/**
 * @fileoverview Unit tests for CancellationTokenSource.
 */

import * as assert from 'assert';
import * as sinon from 'sinon';
import { suite, test } from 'mocha';
import { CancellationTokenSource } from '../../../process/cancellation';

suite('CancellationTokenSource', () => {
  test('should notify listeners once on cancel', () => {
    const source = new CancellationTokenSource();
    const listener = sinon.spy();
    source.token.onCancellationRequested(listener);

    source.cancel();
    source.cancel();

    assert.strictEqual(listener.callCount, 1);
    assert.strictEqual(source.token.isCancellationRequested, true);
    assert.strictEqual(source.isCancellationRequested, true);
  });

  test('should not notify disposed listeners', () => {
    const source = new CancellationTokenSource();
    const listener = sinon.spy();
    const registration = source.token.onCancellationRequested(listener);

    registration.dispose();
    source.cancel();

    assert.strictEqual(listener.callCount, 0);
  });

  test('should run late listeners immediately', () => {
    const source = new CancellationTokenSource();
    source.cancel();
    const listener = sinon.spy();

    source.token.onCancellationRequested(listener);

    assert.strictEqual(listener.callCount, 1);
  });
});
