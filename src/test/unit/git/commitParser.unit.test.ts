/**
 * @fileoverview Unit tests for paged log parsing.
 */

import * as assert from 'assert';
import { suite, test } from 'mocha';
import { FIELD_SEPARATOR, RECORD_SEPARATOR, parseCommitPage } from '../../../git/commitParser';
import { createTestLogger } from '../mocks/testLogger';

function entry(hash: string, subject: string, parents: string, authorTime = '1700000000'): string {
  return [
    hash, hash.slice(0, 7), subject,
    'Ada Example', 'ada@example.com', authorTime,
    'Bob Example', 'bob@example.com', '1700000100',
    parents,
  ].join(FIELD_SEPARATOR) + RECORD_SEPARATOR;
}

const FIRST = 'a'.repeat(40);
const SECOND = 'b'.repeat(40);
const THIRD = 'c'.repeat(40);

suite('commitParser', () => {

  test('should read every field of a commit', () => {
    const page = parseCommitPage(entry(FIRST, 'Add parser', `${SECOND} ${THIRD}`), 10, createTestLogger());

    assert.deepStrictEqual(page.commits, [{
      hash: FIRST,
      shortHash: 'aaaaaaa',
      subject: 'Add parser',
      authorName: 'Ada Example',
      authorEmail: 'ada@example.com',
      authorTimestamp: 1700000000,
      committerName: 'Bob Example',
      committerEmail: 'bob@example.com',
      committerTimestamp: 1700000100,
      parentHashes: [SECOND, THIRD],
    }]);
  });

  test('should give a root commit no parents', () => {
    const page = parseCommitPage(entry(FIRST, 'Initial', ''), 10, createTestLogger());
    assert.deepStrictEqual(page.commits[0].parentHashes, []);
  });

  test('should set the cursor only when the page is full', () => {
    const content = `${entry(FIRST, 'one', SECOND)}\n${entry(SECOND, 'two', THIRD)}\n`;

    const full = parseCommitPage(content, 2, createTestLogger());
    const partial = parseCommitPage(content, 3, createTestLogger());

    assert.deepStrictEqual(full.commits.map(c => c.subject), ['one', 'two']);
    assert.strictEqual(full.nextCursor, SECOND);
    assert.strictEqual(partial.commits.length, 2);
    assert.strictEqual('nextCursor' in partial, false);
  });

  test('should skip entries with too few fields', () => {
    const logger = createTestLogger();

    const page = parseCommitPage(`junk${RECORD_SEPARATOR}${entry(FIRST, 'ok', '')}`, 10, logger);

    assert.deepStrictEqual(page.commits.map(c => c.subject), ['ok']);
    assert.deepStrictEqual(logger.at('warn'), ['Malformed commit entry with 1 fields']);
  });

  test('should skip entries with an invalid timestamp', () => {
    const logger = createTestLogger();

    const page = parseCommitPage(entry(FIRST, 'bad', '', 'yesterday'), 10, logger);

    assert.deepStrictEqual(page.commits, []);
    assert.deepStrictEqual(logger.at('warn'), ['Failed to parse commit entry']);
  });

  test('should return an empty page for empty output', () => {
    assert.deepStrictEqual(parseCommitPage('', 10, createTestLogger()), { commits: [] });
  });
});
