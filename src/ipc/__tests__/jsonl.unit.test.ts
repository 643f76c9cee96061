/**
 * JSONL Protocol Unit Tests
 *
 * Tests JSONL parsing and formatting behavior.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { JSONLBuffer, parseJSONLFrame, toJSONLFrame } from '@/ipc/transport/jsonl.js';

void describe('JSONLBuffer', () => {
  void it('handles partial frames across chunks', () => {
    const buffer = new JSONLBuffer();

    assert.deepEqual(buffer.process('{"type":'), []);
    assert.deepEqual(buffer.process('"ping_request"}\n'), ['{"type":"ping_request"}']);
  });

  void it('processes multiple complete frames in one chunk', () => {
    const buffer = new JSONLBuffer();

    const lines = buffer.process('{"a":1}\n{"b":2}\n{"c":3}\n');
    assert.deepEqual(lines, ['{"a":1}', '{"b":2}', '{"c":3}']);
  });

  void it('filters out blank lines', () => {
    const buffer = new JSONLBuffer();

    const lines = buffer.process('{"a":1}\n\n{"b":2}\n   \n');
    assert.deepEqual(lines, ['{"a":1}', '{"b":2}']);
  });

  void it('keeps the unterminated tail for the next chunk', () => {
    const buffer = new JSONLBuffer();

    assert.deepEqual(buffer.process('{"a":1}\n{"b":'), ['{"a":1}']);
    assert.equal(buffer.getBuffer(), '{"b":');
  });

  void it('clears buffer', () => {
    const buffer = new JSONLBuffer();

    buffer.process('{"incomplete":');
    buffer.clear();

    assert.deepEqual(buffer.process('{"new":"message"}\n'), ['{"new":"message"}']);
  });
});

void describe('parseJSONLFrame', () => {
  void it('returns the decoded value', () => {
    assert.deepEqual(parseJSONLFrame('{"type":"state_request","sessionId":"s1"}'), {
      type: 'state_request',
      sessionId: 's1',
    });
  });

  void it('throws on invalid JSON', () => {
    assert.throws(() => {
      parseJSONLFrame('{"invalid": json}');
    }, SyntaxError);
  });
});

void describe('toJSONLFrame', () => {
  void it('serializes compactly with a trailing newline', () => {
    assert.equal(
      toJSONLFrame({ type: 'ping_request', sessionId: 's1' }),
      '{"type":"ping_request","sessionId":"s1"}\n'
    );
  });

  void it('handles empty objects', () => {
    assert.equal(toJSONLFrame({}), '{}\n');
  });
});
