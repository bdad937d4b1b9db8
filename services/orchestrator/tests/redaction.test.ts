import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { createRedactor, redactionTag } from '../src/audit/redaction';

describe('redaction', () => {
  it('tags redacted values with their type', () => {
    assert.equal(redactionTag('text'), '[redacted:string]');
    assert.equal(redactionTag(42), '[redacted:number]');
    assert.equal(redactionTag(false), '[redacted:boolean]');
    assert.equal(redactionTag(null), '[redacted:null]');
    assert.equal(redactionTag([1, 2]), '[redacted:array]');
    assert.equal(redactionTag({ a: 1 }), '[redacted:object]');
  });

  it('redacts matching members at any depth, ignoring case', () => {
    const redact = createRedactor(['Payload', ' token ', '']);

    const redacted = redact({
      action: 'files.upload',
      PAYLOAD: 'raw file bytes',
      nested: {
        token: 'test-secret',
        list: [{ payload: { inner: true } }, { keep: 'visible' }]
      }
    });

    assert.deepEqual(redacted, {
      action: 'files.upload',
      PAYLOAD: '[redacted:string]',
      nested: {
        token: '[redacted:string]',
        list: [{ payload: '[redacted:object]' }, { keep: 'visible' }]
      }
    });
  });

  it('leaves values without matching members unchanged', () => {
    const redact = createRedactor(['payload']);
    assert.deepEqual(redact({ name: 'report.pdf', size: 12 }), { name: 'report.pdf', size: 12 });
    assert.equal(redact('payload'), 'payload');
  });
});
