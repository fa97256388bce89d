/**
 * @module: LoggerTests
 * @risk: low
 * @scope: test
 *
 * @description
 * Validates that logging utilities redact raw Discord identifiers before anything is written.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import { transports } from 'winston';

import { describeError, logger, sanitizeLogData } from '../src/logger.js';

test('sanitizeLogData redacts snowflakes inside mentions and plain text', () => {
    assert.equal(
        sanitizeLogData('<@123456789012345678> asked in 234567890123456789'),
        '<@[REDACTED_ID]> asked in [REDACTED_ID]'
    );
});

test('sanitizeLogData leaves short numbers alone', () => {
    assert.equal(sanitizeLogData('retry 3 of 12345'), 'retry 3 of 12345');
});

test('sanitizeLogData walks nested objects and arrays', () => {
    const sanitized = sanitizeLogData({
        user: { id: '123456789012345678' },
        list: ['98765432109876543 joined'],
        count: 2
    });

    assert.deepEqual(sanitized, {
        user: { id: '[REDACTED_ID]' },
        list: ['[REDACTED_ID] joined'],
        count: 2
    });
});

test('sanitizeLogData returns Error instances untouched', () => {
    const error = new Error('channel 123456789012345678 missing');
    assert.equal(sanitizeLogData(error), error);
});

test('describeError renders errors and thrown values', () => {
    assert.equal(describeError(new TypeError('bad input')), 'TypeError: bad input');
    assert.equal(describeError('plain failure'), 'plain failure');
});

test('logger pipeline applies sanitizer before emitting logs', async () => {
    const captured: string[] = [];
    const streamTransport = new transports.Stream({
        stream: new Writable({
            write(chunk: Buffer, _encoding, callback) {
                captured.push(chunk.toString());
                callback();
            }
        })
    });

    logger.add(streamTransport);
    try {
        logger.info('Audit for guild 123456789012345678 channel 234567890123456789');
        await new Promise((resolve) => setImmediate(resolve));
    } finally {
        logger.remove(streamTransport);
    }

    const output = captured.join(' ');
    assert.ok(output.includes('Audit for guild [REDACTED_ID] channel [REDACTED_ID]'));
    assert.equal(output.match(/\b\d{17,19}\b/), null);
});
