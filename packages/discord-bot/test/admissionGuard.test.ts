/**
 * @description: Covers the per-user admission guard and its debounce window.
 * @scope: test
 * @module: AdmissionGuardTests
 * @risk: low - Tests only.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { AdmissionGuard } from '../src/framework/AdmissionGuard.js';

const createClock = (start = 1_000) => {
    let now = start;
    return { now: () => now, advance: (ms: number) => { now += ms; } };
};

test('a second acquire inside the window is refused', () => {
    const clock = createClock();
    const guard = new AdmissionGuard({ debounceMs: 4000, now: clock.now });

    assert.equal(guard.tryAcquire('user-a'), true);
    clock.advance(3999);
    assert.equal(guard.tryAcquire('user-a'), false);
    assert.equal(guard.isExecuting('user-a'), true);
});

test('a record older than the window stops blocking', () => {
    const clock = createClock();
    const guard = new AdmissionGuard({ debounceMs: 4000, now: clock.now });

    guard.tryAcquire('user-a');
    clock.advance(4000);
    assert.equal(guard.isExecuting('user-a'), false);
    assert.equal(guard.tryAcquire('user-a'), true);
});

test('release admits the next dispatch inside the window', () => {
    const guard = new AdmissionGuard({ debounceMs: 4000, now: createClock().now });

    guard.tryAcquire('user-a');
    guard.release('user-a');
    assert.equal(guard.size, 0);
    assert.equal(guard.tryAcquire('user-a'), true);
});

test('users are tracked independently', () => {
    const guard = new AdmissionGuard({ debounceMs: 4000, now: createClock().now });

    assert.equal(guard.tryAcquire('user-a'), true);
    assert.equal(guard.tryAcquire('user-b'), true);
    assert.equal(guard.size, 2);
    guard.release('user-b');
    assert.equal(guard.isExecuting('user-a'), true);
});
