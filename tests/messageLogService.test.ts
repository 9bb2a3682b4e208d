import { describe, it, expect, beforeEach } from 'vitest';
import { MessageLog, systemClock } from '../services/messageLogService.js';
import { ClockError, NonExistentAuthorError, type Message } from '../types.js';

const known = (...usernames: string[]) => ({
    contains: (username: string) => usernames.includes(username),
});

const directory = known('alice', 'bob', 'carol');

const message = (author: string, content: string, recipients: string[] = []): Message => ({
    author,
    content,
    recipients,
});

describe('MessageLog', () => {
    let now: number;
    let log: MessageLog;

    beforeEach(() => {
        now = 1_000;
        log = new MessageLog(() => now);
    });

    describe('append', () => {
        it('should record the message at the current second', () => {
            const timestamp = log.append(message('alice', 'hi'), directory);

            expect(timestamp).toBe(1_000);
            expect(log.size).toBe(1);
            expect(log.toRecord()).toEqual({ '1000': [message('alice', 'hi')] });
        });

        it('should keep every message posted in the same second, in order', () => {
            log.append(message('alice', 'first'), directory);
            log.append(message('bob', 'second'), directory);

            expect(log.toRecord()).toEqual({
                '1000': [message('alice', 'first'), message('bob', 'second')],
            });
        });

        it('should reject an unknown author and leave the log unchanged', () => {
            expect(() => log.append(message('mallory', 'hi'), directory)).toThrow(NonExistentAuthorError);
            expect(log.size).toBe(0);
        });

        it('should not be affected by later changes to the appended message', () => {
            const original = message('alice', 'hi', ['bob']);
            log.append(original, directory);
            original.recipients.push('carol');

            expect(log.toRecord()['1000'][0].recipients).toEqual(['bob']);
        });

        it('should fail with ClockError on an invalid clock reading', () => {
            now = -1;
            expect(() => log.append(message('alice', 'hi'), directory)).toThrow(ClockError);
            now = Number.NaN;
            expect(() => log.now()).toThrow(ClockError);
            expect(log.size).toBe(0);
        });

        it('should never assign an earlier timestamp when the clock steps back', () => {
            now = 1_005;
            const first = log.append(message('alice', 'first'), directory);
            now = 1_002;
            const second = log.append(message('alice', 'second'), directory);

            expect(first).toBe(1_005);
            expect(second).toBe(1_005);
            expect(log.toRecord()).toEqual({
                '1005': [message('alice', 'first'), message('alice', 'second')],
            });
        });

        it('should resume from the clock once it passes the last timestamp', () => {
            now = 1_005;
            log.append(message('alice', 'first'), directory);
            now = 1_002;
            log.append(message('alice', 'second'), directory);
            now = 1_007;

            expect(log.append(message('alice', 'third'), directory)).toBe(1_007);
            expect(Object.keys(log.toRecord())).toEqual(['1005', '1007']);
        });

        it('should not go below timestamps restored from a snapshot', () => {
            const restored = new MessageLog(() => 900, [[950, [message('bob', 'saved')]]]);

            expect(restored.append(message('alice', 'after restart'), directory)).toBe(950);
            expect(restored.toRecord()).toEqual({
                '950': [message('bob', 'saved'), message('alice', 'after restart')],
            });
        });
    });

    describe('queryAfter', () => {
        beforeEach(() => {
            now = 10;
            log.append(message('alice', 'at ten', ['bob']), directory);
            now = 20;
            log.append(message('alice', 'broadcast'), directory);
            log.append(message('bob', 'to carol', ['carol']), directory);
            now = 30;
            log.append(message('carol', 'at thirty', ['alice', 'bob']), directory);
        });

        it('should apply strict bounds on both sides', () => {
            const result = Array.from(log.queryAfter(10, 30));
            expect(result).toEqual([
                [20, message('alice', 'broadcast')],
                [20, message('bob', 'to carol', ['carol'])],
            ]);
        });

        it('should return everything in range when no recipient is given', () => {
            expect(Array.from(log.queryAfter(0, 31))).toHaveLength(4);
        });

        it('should include broadcasts and messages addressed to the recipient', () => {
            const result = Array.from(log.queryAfter(0, 31, 'bob'));
            expect(result).toEqual([
                [10, message('alice', 'at ten', ['bob'])],
                [20, message('alice', 'broadcast')],
                [30, message('carol', 'at thirty', ['alice', 'bob'])],
            ]);
        });

        it('should hide targeted messages from other users', () => {
            const contents = Array.from(log.queryAfter(0, 31, 'alice')).map(([, m]) => m.content);
            expect(contents).toEqual(['broadcast', 'at thirty']);
        });

        it('should be empty when the range holds no timestamps', () => {
            expect(Array.from(log.queryAfter(20, 21))).toEqual([]);
            expect(Array.from(log.queryAfter(30, 100))).toEqual([]);
        });

        it('should be iterable more than once', () => {
            const result = log.queryAfter(0, 31, 'carol');
            expect(Array.from(result)).toEqual(Array.from(result));
            expect(Array.from(result).map(([, m]) => m.content)).toEqual(['broadcast', 'to carol']);
        });

        it('should yield copies', () => {
            for (const [, entry] of log.queryAfter(0, 31)) {
                entry.recipients.push('mallory');
            }
            expect(Array.from(log.queryAfter(0, 31, 'mallory')).map(([, m]) => m.content)).toEqual(['broadcast']);
        });
    });

    it('should rebuild from exported entries', () => {
        log.append(message('alice', 'hi', ['bob']), directory);
        now = 1_001;
        log.append(message('bob', 'hello'), directory);

        const entries = Object.entries(log.toRecord()).map(([key, bucket]): [number, Message[]] => [Number(key), bucket]);
        const restored = new MessageLog(() => now, entries);

        expect(restored.toRecord()).toEqual(log.toRecord());
        expect(restored.size).toBe(2);
    });

    it('should read whole seconds from the system clock', () => {
        const before = Math.floor(Date.now() / 1000);
        const reading = systemClock();
        expect(Number.isInteger(reading)).toBe(true);
        expect(reading).toBeGreaterThanOrEqual(before);
    });
});
