import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { summarizeSnapshot } from './inspect_snapshot.js';

vi.mock('../services/loggerService.js');

describe('inspect_snapshot', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await fs.rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('should summarize users and messages', async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pigeon-inspect-'));
        const usersFile = path.join(dir, 'users.json');
        const messagesFile = path.join(dir, 'messages.json');
        await fs.writeFile(usersFile, JSON.stringify({ alice: '$2b$04$placeholder', bob: null }));
        await fs.writeFile(messagesFile, JSON.stringify({
            '30': [{ author: 'bob', content: 'c', recipients: [] }],
            '10': [
                { author: 'alice', content: 'a', recipients: ['bob'] },
                { author: 'bob', content: 'b', recipients: [] },
            ],
        }));

        expect(await summarizeSnapshot(usersFile, messagesFile)).toEqual({
            users: 2,
            credentialedUsers: 1,
            messages: 3,
            firstTimestamp: 10,
            lastTimestamp: 30,
        });
    });

    it('should report an empty snapshot when files are missing', async () => {
        expect(await summarizeSnapshot('/nonexistent/users.json', '/nonexistent/messages.json')).toEqual({
            users: 0,
            credentialedUsers: 0,
            messages: 0,
            firstTimestamp: null,
            lastTimestamp: null,
        });
    });
});
