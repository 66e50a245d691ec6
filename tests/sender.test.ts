import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    DEFAULT_EMAIL_TEMPLATE,
    FALLBACK_SENDER,
    GmailSender,
    MailboxClient,
    createMessage,
    describeApiError
} from '../src/modules/sender';
import { authorizeGmail, extractAuthCode } from '../src/modules/sender/google-client';
import { AuthenticationError, InputError } from '../src/utils/errors';

const decode = (raw: string) => Buffer.from(raw, 'base64url').toString('utf8');

function apiError(status: number, message: string): Error {
    return Object.assign(new Error(`Request failed with status code ${status}`), {
        response: { status, data: { error: { message } } }
    });
}

function fakeClient() {
    const client = {
        getProfileEmail: jest.fn<Promise<string | undefined>, []>(),
        sendRaw: jest.fn<Promise<string | undefined>, [string]>(),
    };
    const asMailbox: MailboxClient = client;
    return { client, asMailbox };
}

describe('Message builder', () => {
    test('Encodes a plain-text message', () => {
        const lines = decode(createMessage('info@acme.io', 'Hello', 'Hi there')).split('\r\n');
        expect(lines).toEqual([
            'To: info@acme.io',
            'Subject: Hello',
            'MIME-Version: 1.0',
            'Content-Type: text/plain; charset="UTF-8"',
            'Content-Transfer-Encoding: base64',
            '',
            Buffer.from('Hi there').toString('base64'),
        ]);
    });

    test('Adds a From header when given', () => {
        const lines = decode(createMessage('info@acme.io', 'Hello', 'x', 'me@sender.test')).split('\r\n');
        expect(lines.slice(0, 2)).toEqual(['To: info@acme.io', 'From: me@sender.test']);
    });

    test('Encodes non-ASCII subjects as encoded words', () => {
        const lines = decode(createMessage('info@acme.io', 'Grüße', 'x')).split('\r\n');
        expect(lines[1]).toBe(`Subject: =?UTF-8?B?${Buffer.from('Grüße').toString('base64')}?=`);
    });

    test('Keeps header values on one line', () => {
        const lines = decode(createMessage('info@acme.io', 'Hi\r\nBcc: x@acme.io', 'x')).split('\r\n');
        expect(lines[1]).toBe('Subject: Hi Bcc: x@acme.io');
        expect(lines.filter(line => line.startsWith('Bcc:'))).toEqual([]);
    });

    test('Wraps the encoded body at 76 columns', () => {
        const body = 'a'.repeat(120);
        const lines = decode(createMessage('info@acme.io', 'Hello', body)).split('\r\n').slice(6);
        const encoded = Buffer.from(body).toString('base64');
        expect(lines).toEqual([encoded.slice(0, 76), encoded.slice(76, 152), encoded.slice(152)]);
    });

    test('Rejects recipients without an @', () => {
        expect(() => createMessage('nobody', 'Hello', 'x')).toThrow(InputError);
    });

    test('Ships a default template', () => {
        expect(DEFAULT_EMAIL_TEMPLATE.startsWith('Hi,')).toBe(true);
    });
});

describe('API error details', () => {
    test('Reads status and message from an API response', () => {
        expect(describeApiError(apiError(403, 'Insufficient Permission'))).toEqual({
            status: 403, message: 'Insufficient Permission'
        });
    });

    test('Ignores errors that did not come from the API', () => {
        expect(describeApiError(new Error('socket hang up'))).toBeNull();
        expect(describeApiError('boom')).toBeNull();
    });
});

describe('GmailSender Module', () => {
    test('Returns the message id on success', async () => {
        const { client, asMailbox } = fakeClient();
        client.sendRaw.mockResolvedValueOnce('msg-1');

        const res = await new GmailSender(asMailbox).dispatch('info@acme.io', 'Hello', 'Body');

        expect(res).toEqual({ success: true, messageId: 'msg-1' });
        expect(decode(client.sendRaw.mock.calls[0][0])).toContain('To: info@acme.io');
    });

    test('Reports an unknown id when the API returns none', async () => {
        const { client, asMailbox } = fakeClient();
        client.sendRaw.mockResolvedValueOnce(undefined);

        const res = await new GmailSender(asMailbox).dispatch('info@acme.io', 'Hello', 'Body');
        expect(res).toEqual({ success: true, messageId: 'unknown' });
    });

    test('Does not retry client errors', async () => {
        const { client, asMailbox } = fakeClient();
        client.sendRaw.mockRejectedValue(apiError(403, 'Insufficient Permission'));

        const res = await new GmailSender(asMailbox).dispatch('info@acme.io', 'Hello', 'Body');

        expect(client.sendRaw).toHaveBeenCalledTimes(1);
        expect(res).toEqual({ success: false, kind: 'REJECTED', error: 'Gmail API error: Insufficient Permission' });
    });

    test('Retries server errors until attempts run out', async () => {
        const { client, asMailbox } = fakeClient();
        client.sendRaw.mockRejectedValue(apiError(500, 'Backend Error'));

        const res = await new GmailSender(asMailbox).dispatch('info@acme.io', 'Hello', 'Body');

        expect(client.sendRaw).toHaveBeenCalledTimes(3);
        expect(res).toEqual({
            success: false, kind: 'EXHAUSTED', error: 'Gmail API error after 3 attempts: Backend Error'
        });
    });

    test('Reports unexpected failures after the configured attempts', async () => {
        const { client, asMailbox } = fakeClient();
        client.sendRaw.mockRejectedValue(new Error('socket hang up'));

        const res = await new GmailSender(asMailbox, { maxAttempts: 2 }).dispatch('info@acme.io', 'Hello', 'Body');

        expect(client.sendRaw).toHaveBeenCalledTimes(2);
        expect(res).toEqual({
            success: false, kind: 'EXHAUSTED', error: 'Unexpected error after 2 attempts: socket hang up'
        });
    });

    test('Recovers from a transient failure', async () => {
        const { client, asMailbox } = fakeClient();
        client.sendRaw
            .mockRejectedValueOnce(apiError(503, 'Service Unavailable'))
            .mockResolvedValueOnce('msg-2');

        const res = await new GmailSender(asMailbox).dispatch('info@acme.io', 'Hello', 'Body');

        expect(client.sendRaw).toHaveBeenCalledTimes(2);
        expect(res).toEqual({ success: true, messageId: 'msg-2' });
    });

    test('Fails without calling the API for an invalid recipient', async () => {
        const { client, asMailbox } = fakeClient();

        const res = await new GmailSender(asMailbox).dispatch('nobody', 'Hello', 'Body');

        expect(client.sendRaw).not.toHaveBeenCalled();
        expect(res).toEqual({
            success: false, kind: 'INVALID_MESSAGE', error: 'Failed to create message: Invalid recipient: "nobody"'
        });
    });

    test('Caches the sender identity', async () => {
        const { client, asMailbox } = fakeClient();
        client.getProfileEmail.mockResolvedValue('me@sender.test');
        const sender = new GmailSender(asMailbox);

        expect(await sender.senderIdentity()).toBe('me@sender.test');
        expect(await sender.senderIdentity()).toBe('me@sender.test');
        expect(client.getProfileEmail).toHaveBeenCalledTimes(1);
    });

    test('Falls back when the profile cannot be read', async () => {
        const failing = fakeClient();
        failing.client.getProfileEmail.mockRejectedValue(new Error('unauthorized'));
        expect(await new GmailSender(failing.asMailbox).senderIdentity()).toBe(FALLBACK_SENDER);

        const empty = fakeClient();
        empty.client.getProfileEmail.mockResolvedValue(undefined);
        expect(await new GmailSender(empty.asMailbox).senderIdentity()).toBe('Unknown');
    });
});

describe('OAuth consent input', () => {
    test('Accepts a bare code', () => {
        expect(extractAuthCode('  test-code  ')).toBe('test-code');
    });

    test('Reads the code from a redirect URL', () => {
        expect(extractAuthCode('http://localhost/?code=test-code&scope=x')).toBe('test-code');
    });
});

describe('Gmail authorization', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'contact-finder-auth-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('Fails when the credentials file is missing', async () => {
        await expect(authorizeGmail({
            credentialsFile: path.join(dir, 'missing.json'),
            tokenFile: path.join(dir, 'token.json'),
        })).rejects.toThrow(AuthenticationError);
    });

    test('Fails when the credentials file has no client block', async () => {
        const credentialsFile = path.join(dir, 'credentials.json');
        fs.writeFileSync(credentialsFile, JSON.stringify({ other: {} }));

        await expect(authorizeGmail({ credentialsFile, tokenFile: path.join(dir, 'token.json') }))
            .rejects.toThrow('No "installed" or "web" client');
    });

    test('Reuses a saved token', async () => {
        const credentialsFile = path.join(dir, 'credentials.json');
        const tokenFile = path.join(dir, 'token.json');
        fs.writeFileSync(credentialsFile, JSON.stringify({
            installed: { client_id: 'test-client', client_secret: 'test-secret' }
        }));
        fs.writeFileSync(tokenFile, JSON.stringify({ refresh_token: 'test-refresh-token' }));

        const client = await authorizeGmail({ credentialsFile, tokenFile });

        expect(client.credentials.refresh_token).toBe('test-refresh-token');
    });
});
